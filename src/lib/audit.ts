import {
  COMPLIANCE_GROUPS,
  type ComplianceGroup,
  type ComplianceMetric,
  type SampledCompanies,
} from './models';
import { analyzeCompliance, classifyCompanies, type ComplianceMetrics, type DirectorCounts } from './compliance';
import { extractDirectorCountries, unrecognisedCountries } from './countries';
import { RatioUndefinedError } from './errors';
import { estimateProportion, estimateRatio, type ProportionEstimate, type RatioEstimate } from './statistics';
import type { UkVariantSet } from './variants';

export interface AuditOptions {
  /** Processing date as midnight UTC; filings due before it are late. */
  today: Date;
  z: number;
}

export interface GroupCompliance {
  group: ComplianceGroup;
  companies: number;
  metrics: Record<ComplianceMetric, ProportionEstimate>;
}

export interface AuditResult {
  companyCount: number;
  countries: Set<string>;
  unrecognisedCountries: string[];
  counts: DirectorCounts;
  foreignOnly: ProportionEstimate;
  questionableResidence: ProportionEstimate;
  compliance: ComplianceMetrics;
  groups: GroupCompliance[];
  /** Foreign vs UK default-address ratio; null when the UK group has no default addresses. */
  defaultAddressRatio: RatioEstimate | null;
}

export function summarizeGroups(counts: DirectorCounts, compliance: ComplianceMetrics, z: number): GroupCompliance[] {
  return COMPLIANCE_GROUPS.map(group => {
    const companies = counts[group];
    const metrics = {
      late_confstmt: estimateProportion(compliance[group].late_confstmt, companies, z),
      late_accounts: estimateProportion(compliance[group].late_accounts, companies, z),
      default_address: estimateProportion(compliance[group].default_address, companies, z),
    };
    return { group, companies, metrics };
  });
}

/**
 * How many times more often companies without a UK director use a default
 * address than companies with one.
 */
export function defaultAddressRatio(counts: DirectorCounts, compliance: ComplianceMetrics, z: number): RatioEstimate {
  const foreign = estimateProportion(compliance.without_uk.default_address, counts.without_uk, z);
  const uk = estimateProportion(compliance.with_uk.default_address, counts.with_uk, z);
  return estimateRatio(foreign, uk);
}

function tryDefaultAddressRatio(
  counts: DirectorCounts,
  compliance: ComplianceMetrics,
  z: number
): RatioEstimate | null {
  try {
    return defaultAddressRatio(counts, compliance, z);
  } catch (error) {
    if (error instanceof RatioUndefinedError) {
      return null;
    }
    throw error;
  }
}

/**
 * Run the three passes over the sample (country extraction, director counts,
 * compliance) and derive every estimate the report prints.
 */
export function runAudit(companies: SampledCompanies, ukVariants: UkVariantSet, options: AuditOptions): AuditResult {
  const countries = extractDirectorCountries(companies);
  const counts = classifyCompanies(companies, ukVariants);
  const compliance = analyzeCompliance(companies, ukVariants, options.today);

  return {
    companyCount: Object.keys(companies).length,
    countries,
    unrecognisedCountries: unrecognisedCountries(countries, ukVariants),
    counts,
    foreignOnly: estimateProportion(counts.without_uk, counts.total_companies, options.z),
    questionableResidence: estimateProportion(counts.questionable_residence, counts.total_directors, options.z),
    compliance,
    groups: summarizeGroups(counts, compliance, options.z),
    defaultAddressRatio: tryDefaultAddressRatio(counts, compliance, options.z),
  };
}
