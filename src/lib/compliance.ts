import {
  ACCOUNTS_DUE_FIELD,
  CONF_STMT_DUE_FIELD,
  REG_ADDRESS_LINE1_FIELD,
  type CompanyData,
  type CompanyRecord,
  type ComplianceGroup,
  type ComplianceMetric,
  type SampledCompanies,
} from './models';
import { classifyCompany, companyDirectors, hasUkDirector } from './classifier';
import { isBeforeDay, parseDayMonthYear } from './dates';
import type { UkVariantSet } from './variants';

export interface DirectorCounts {
  with_uk: number;
  without_uk: number;
  questionable_residence: number;
  total_directors: number;
  total_companies: number;
}

export type ComplianceMetrics = Record<ComplianceGroup, Record<ComplianceMetric, number>>;

const DEFAULT_ADDRESS_MARKER = 'default address';

/**
 * Count companies with and without a UK-resident director, all directors, and
 * directors whose UK residence is not backed by a UK address.
 */
export function classifyCompanies(companies: SampledCompanies, ukVariants: UkVariantSet): DirectorCounts {
  const counts = {
    with_uk: 0,
    without_uk: 0,
    questionable_residence: 0,
    total_directors: 0,
  };

  for (const company of Object.values(companies)) {
    const classification = classifyCompany(company, ukVariants);

    counts.total_directors += classification.directorCount;
    counts.questionable_residence += classification.questionableResidence;

    if (classification.hasUkDirector) {
      counts.with_uk += 1;
    } else {
      counts.without_uk += 1;
    }
  }

  return {
    ...counts,
    total_companies: counts.with_uk + counts.without_uk,
  };
}

function fieldText(data: CompanyData, field: string): string {
  const value = data[field];
  return value === undefined || value === null ? '' : String(value).trim();
}

/**
 * A filing is late when its due date parses and falls strictly before today.
 * Missing or malformed dates count as not late.
 */
export function isOverdue(data: CompanyData, field: string, today: Date): boolean {
  const dueDate = parseDayMonthYear(fieldText(data, field));
  return dueDate !== null && isBeforeDay(dueDate, today);
}

function containsDefaultAddress(value: string): boolean {
  return value.toLowerCase().includes(DEFAULT_ADDRESS_MARKER);
}

/**
 * True when the registered office, or failing that any director's service
 * address, uses the Companies House default address.
 */
export function usesDefaultAddress(company: CompanyRecord): boolean {
  const data = company.company_data ?? {};
  if (containsDefaultAddress(fieldText(data, REG_ADDRESS_LINE1_FIELD))) {
    return true;
  }

  return companyDirectors(company).some(director =>
    Object.values(director.address ?? {}).some(
      value => typeof value === 'string' && containsDefaultAddress(value)
    )
  );
}

export function emptyComplianceMetrics(): ComplianceMetrics {
  return {
    with_uk: { late_confstmt: 0, late_accounts: 0, default_address: 0 },
    without_uk: { late_confstmt: 0, late_accounts: 0, default_address: 0 },
  };
}

/**
 * Tally late confirmation statements, late accounts and default addresses for
 * companies with and without a UK-resident director.
 */
export function analyzeCompliance(
  companies: SampledCompanies,
  ukVariants: UkVariantSet,
  today: Date
): ComplianceMetrics {
  const metrics = emptyComplianceMetrics();

  for (const company of Object.values(companies)) {
    const group: ComplianceGroup = hasUkDirector(company, ukVariants) ? 'with_uk' : 'without_uk';
    const data = company.company_data ?? {};

    if (isOverdue(data, CONF_STMT_DUE_FIELD, today)) {
      metrics[group].late_confstmt += 1;
    }
    if (isOverdue(data, ACCOUNTS_DUE_FIELD, today)) {
      metrics[group].late_accounts += 1;
    }
    if (usesDefaultAddress(company)) {
      metrics[group].default_address += 1;
    }
  }

  return metrics;
}
