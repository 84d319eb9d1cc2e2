import { COMPLIANCE_METRICS } from './models';
import type { AuditResult, GroupCompliance } from './audit';
import type { ProportionEstimate, RatioEstimate } from './statistics';

export function formatCount(value: number): string {
  return value.toLocaleString('en-GB');
}

export function formatPercent(value: number, digits: number): string {
  return `${(value * 100).toFixed(digits)}%`;
}

function formatEstimate(estimate: ProportionEstimate, pDigits: number, moeDigits: number): string {
  return `${formatPercent(estimate.p, pDigits)} ±${formatPercent(estimate.moe, moeDigits)}`;
}

export function formatLoaded(companyCount: number): string[] {
  return ['', `Loaded ${companyCount} sampled companies.`];
}

export function formatCountryInspection(countryCount: number, unrecognised: string[]): string[] {
  return [
    '',
    `Found ${countryCount} unique director countries, excluding those I identify as UK:`,
    ...unrecognised,
    '',
    'If any UK variants appear above, add them to the UK variant list and rerun. Failure to do this will mean the results will be unreliable.',
  ];
}

export function formatDirectorCounts(result: Pick<AuditResult, 'counts' | 'foreignOnly' | 'questionableResidence'>): string[] {
  const { counts, foreignOnly, questionableResidence } = result;
  return [
    '',
    `Total: ${formatCount(counts.total_companies)}, with UK director: ${formatCount(counts.with_uk)}, without: ${formatCount(counts.without_uk)}`,
    `Proportion companies all-foreign: ${formatEstimate(foreignOnly, 1, 2)}`,
    `${counts.total_directors} directors of which ${formatEstimate(questionableResidence, 1, 2)} have questionable residence`,
  ];
}

export function formatGroup(group: GroupCompliance): string[] {
  const lines = ['', `Group '${group.group}' (n=${formatCount(group.companies)}):`];
  for (const { key, label } of COMPLIANCE_METRICS) {
    const estimate = group.metrics[key];
    lines.push(`  ${label}: ${formatCount(estimate.count)} (${formatEstimate(estimate, 2, 2)})`);
  }
  return lines;
}

export function formatCompliance(groups: GroupCompliance[]): string[] {
  return ['', 'Compliance indicators by group:', ...groups.flatMap(formatGroup)];
}

export function formatRatio(ratio: RatioEstimate | null): string[] {
  if (!ratio) {
    return [
      '',
      'Ratio of fraud in foreign vs UK companies: undefined (no default addresses in the with_uk group)',
    ];
  }
  return ['', `Ratio of fraud in foreign vs UK companies: ${ratio.ratio.toFixed(2)} ±${ratio.moe.toFixed(2)}`];
}

/**
 * Full human-readable report, one entry per output line.
 */
export function formatReport(result: AuditResult): string[] {
  return [
    ...formatLoaded(result.companyCount),
    ...formatCountryInspection(result.countries.size, result.unrecognisedCountries),
    ...formatDirectorCounts(result),
    ...formatCompliance(result.groups),
    ...formatRatio(result.defaultAddressRatio),
  ];
}
