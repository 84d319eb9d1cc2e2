import { z } from 'zod';

// Officer address as returned by the Companies House officers endpoint
export const DirectorAddressSchema = z.record(z.string(), z.unknown());

export type DirectorAddress = z.infer<typeof DirectorAddressSchema>;

// A director as stored in the sample file. Only the residence and address
// fields feed the analysis; everything else is carried through untouched.
export const DirectorRecordSchema = z.object({
  name: z.string().nullable().optional(),
  officer_role: z.string().nullable().optional(),
  country_of_residence: z.string().nullable().optional(),
  residence_country: z.string().nullable().optional(),
  nationality: z.string().nullable().optional(),
  appointed_on: z.string().nullable().optional(),
  resigned_on: z.string().nullable().optional(),
  address: DirectorAddressSchema.nullable().optional(),
}).passthrough();

export type DirectorRecord = z.infer<typeof DirectorRecordSchema>;

// Row of the Companies House bulk company CSV, keyed by its column headers
export const CompanyDataSchema = z.record(z.string(), z.unknown());

export type CompanyData = z.infer<typeof CompanyDataSchema>;

export const CompanyRecordSchema = z.object({
  directors: z.array(DirectorRecordSchema).nullable().optional(),
  company_data: CompanyDataSchema.nullable().optional(),
}).passthrough();

export type CompanyRecord = z.infer<typeof CompanyRecordSchema>;

export const SampleFileSchema = z.object({
  sampled_companies: z.record(z.string(), CompanyRecordSchema).optional(),
}).passthrough();

export type SampleFile = z.infer<typeof SampleFileSchema>;

// Company number -> record
export type SampledCompanies = Record<string, CompanyRecord>;

// Bulk CSV column names consulted by the compliance pass
export const CONF_STMT_DUE_FIELD = 'ConfStmtNextDueDate';
export const ACCOUNTS_DUE_FIELD = 'Accounts.NextDueDate';
export const REG_ADDRESS_LINE1_FIELD = 'RegAddress.AddressLine1';
export const COMPANY_NUMBER_FIELD = 'CompanyNumber';

// Companies House officer list item
export const OfficerSchema = z.object({
  name: z.string().optional(),
  officer_role: z.string().optional(),
  appointed_on: z.string().optional(),
  resigned_on: z.string().optional(),
  country_of_residence: z.string().optional(),
  nationality: z.string().optional(),
  occupation: z.string().optional(),
  address: z.record(z.string(), z.unknown()).optional(),
}).passthrough();

export type Officer = z.infer<typeof OfficerSchema>;

export const OfficerListSchema = z.object({
  items: z.array(OfficerSchema).optional(),
  total_results: z.number().optional(),
  active_count: z.number().optional(),
  resigned_count: z.number().optional(),
  items_per_page: z.number().optional(),
  start_index: z.number().optional(),
}).passthrough();

export type OfficerList = z.infer<typeof OfficerListSchema>;

export type ComplianceGroup = 'with_uk' | 'without_uk';

export const COMPLIANCE_GROUPS: readonly ComplianceGroup[] = ['with_uk', 'without_uk'];

export type ComplianceMetric = 'late_confstmt' | 'late_accounts' | 'default_address';

export const COMPLIANCE_METRICS: readonly { key: ComplianceMetric; label: string }[] = [
  { key: 'late_confstmt', label: 'Late confirmation statement' },
  { key: 'late_accounts', label: 'Late accounts filing' },
  { key: 'default_address', label: 'Default office address' },
];
