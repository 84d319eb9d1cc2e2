import type { CompanyRecord, DirectorRecord } from './models';
import { isUkVariant, type UkVariantSet } from './variants';

/**
 * How a single director's stated countries relate to the UK:
 * - `uk`: residence and address country are both UK variants
 * - `questionable`: residence is UK but the address country is not (or is missing)
 * - `non_uk`: residence is missing or not UK
 */
export type DirectorResidence = 'uk' | 'questionable' | 'non_uk';

export interface CompanyClassification {
  hasUkDirector: boolean;
  directorCount: number;
  questionableResidence: number;
}

export function companyDirectors(company: CompanyRecord): DirectorRecord[] {
  return company.directors ?? [];
}

// First non-empty of the two residence fields officers are recorded with
export function residenceCountry(director: DirectorRecord): string | null {
  return director.country_of_residence || director.residence_country || null;
}

export function addressCountry(director: DirectorRecord): string | null {
  const country = director.address?.country;
  return typeof country === 'string' && country ? country : null;
}

export function classifyDirector(director: DirectorRecord, ukVariants: UkVariantSet): DirectorResidence {
  const residence = residenceCountry(director);
  if (!residence || !isUkVariant(residence, ukVariants)) {
    return 'non_uk';
  }

  const address = addressCountry(director);
  return address && isUkVariant(address, ukVariants) ? 'uk' : 'questionable';
}

/**
 * Scan every director of a company. Used for the top-line counts, where each
 * questionable director is tallied even after a qualifying UK director is found.
 */
export function classifyCompany(company: CompanyRecord, ukVariants: UkVariantSet): CompanyClassification {
  const result: CompanyClassification = {
    hasUkDirector: false,
    directorCount: 0,
    questionableResidence: 0,
  };

  for (const director of companyDirectors(company)) {
    result.directorCount += 1;

    const residence = classifyDirector(director, ukVariants);
    if (residence === 'uk') {
      result.hasUkDirector = true;
    } else if (residence === 'questionable') {
      result.questionableResidence += 1;
    }
  }

  return result;
}

/**
 * Stop at the first director who is UK-resident with a UK address. Used for
 * compliance grouping, which needs the group and nothing else.
 */
export function hasUkDirector(company: CompanyRecord, ukVariants: UkVariantSet): boolean {
  for (const director of companyDirectors(company)) {
    if (classifyDirector(director, ukVariants) === 'uk') {
      return true;
    }
  }
  return false;
}
