import type { SampledCompanies } from './models';
import { addressCountry, companyDirectors, residenceCountry } from './classifier';
import { isUkVariant, type UkVariantSet } from './variants';

/**
 * Every distinct country string given by a director, either as country of
 * residence or as the country of their address. Values are trimmed.
 */
export function extractDirectorCountries(companies: SampledCompanies): Set<string> {
  const countries = new Set<string>();

  for (const company of Object.values(companies)) {
    for (const director of companyDirectors(company)) {
      const residence = residenceCountry(director);
      const address = addressCountry(director);

      // Whitespace-only values are kept as "" so they surface for review
      if (residence) {
        countries.add(residence.trim());
      }
      if (address) {
        countries.add(address.trim());
      }
    }
  }

  return countries;
}

/**
 * Countries that the variant list does not recognise as UK, sorted for review.
 * A UK spelling showing up here means the variant list needs extending before
 * the classification can be trusted.
 */
export function unrecognisedCountries(countries: Iterable<string>, ukVariants: UkVariantSet): string[] {
  return [...countries].filter(country => !isUkVariant(country, ukVariants)).sort();
}
