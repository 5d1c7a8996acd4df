import { getCountries, parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

/** Normalize a phone number to E.164. Falls back to the number with formatting stripped. */
export function normalizePhone(raw: string, defaultCountry: CountryCode = 'US'): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Resolve an ISO 3166-1 alpha-2 code to a country libphonenumber-js knows. */
export function toCountryCode(value: string): CountryCode | undefined {
  const upper = value.trim().toUpperCase();
  return getCountries().find(code => code === upper);
}
