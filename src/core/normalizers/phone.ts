import {
  getCountryCallingCode,
  isSupportedCountry,
  parsePhoneNumberFromString,
  type CountryCode,
} from 'libphonenumber-js'
import { digitsOnly, fallbackForm } from './basic'
import type { NormalizerOptions } from './types'

/**
 * Drops the calling code of `country` from the digits of an international
 * number when what follows it is a possible national number for that code.
 *
 * @example
 * ```typescript
 * dropCountryCode('12025550123', 'US') // '2025550123'
 * dropCountryCode('442071838750', 'US') // '442071838750'
 * ```
 */
export function dropCountryCode(digits: string, country: CountryCode): string {
  if (!isSupportedCountry(country)) {
    return digits
  }

  const callingCode = getCountryCallingCode(country)
  if (!digits.startsWith(callingCode) || digits.length <= callingCode.length) {
    return digits
  }

  const parsed = parsePhoneNumberFromString(`+${digits}`)
  if (!parsed || parsed.countryCallingCode !== callingCode || !parsed.isPossible()) {
    return digits
  }

  return parsed.nationalNumber
}

/**
 * Reads `digits` as dialled within `country` and returns its national
 * significant number, stripping a trunk prefix such as the leading 1 of
 * '1 202 555 0123'. Digits that do not form a possible number come back
 * unchanged.
 */
export function toNationalNumber(digits: string, country: CountryCode): string {
  const parsed = parsePhoneNumberFromString(digits, country)
  if (!parsed || !parsed.isPossible()) {
    return digits
  }
  return parsed.nationalNumber
}

/**
 * Applies `toNationalNumber` until it stops shortening the digits.
 */
function settleNationalNumber(digits: string, country: CountryCode): string {
  let current = digits
  let next = toNationalNumber(current, country)
  while (next.length < current.length) {
    current = next
    next = toNationalNumber(current, country)
  }
  return current
}

/**
 * Normalizes a phone number to a canonical digit sequence.
 *
 * All non-digit characters are removed. When `phoneCountry` is set, the
 * calling code is dropped only from numbers written with a leading '+', and
 * the digits are then reduced to their national form, so that
 * '+1 202-555-0123', '1 202 555 0123' and '(202) 555 0123' normalize
 * identically. Normalized output carries no prefix and maps to itself.
 * Input without any digit keeps its lowercased, trimmed form.
 *
 * @example
 * ```typescript
 * normalizePhone('+1 (202) 555-0123', { phoneCountry: 'US' }) // '2025550123'
 * normalizePhone('202.555.0123', {})                          // '2025550123'
 * normalizePhone('Unknown', {})                               // 'unknown'
 * ```
 */
export function normalizePhone(value: string, options: NormalizerOptions = {}): string {
  const digits = digitsOnly(value)
  if (!digits) {
    return fallbackForm(value)
  }

  const country = options.phoneCountry
  if (!country || !isSupportedCountry(country)) {
    return digits
  }

  const national = value.trimStart().startsWith('+') ? dropCountryCode(digits, country) : digits
  return settleNationalNumber(national, country)
}
