export type { NormalizerFunction, NormalizerMetadata, NormalizerOptions } from './types'
export { NormalizerRegistry, composeNormalizers } from './registry'
export { normalizeRecord } from './record-normalizer'
export {
  collapseWhitespace,
  stripDiacritics,
  punctuationToSpace,
  digitsOnly,
  normalizeText,
} from './basic'
export { normalizeName, isTitle, isSuffix } from './name'
export { normalizeEmail } from './email'
export { normalizePhone, dropCountryCode, toNationalNumber } from './phone'
export { normalizeAddress, normalizePostalCode, expandAddressToken } from './address'
