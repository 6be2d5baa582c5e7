/**
 * @pricecodec/crypto — RTB price macro codec
 *
 * Re-exports all public types and functions for consumers.
 */
export {
  encryptPrice,
  decryptPrice,
  generateIv,
  derivePad,
  maskPrice,
  computeTag,
  verifyTag,
  IV_BYTES,
  PRICE_BYTES,
  TAG_BYTES,
  FRAME_BYTES,
  ENCODED_LENGTH,
} from "./price.js";
export { parseKeys } from "./keys.js";
export { KeyDecodeError, PriceError, isPriceError } from "./errors.js";
export type { KeyRole, PriceErrorCode } from "./errors.js";
export { BASE64_VARIANTS, type Base64Variant, type PriceKeys, type PriceFrame } from "./types.js";
export { validateBase64 } from "./utils.js";
