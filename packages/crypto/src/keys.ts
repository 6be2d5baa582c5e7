/**
 * Key Loader
 * ==========
 *
 * Exchanges hand out two keys per buyer account, each as base64 text:
 *   - integrity key  — signs (price ‖ iv)
 *   - encryption key — derives the masking pad from the iv
 *
 * Deployments disagree on the base64 flavour (padded or not, standard or
 * URL-safe), so the caller names the variant explicitly.
 */

import type { Buffer } from "node:buffer";
import { KeyDecodeError, type KeyRole } from "./errors.js";
import type { Base64Variant, PriceKeys } from "./types.js";
import { validateBase64 } from "./utils.js";

function decodeKey(role: KeyRole, text: string, variant: Base64Variant): Buffer {
  try {
    return validateBase64(text, `${role} key`, variant);
  } catch (err) {
    throw new KeyDecodeError(role, variant, err);
  }
}

/**
 * Decode the integrity and encryption keys.
 *
 * @param variant - base64 flavour both texts are written in
 * @throws KeyDecodeError naming the key that failed, with the decode error as `cause`
 */
export function parseKeys(
  variant: Base64Variant,
  integrityKeyText: string,
  encryptionKeyText: string
): PriceKeys {
  const integrityKey = decodeKey("integrity", integrityKeyText, variant);
  const encryptionKey = decodeKey("encryption", encryptionKeyText, variant);
  return { integrityKey, encryptionKey };
}
