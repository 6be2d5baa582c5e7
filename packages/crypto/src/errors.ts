/**
 * Error taxonomy for the price codec.
 *
 * Two disjoint families:
 *   - KeyDecodeError — raised only while loading key material
 *   - PriceError     — raised by encryptPrice / decryptPrice, tagged by `code`
 */

import type { Base64Variant } from "./types.js";

/** Which of the two keys failed to decode */
export type KeyRole = "integrity" | "encryption";

export class KeyDecodeError extends Error {
  override readonly name = "KeyDecodeError" as const;

  constructor(
    public readonly key: KeyRole,
    public readonly variant: Base64Variant,
    cause: unknown
  ) {
    super(`could not decode price ${key} key (${variant} base64)`, { cause });
  }
}

export type PriceErrorCode =
  | "empty_key"
  | "invalid_iv_length"
  | "invalid_price"
  | "wrong_encoded_length"
  | "base64_decode_failure"
  | "wrong_decoded_length"
  | "integrity_failure";

// Integrity failures never say whether the key or the data was wrong.
const INTEGRITY_MESSAGE = "price integrity is invalid";

export class PriceError extends Error {
  override readonly name = "PriceError" as const;

  /**
   * @param detail - internal diagnostic, safe for logs but never part of `message`
   *                 for integrity failures
   */
  constructor(
    public readonly code: PriceErrorCode,
    message: string,
    public readonly detail?: string
  ) {
    super(code === "integrity_failure" ? INTEGRITY_MESSAGE : message);
  }

  static integrity(detail: string): PriceError {
    return new PriceError("integrity_failure", INTEGRITY_MESSAGE, detail);
  }
}

/** Narrow an unknown error to a PriceError, optionally of a specific code */
export function isPriceError(err: unknown, code?: PriceErrorCode): err is PriceError {
  return err instanceof PriceError && (code === undefined || err.code === code);
}
