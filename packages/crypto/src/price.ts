/**
 * RTB Price Encryption (HMAC-SHA1 pad + truncated HMAC-SHA1 tag)
 * ================================================================
 *
 * Exchanges send the winning price in a macro so it can travel through the
 * browser without being readable or forgeable. The scheme:
 *
 * Encoding:
 *   pad       = HMAC-SHA1(encryption_key, iv)
 *   masked    = price_be64 XOR pad[0:8]
 *   tag       = HMAC-SHA1(integrity_key, price_be64 ‖ iv)[0:4]
 *   message   = iv ‖ masked ‖ tag                     (28 bytes)
 *   transport = base64url(message), no padding        (38 chars)
 *
 * Decoding reverses it, unmasks with the same pad, and recomputes the tag
 * over the recovered price bytes.
 *
 * Only the first 8 bytes of the 20-byte pad are used and the tag is cut to
 * 4 bytes. Both truncations belong to the wire protocol and must not change.
 */

import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { Buffer } from "node:buffer";
import { PriceError } from "./errors.js";
import type { PriceFrame } from "./types.js";
import { validateBase64 } from "./utils.js";

// ----- Constants -----

const HMAC_ALGORITHM = "sha1" as const;
export const IV_BYTES = 16;
export const PRICE_BYTES = 8;
export const TAG_BYTES = 4;
export const FRAME_BYTES = IV_BYTES + PRICE_BYTES + TAG_BYTES; // 28
export const ENCODED_LENGTH = 38; // ceil(28 * 4 / 3), unpadded

const MAX_PRICE = (1n << 64n) - 1n;

// ----- Building blocks -----

/**
 * Generate a fresh random initialization vector.
 * Reusing an iv under the same encryption key reuses the pad.
 */
export function generateIv(): Buffer {
  return randomBytes(IV_BYTES);
}

/** HMAC-SHA1 of the iv under the encryption key (20 bytes; callers use the first 8). */
export function derivePad(encryptionKey: Uint8Array, iv: Uint8Array): Buffer {
  return createHmac(HMAC_ALGORITHM, encryptionKey).update(iv).digest();
}

/**
 * XOR 8 price bytes with the first 8 bytes of the pad.
 * Masking and unmasking are the same operation.
 *
 * @throws PriceError(integrity_failure) if the operands are narrower than the price field
 */
export function maskPrice(priceBytes: Uint8Array, pad: Uint8Array): Buffer {
  if (priceBytes.length !== PRICE_BYTES || pad.length < PRICE_BYTES) {
    throw PriceError.integrity(
      `mask operands too short: price=${priceBytes.length} pad=${pad.length}`
    );
  }

  const out = Buffer.alloc(PRICE_BYTES);
  for (let i = 0; i < PRICE_BYTES; i++) {
    out[i] = priceBytes[i] ^ pad[i];
  }
  return out;
}

/** First 4 bytes of HMAC-SHA1(integrityKey, priceBytes ‖ iv). Order matters. */
export function computeTag(
  integrityKey: Uint8Array,
  priceBytes: Uint8Array,
  iv: Uint8Array
): Buffer {
  return createHmac(HMAC_ALGORITHM, integrityKey)
    .update(priceBytes)
    .update(iv)
    .digest()
    .subarray(0, TAG_BYTES);
}

/**
 * Recompute the tag and compare it to the received one in constant time.
 * @throws PriceError(integrity_failure) on mismatch
 */
export function verifyTag(
  integrityKey: Uint8Array,
  priceBytes: Uint8Array,
  iv: Uint8Array,
  tag: Uint8Array
): void {
  const expected = computeTag(integrityKey, priceBytes, iv);
  if (tag.length !== TAG_BYTES || !timingSafeEqual(expected, tag)) {
    throw PriceError.integrity("tag mismatch");
  }
}

function requireKeys(integrityKey: Uint8Array, encryptionKey: Uint8Array): void {
  if (integrityKey.length === 0 || encryptionKey.length === 0) {
    throw new PriceError("empty_key", "encryption and integrity keys are required");
  }
}

/** Split a 28-byte message into its fields. */
function splitFrame(message: Buffer): PriceFrame {
  return {
    iv: message.subarray(0, IV_BYTES),
    masked: message.subarray(IV_BYTES, IV_BYTES + PRICE_BYTES),
    tag: message.subarray(IV_BYTES + PRICE_BYTES, FRAME_BYTES),
  };
}

// ----- Public API -----

/**
 * Encrypt a price for the wire.
 *
 * @param iv    - 16 bytes, random in production (see generateIv)
 * @param price - unsigned 64-bit price
 * @returns the 38-character unpadded base64url string
 * @throws PriceError with code empty_key, invalid_iv_length or invalid_price
 */
export function encryptPrice(
  integrityKey: Uint8Array,
  encryptionKey: Uint8Array,
  iv: Uint8Array,
  price: bigint
): string {
  requireKeys(integrityKey, encryptionKey);

  if (iv.length !== IV_BYTES) {
    throw new PriceError(
      "invalid_iv_length",
      `initialization vector must be ${IV_BYTES} bytes, got ${iv.length}`
    );
  }

  if (price < 0n || price > MAX_PRICE) {
    throw new PriceError("invalid_price", `price ${price} is outside the unsigned 64-bit range`);
  }

  const priceBytes = Buffer.alloc(PRICE_BYTES);
  priceBytes.writeBigUInt64BE(price);

  const pad = derivePad(encryptionKey, iv);
  const masked = maskPrice(priceBytes, pad);
  const tag = computeTag(integrityKey, priceBytes, iv);

  return Buffer.concat([iv, masked, tag]).toString("base64url");
}

/**
 * Decrypt a price taken from the wire.
 *
 * Steps:
 *   1. Gate on key presence and the 38-character length
 *   2. Strictly decode unpadded base64url into the 28-byte message
 *   3. Split into iv, masked price and tag
 *   4. Unmask with the pad derived from the iv
 *   5. Verify the tag over the recovered price bytes and the iv
 *
 * @returns the price as an unsigned 64-bit bigint
 * @throws PriceError with code empty_key, wrong_encoded_length, base64_decode_failure,
 *         wrong_decoded_length or integrity_failure
 */
export function decryptPrice(
  integrityKey: Uint8Array,
  encryptionKey: Uint8Array,
  encoded: string
): bigint {
  requireKeys(integrityKey, encryptionKey);

  if (encoded.length !== ENCODED_LENGTH) {
    throw new PriceError(
      "wrong_encoded_length",
      `encoded price must be ${ENCODED_LENGTH} characters, got ${encoded.length}`
    );
  }

  let message: Buffer;
  try {
    message = validateBase64(encoded, "encoded price", "raw-url");
  } catch (err) {
    throw new PriceError(
      "base64_decode_failure",
      err instanceof Error ? err.message : "encoded price is not valid base64"
    );
  }

  if (message.length !== FRAME_BYTES) {
    throw new PriceError(
      "wrong_decoded_length",
      `decoded price must be ${FRAME_BYTES} bytes, got ${message.length}`
    );
  }

  const { iv, masked, tag } = splitFrame(message);
  const priceBytes = maskPrice(masked, derivePad(encryptionKey, iv));
  verifyTag(integrityKey, priceBytes, iv, tag);

  return priceBytes.readBigUInt64BE(0);
}
