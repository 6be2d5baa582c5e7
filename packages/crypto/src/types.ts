/**
 * Shared types for the price codec.
 *
 * Wire frame (28 bytes):
 *   {initialization_vector (16)}{masked_price (8)}{integrity_tag (4)}
 */
import type { Buffer } from "node:buffer";

/**
 * Base64 flavours a key-bearing party may use for its key material.
 *   std     — `+/` alphabet, `=` padded
 *   url     — `-_` alphabet, `=` padded
 *   raw-std — `+/` alphabet, no padding
 *   raw-url — `-_` alphabet, no padding
 */
export type Base64Variant = "std" | "url" | "raw-std" | "raw-url";

export const BASE64_VARIANTS: readonly Base64Variant[] = ["std", "url", "raw-std", "raw-url"];

/** Decoded key pair. Both buffers are used only as HMAC keys. */
export interface PriceKeys {
  integrityKey: Buffer;
  encryptionKey: Buffer;
}

/** The three fields of a decoded wire frame */
export interface PriceFrame {
  iv: Buffer;
  masked: Buffer;
  tag: Buffer;
}
