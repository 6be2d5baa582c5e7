/**
 * Strict base64 validation and decoding.
 *
 * Buffer.from(..., "base64") silently skips characters outside the alphabet,
 * so every value is checked against the exact variant before it is decoded.
 */
import { Buffer } from "node:buffer";
import type { Base64Variant } from "./types.js";

const STD_PADDED = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const URL_PADDED = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;
const STD_RAW = /^[A-Za-z0-9+/]*$/;
const URL_RAW = /^[A-Za-z0-9_-]*$/;

function isValidBase64(value: string, variant: Base64Variant): boolean {
  switch (variant) {
    case "std":
      return STD_PADDED.test(value);
    case "url":
      return URL_PADDED.test(value);
    case "raw-std":
      return STD_RAW.test(value) && value.length % 4 !== 1;
    case "raw-url":
      return URL_RAW.test(value) && value.length % 4 !== 1;
  }
}

/**
 * Validates that a string is base64 in exactly the given variant and optionally
 * checks the decoded byte length.
 * @throws Error if the string is not valid for the variant or has the wrong length.
 */
export function validateBase64(
  value: string,
  label: string,
  variant: Base64Variant,
  expectedBytes?: number
): Buffer {
  if (!isValidBase64(value, variant)) {
    throw new Error(`${label}: invalid ${variant} base64 encoding`);
  }

  const urlSafe = variant === "url" || variant === "raw-url";
  const buf = Buffer.from(value, urlSafe ? "base64url" : "base64");

  if (expectedBytes !== undefined && buf.length !== expectedBytes) {
    throw new Error(`${label}: expected ${expectedBytes} bytes, got ${buf.length} bytes`);
  }

  return buf;
}
