/**
 * Price routes for the Fastify API.
 *
 * POST /price/encrypt — Encrypt a price into the 38-character macro value
 * POST /price/decrypt — Decrypt a macro value back into its price
 *
 * Prices travel as decimal strings: an unsigned 64-bit value does not fit
 * a JSON number.
 *
 * Integrity failures answer with a generic message. The specific reason is
 * logged only.
 */

import type { Buffer } from "node:buffer";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  decryptPrice,
  encryptPrice,
  generateIv,
  isPriceError,
  validateBase64,
  IV_BYTES,
  type PriceKeys,
} from "@pricecodec/crypto";

// ----- Request schemas -----

interface EncryptBody {
  price?: unknown;
  iv?: unknown;
}

interface DecryptBody {
  encrypted?: unknown;
}

export interface PriceRoutesOptions {
  keys: PriceKeys;
}

/** Parse a non-negative integer given as a decimal string or a safe JSON number */
function parsePrice(value: unknown): bigint | undefined {
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  return undefined;
}

// ----- Route registration -----

export async function priceRoutes(app: FastifyInstance, opts: PriceRoutesOptions): Promise<void> {
  const { integrityKey, encryptionKey } = opts.keys;

  /**
   * POST /price/encrypt
   *
   * Accepts a price and an optional base64url iv (16 bytes).
   * A random iv is generated when none is supplied.
   */
  app.post<{ Body: EncryptBody | undefined }>(
    "/price/encrypt",
    async (request: FastifyRequest<{ Body: EncryptBody | undefined }>, reply: FastifyReply) => {
      const body = request.body ?? {};

      const price = parsePrice(body.price);
      if (price === undefined) {
        return reply
          .status(400)
          .send({ error: "price is required and must be a non-negative integer", code: "invalid_request" });
      }

      let iv: Buffer;
      if (body.iv === undefined) {
        iv = generateIv();
      } else if (typeof body.iv === "string") {
        try {
          iv = validateBase64(body.iv, "iv", "raw-url", IV_BYTES);
        } catch (err) {
          const message = err instanceof Error ? err.message : "iv is invalid";
          return reply.status(400).send({ error: message, code: "invalid_iv" });
        }
      } else {
        return reply.status(400).send({ error: "iv must be a base64url string", code: "invalid_request" });
      }

      try {
        const encrypted = encryptPrice(integrityKey, encryptionKey, iv, price);
        return reply.send({ encrypted });
      } catch (err) {
        if (isPriceError(err)) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    }
  );

  /**
   * POST /price/decrypt
   *
   * Accepts the encoded macro value and returns the price.
   * Failures are logged with context for audit; keys and the encoded value
   * are never logged.
   */
  app.post<{ Body: DecryptBody | undefined }>(
    "/price/decrypt",
    async (request: FastifyRequest<{ Body: DecryptBody | undefined }>, reply: FastifyReply) => {
      const encrypted = request.body?.encrypted;
      if (typeof encrypted !== "string") {
        return reply
          .status(400)
          .send({ error: "encrypted is required and must be a string", code: "invalid_request" });
      }

      try {
        const price = decryptPrice(integrityKey, encryptionKey, encrypted);
        return reply.send({ price: price.toString() });
      } catch (err) {
        if (!isPriceError(err)) {
          throw err;
        }

        request.log.warn(
          {
            event: "price_decrypt_failure",
            ip: request.ip,
            code: err.code,
            detail: err.detail,
          },
          "Price decryption failed"
        );

        const status = err.code === "integrity_failure" ? 422 : 400;
        return reply.status(status).send({ error: err.message, code: err.code });
      }
    }
  );
}
