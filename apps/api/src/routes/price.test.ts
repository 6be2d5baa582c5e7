/**
 * HTTP tests for the price routes.
 *
 * Requests go through app.inject(), so no port is opened.
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { loadConfig } from "../config.js";

const TEST_ENV = {
  PRICE_INTEGRITY_KEY: "arO23ykdNqUQ5LEoQ0FVmPkBd7xB5CO89PDZlSjpFxo=",
  PRICE_ENCRYPTION_KEY: "skU7Ax_NL5pPAFyKdkfZjZz2-VhIN8bjj1rVFOaJ_5o=",
  PRICE_KEY_ENCODING: "url",
  LOG_LEVEL: "silent",
};

// base64url of bytes 0..15
const SEQUENTIAL_IV = "AAECAwQFBgcICQoLDA0ODw";

describe("price routes", () => {
  let app: FastifyInstance;

  before(async () => {
    app = await buildApp(loadConfig(TEST_ENV));
  });

  after(async () => {
    await app.close();
  });

  it("should encrypt with a supplied iv", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/encrypt",
      payload: { price: "1900", iv: SEQUENTIAL_IV },
    });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { encrypted: "AAECAwQFBgcICQoLDA0OD-zub_WgSbwjWbtNbQ" });
  });

  it("should round-trip a price through encrypt and decrypt", async () => {
    const enc = await app.inject({
      method: "POST",
      url: "/price/encrypt",
      payload: { price: "18446744073709551615" },
    });
    assert.equal(enc.statusCode, 200);

    const { encrypted } = enc.json<{ encrypted: string }>();
    assert.equal(encrypted.length, 38);

    const dec = await app.inject({
      method: "POST",
      url: "/price/decrypt",
      payload: { encrypted },
    });
    assert.equal(dec.statusCode, 200);
    assert.deepEqual(dec.json(), { price: "18446744073709551615" });
  });

  it("should accept a numeric price", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/encrypt",
      payload: { price: 1900, iv: SEQUENTIAL_IV },
    });
    assert.equal(res.json<{ encrypted: string }>().encrypted, "AAECAwQFBgcICQoLDA0OD-zub_WgSbwjWbtNbQ");
  });

  it("should reject a missing price and a short iv", async () => {
    const noPrice = await app.inject({ method: "POST", url: "/price/encrypt", payload: {} });
    assert.equal(noPrice.statusCode, 400);
    assert.equal(noPrice.json<{ code: string }>().code, "invalid_request");

    const shortIv = await app.inject({
      method: "POST",
      url: "/price/encrypt",
      payload: { price: "1", iv: "AAEC" },
    });
    assert.equal(shortIv.statusCode, 400);
    assert.deepEqual(shortIv.json(), { error: "iv: expected 16 bytes, got 3 bytes", code: "invalid_iv" });
  });

  it("should reject prices above the unsigned 64-bit range", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/encrypt",
      payload: { price: "18446744073709551616" },
    });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json<{ code: string }>().code, "invalid_price");
  });

  it("should decrypt the reference value", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/decrypt",
      payload: { encrypted: "YWJjMTIzZGVmNDU2Z2hpN7fhCuPemCAWJRxOgA" },
    });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { price: "1900" });
  });

  it("should answer tampering with a generic 422", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/decrypt",
      payload: { encrypted: "YWJjMTIzZGVmNDU2Z2hpN7fhCuPemCAWJRxOlA" },
    });
    assert.equal(res.statusCode, 422);
    assert.deepEqual(res.json(), { error: "price integrity is invalid", code: "integrity_failure" });
  });

  it("should answer a wrong length with 400", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/price/decrypt",
      payload: { encrypted: "abc" },
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), {
      error: "encoded price must be 38 characters, got 3",
      code: "wrong_encoded_length",
    });
  });

  it("should report health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.deepEqual(res.json(), { status: "ok" });
  });
});

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({
      PRICE_INTEGRITY_KEY: TEST_ENV.PRICE_INTEGRITY_KEY,
      PRICE_ENCRYPTION_KEY: TEST_ENV.PRICE_ENCRYPTION_KEY,
    });
    assert.equal(config.port, 3001);
    assert.equal(config.host, "0.0.0.0");
    assert.equal(config.logLevel, "info");
    assert.equal(config.keys.integrityKey.length, 32);
  });

  it("should require both keys", () => {
    assert.throws(
      () => loadConfig({ PRICE_INTEGRITY_KEY: TEST_ENV.PRICE_INTEGRITY_KEY }),
      /PRICE_INTEGRITY_KEY and PRICE_ENCRYPTION_KEY environment variables are required/
    );
  });

  it("should reject an unknown key encoding", () => {
    assert.throws(
      () => loadConfig({ ...TEST_ENV, PRICE_KEY_ENCODING: "hex" }),
      /PRICE_KEY_ENCODING must be one of std, url, raw-std, raw-url, got "hex"/
    );
  });

  it("should surface key decode failures", () => {
    assert.throws(
      () => loadConfig({ ...TEST_ENV, PRICE_KEY_ENCODING: "std" }),
      { name: "KeyDecodeError", key: "encryption" }
    );
  });
});
