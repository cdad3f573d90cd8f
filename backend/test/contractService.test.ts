import * as assert from "assert";
import { computeContentHash, normalizeAddress } from "../services/contractService";
import { HttpError } from "../utils/httpError";

suite("Contract service", () => {
  test("content hash is the SHA-256 hex digest of the code", () => {
    assert.strictEqual(
      computeContentHash("abc"),
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  test("identical code maps to the same hash and any change does not", () => {
    const code = "pragma solidity ^0.8.0; contract A {}";
    assert.strictEqual(computeContentHash(code), computeContentHash(code));
    assert.notStrictEqual(computeContentHash(code), computeContentHash(`${code} `));
  });

  test("addresses are trimmed and lower-cased", () => {
    assert.strictEqual(
      normalizeAddress("  0x52908400098527886e0f7030069857d2e4169ee7 "),
      "0x52908400098527886e0f7030069857d2e4169ee7"
    );
  });

  test("malformed addresses are rejected as bad requests", () => {
    assert.throws(
      () => normalizeAddress("0x1234"),
      (error: unknown) =>
        error instanceof HttpError && error.statusCode === 400 && error.code === "invalid_address"
    );
  });
});
