import { strict as assert } from "assert";
import { Wallet } from "ethers";
import { EscrowErrorCode, isEscrowError } from "./errors";
import {
  AUTH_MESSAGE_MAX_AGE_MS,
  buildAuthMessage,
  normalizeAddress,
  normalizeAssetId,
  parseAmount,
  validateAuth,
} from "./validation";

const invalid = (err: unknown) => isEscrowError(err, EscrowErrorCode.INVALID_ARGUMENT);

describe("normalizeAddress", () => {
  it("should checksum any casing to the same address", () => {
    const lower = "0xabcdef0000000000000000000000000000000001";
    assert.equal(normalizeAddress(lower), normalizeAddress(lower.toUpperCase().replace("0X", "0x")));
  });

  it("should reject malformed addresses and name the field", () => {
    assert.throws(() => normalizeAddress("0x123"), invalid);
    assert.throws(() => normalizeAddress("not-an-address", "seller"), /seller must be a valid EVM address/);
  });
});

describe("parseAmount", () => {
  it("should accept decimal strings, safe integers and bigints", () => {
    assert.equal(parseAmount("123456789012345678901234567890"), 123456789012345678901234567890n);
    assert.equal(parseAmount(42), 42n);
    assert.equal(parseAmount(0n), 0n);
  });

  it("should reject negatives, fractions, leading zeros and other types", () => {
    for (const value of ["-1", "1.5", "01", "", 1.5, -3, -1n, null, {}]) {
      assert.throws(() => parseAmount(value), invalid);
    }
  });

  it("should canonicalise asset ids", () => {
    assert.equal(normalizeAssetId(17), "17");
    assert.throws(() => normalizeAssetId("0x11"), invalid);
  });
});

describe("validateAuth", () => {
  it("should accept a fresh signature from the claimed address", async () => {
    const wallet = Wallet.createRandom();
    const now = 1_700_000_000_000;
    const signature = await wallet.signMessage(buildAuthMessage(wallet.address, now));

    assert.equal(validateAuth(wallet.address, signature, now, now + 1000), true);
  });

  it("should reject a stale timestamp", async () => {
    const wallet = Wallet.createRandom();
    const now = 1_700_000_000_000;
    const signature = await wallet.signMessage(buildAuthMessage(wallet.address, now));

    assert.equal(validateAuth(wallet.address, signature, now, now + AUTH_MESSAGE_MAX_AGE_MS + 1), false);
  });

  it("should reject a signature made by someone else", async () => {
    const wallet = Wallet.createRandom();
    const other = Wallet.createRandom();
    const now = 1_700_000_000_000;
    const signature = await other.signMessage(buildAuthMessage(wallet.address, now));

    assert.equal(validateAuth(wallet.address, signature, now, now), false);
  });
});
