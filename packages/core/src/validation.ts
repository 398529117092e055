import { verifyMessage, getAddress } from "ethers";
import { EscrowError, EscrowErrorCode } from "./errors";

const EVM_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const UINT_RE = /^(0|[1-9][0-9]*)$/;

/**
 * Returns true if `value` is a valid EVM address (0x followed by 40 hex chars).
 */
export function isEvmAddress(value: string): boolean {
  return EVM_ADDRESS_RE.test(value);
}

/**
 * Checksummed form of `value`. Every address the engines store or compare
 * goes through here so that case differences never split one account in two.
 */
export function normalizeAddress(value: string, field = "address"): string {
  if (!isEvmAddress(value)) {
    throw new EscrowError(
      EscrowErrorCode.INVALID_ARGUMENT,
      `${field} must be a valid EVM address (0x followed by 40 hex characters), got ${value}`
    );
  }
  return getAddress(value.toLowerCase());
}

/**
 * Parse a non-negative integer amount from its decimal representation.
 */
export function parseAmount(value: unknown, field = "amount"): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) {
      throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `${field} must not be negative`);
    }
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === "string" && UINT_RE.test(value)) {
    return BigInt(value);
  }
  throw new EscrowError(
    EscrowErrorCode.INVALID_ARGUMENT,
    `${field} must be a non-negative integer or decimal string`
  );
}

/**
 * Asset ids are token ids of arbitrary size, kept as canonical decimal strings.
 */
export function normalizeAssetId(value: unknown): string {
  return parseAmount(value, "assetId").toString();
}

/** Maximum age of a signed authentication message (5 minutes). */
export const AUTH_MESSAGE_MAX_AGE_MS = 5 * 60 * 1000;

/**
 * Build the canonical message that clients sign to prove ownership of an EVM address.
 * Both client and server must produce the same string for verification to succeed.
 */
export function buildAuthMessage(address: string, timestamp: number): string {
  return `taproom authentication for ${address} at ${timestamp}`;
}

/**
 * Verify that `signature` was produced by the private key controlling `claimedAddress`.
 * Uses ethers.verifyMessage (EIP-191 personal_sign) and compares checksummed addresses.
 */
export function verifySignature(
  claimedAddress: string,
  message: string,
  signature: string
): boolean {
  try {
    const recovered = verifyMessage(message, signature);
    return getAddress(recovered) === getAddress(claimedAddress);
  } catch {
    return false;
  }
}

/**
 * Validate a full authentication payload: checks timestamp freshness and signature validity.
 */
export function validateAuth(
  address: string,
  signature: string,
  timestamp: number,
  now: number = Date.now()
): boolean {
  if (Math.abs(now - timestamp) > AUTH_MESSAGE_MAX_AGE_MS) {
    return false;
  }
  const message = buildAuthMessage(address, timestamp);
  return verifySignature(address, message, signature);
}
