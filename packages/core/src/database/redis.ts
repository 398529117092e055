import Redis from "ioredis";
import { getRedisUrl } from "./config";

/**
 * Factory: create a new Redis client from REDIS_URL env.
 * The caller owns the lifecycle (connect, quit).
 */
export function createRedisClient(): Redis {
  const url = getRedisUrl();
  const useTls = url.startsWith("rediss://");

  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    ...(useTls ? { tls: { rejectUnauthorized: false } } : {}),
  });
}

// --- Signed request replay guard ---

const AUTH_SIGNATURE_PREFIX = "authsig:";
const AUTH_SIGNATURE_TTL = 600; // twice the auth message window

/**
 * Record `signature` as used. Returns false if it was already used, so a
 * captured request cannot be submitted a second time inside its window.
 */
export async function claimAuthSignature(
  r: Redis,
  signature: string
): Promise<boolean> {
  const result = await r.set(
    AUTH_SIGNATURE_PREFIX + signature.toLowerCase(),
    "1",
    "EX",
    AUTH_SIGNATURE_TTL,
    "NX"
  );
  return result === "OK";
}
