import { Request, Response } from "express";
import Redis from "ioredis";
import {
  AUTH_MESSAGE_MAX_AGE_MS,
  claimAuthSignature,
  isEvmAddress,
  normalizeAddress,
  validateAuth,
} from "@taproom/core";

/** Marks a signature as used; resolves false if it already was. */
export type ClaimSignature = (signature: string) => Promise<boolean>;

export function redisSignatureGuard(redis: Redis): ClaimSignature {
  return (signature) => claimAuthSignature(redis, signature);
}

/**
 * Process-local replay guard for the in-memory store. A signature is held for
 * twice the auth message window, after which its timestamp no longer validates.
 */
export function memorySignatureGuard(now: () => number = Date.now): ClaimSignature {
  const used = new Map<string, number>();
  return async (signature) => {
    const at = now();
    // Insertion order is expiry order.
    for (const [key, expiresAt] of used) {
      if (expiresAt > at) break;
      used.delete(key);
    }
    const key = signature.toLowerCase();
    if (used.has(key)) return false;
    used.set(key, at + 2 * AUTH_MESSAGE_MAX_AGE_MS);
    return true;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requestBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

/**
 * Validate address + signature + timestamp from the request body and burn the
 * signature. Returns the checksummed caller or null (after sending an error response).
 */
export async function requireAuth(
  req: Request,
  res: Response,
  claimSignature: ClaimSignature
): Promise<{ address: string } | null> {
  const { address, signature, timestamp } = requestBody(req);
  if (typeof address !== "string" || !address) {
    res.status(400).json({ error: "address required" });
    return null;
  }
  if (!isEvmAddress(address)) {
    res.status(400).json({ error: "address must be a valid EVM address (0x followed by 40 hex characters)" });
    return null;
  }
  if (typeof signature !== "string" || typeof timestamp !== "number") {
    res.status(400).json({ error: "signature and timestamp required for authentication" });
    return null;
  }
  if (!validateAuth(address, signature, timestamp)) {
    res.status(401).json({ error: "Invalid signature or expired timestamp" });
    return null;
  }
  if (!(await claimSignature(signature))) {
    res.status(401).json({ error: "Signature already used" });
    return null;
  }
  return { address: normalizeAddress(address) };
}

/**
 * Validate admin access via Authorization: Bearer <ADMIN_SECRET> header.
 * Returns true if authorized, false (after sending 401/403) otherwise.
 */
export function requireAdmin(req: Request, res: Response, adminSecret: string): boolean {
  if (!adminSecret) {
    res.status(403).json({ error: "Admin endpoints are not configured (ADMIN_SECRET not set)" });
    return false;
  }
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    res.status(401).json({ error: "Authorization header required (Bearer <ADMIN_SECRET>)" });
    return false;
  }
  const token = authHeader.slice(7);
  if (token !== adminSecret) {
    res.status(403).json({ error: "Invalid admin secret" });
    return false;
  }
  return true;
}
