import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/**
 * Hash an object using keccak256 after canonical encoding.
 */
export function hashState(state: unknown): string {
  const encoded = canonicalEncode(state);
  return keccak256(toUtf8Bytes(encoded));
}
