export * from "./types/order";
export * from "./types/lobby";
export * from "./types/events";
export * from "./errors";
export * from "./libs/fees";
export * from "./libs/pagination";
export * from "./libs/Encoding";
export * from "./libs/Crypto";

// Database layer
export * from "./database";

// Validation
export {
  isEvmAddress,
  normalizeAddress,
  parseAmount,
  normalizeAssetId,
  buildAuthMessage,
  verifySignature,
  validateAuth,
  AUTH_MESSAGE_MAX_AGE_MS,
} from "./validation";
