export type StoreKind = "postgres" | "memory";

function parseStore(value: string | undefined): StoreKind {
  const store = value || "postgres";
  if (store !== "postgres" && store !== "memory") {
    throw new Error(`STORE must be "postgres" or "memory", got "${store}"`);
  }
  return store;
}

export default {
  port: parseInt(process.env.PORT || "8080", 10),
  adminSecret: process.env.ADMIN_SECRET || "",

  /** Where orders, lobbies and custody live: Postgres, or process memory (dev only) */
  store: parseStore(process.env.STORE),

  // Custody and fees
  escrowAddress: process.env.ESCROW_ADDRESS || "0x0000000000000000000000000000000000000e5c",
  treasuryAddress: process.env.TREASURY_ADDRESS || "0x0000000000000000000000000000000000007ea5",
  rewardPoolAddress: process.env.REWARD_POOL_ADDRESS || "0x0000000000000000000000000000000000000f00",
  feeRateBps: BigInt(process.env.FEE_RATE_BPS || "500"), // 5% of the price
  treasuryFeeRateBps: BigInt(process.env.TREASURY_FEE_RATE_BPS || "3000"), // 30% of the fee

  // Lobby production
  accrualPolicy: process.env.ACCRUAL_POLICY || "checkpoint",
  defaultMeadPerSecond: BigInt(process.env.DEFAULT_MEAD_PER_SECOND || "0"),
};
