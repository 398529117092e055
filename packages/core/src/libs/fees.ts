import { EscrowError, EscrowErrorCode } from "../errors";
import { SaleSplit } from "../types/order";

/** 10000 basis points = 100% */
export const BASIS_POINTS = 10_000n;

export function assertBasisPoints(name: string, value: bigint): void {
  if (value < 0n || value > BASIS_POINTS) {
    throw new EscrowError(
      EscrowErrorCode.INVALID_ARGUMENT,
      `${name} must be between 0 and ${BASIS_POINTS} basis points, got ${value}`
    );
  }
}

/**
 * Split a sale price between seller, treasury and reward pool.
 * Both percentages truncate toward zero; the reward pool takes whatever the
 * treasury share leaves of the tax and the seller takes the rest of the price.
 */
export function splitSale(
  price: bigint,
  feeRate: bigint,
  treasuryFeeRate: bigint
): SaleSplit {
  if (price < 0n) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `price must not be negative, got ${price}`);
  }
  assertBasisPoints("feeRate", feeRate);
  assertBasisPoints("treasuryFeeRate", treasuryFeeRate);

  const tax = (price * feeRate) / BASIS_POINTS;
  const treasuryAmount = (tax * treasuryFeeRate) / BASIS_POINTS;

  return {
    price,
    tax,
    treasuryAmount,
    rewardPoolAmount: tax - treasuryAmount,
    sellerAmount: price - tax,
  };
}
