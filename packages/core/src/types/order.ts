export enum OrderStatus {
  ACTIVE = "active",
  CANCELED = "canceled",
  SOLD = "sold",
}

export interface Order {
  id: number;
  status: OrderStatus;
  assetId: string;
  seller: string;
  /** Set if and only if the order is sold */
  buyer: string | null;
  price: bigint;
}

export type OrderIndexKind = "owned" | "bought";

/**
 * Breakdown of a sale. `sellerAmount + treasuryAmount + rewardPoolAmount`
 * always equals `price`.
 */
export interface SaleSplit {
  price: bigint;
  tax: bigint;
  treasuryAmount: bigint;
  rewardPoolAmount: bigint;
  sellerAmount: bigint;
}
