import { BreweryStatus } from "@taproom/core";

/** The span of unix seconds in which a lobby produces. */
export interface AccrualWindow {
  start: number;
  end: number;
}

/**
 * Advances a participant's brewery to a checkpoint. The end-of-game payout
 * and point awarding are not part of this contract.
 */
export interface AccrualPolicy {
  readonly name: string;
  checkpoint(status: BreweryStatus, now: number, window: AccrualWindow): BreweryStatus;
}

/**
 * Moves the checkpoint and nothing else: no mead is produced.
 */
export const checkpointOnlyAccrual: AccrualPolicy = {
  name: "checkpoint",
  checkpoint(status, now) {
    return { ...status, lastUpdatedAt: now };
  },
};

/**
 * Adds `meadPerSecond` for every second since the last checkpoint during
 * which the valve was open and the lobby was inside its window.
 */
export const linearAccrual: AccrualPolicy = {
  name: "linear",
  checkpoint(status, now, window) {
    let mead = status.mead;
    if (status.isValveOpened) {
      const from = Math.max(status.lastUpdatedAt, window.start);
      const to = Math.min(now, window.end);
      if (to > from) {
        mead += BigInt(to - from) * status.meadPerSecond;
      }
    }
    return { ...status, mead, lastUpdatedAt: now };
  },
};

const POLICIES: Record<string, AccrualPolicy> = {
  [checkpointOnlyAccrual.name]: checkpointOnlyAccrual,
  [linearAccrual.name]: linearAccrual,
};

export function getAccrualPolicy(name: string): AccrualPolicy {
  const policy = POLICIES[name];
  if (!policy) {
    throw new Error(
      `Unknown accrual policy "${name}" (expected one of: ${Object.keys(POLICIES).join(", ")})`
    );
  }
  return policy;
}
