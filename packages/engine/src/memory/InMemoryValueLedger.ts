import { EscrowError, EscrowErrorCode, normalizeAddress } from "@taproom/core";
import { IValueLedger } from "../interfaces/IValueLedger";
import { Checkpointable } from "./Checkpointable";

export interface LedgerConnectOptions {
  /** Skip allowance checks: the operator already holds every account in trust. */
  custodial?: boolean;
}

/**
 * Fungible balances with ERC-20 style allowances.
 */
export class InMemoryValueLedger implements Checkpointable {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();

  mint(to: string, amount: bigint): void {
    assertAmount(amount);
    const account = normalizeAddress(to, "to");
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(address: string): bigint {
    return this.balances.get(normalizeAddress(address)) ?? 0n;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    assertAmount(amount);
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /** The ledger as seen by `operator`, typically the escrow account. */
  connect(operator: string, opts: LedgerConnectOptions = {}): IValueLedger {
    const self = normalizeAddress(operator, "operator");
    return {
      transfer: async (to, amount) => {
        this.move(self, to, amount);
      },
      transferFrom: async (from, to, amount) => {
        if (!opts.custodial) {
          this.spendAllowance(from, self, amount);
        }
        this.move(from, to, amount);
      },
    };
  }

  checkpoint(): () => void {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  private spendAllowance(owner: string, spender: string, amount: bigint): void {
    const key = allowanceKey(owner, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new EscrowError(
        EscrowErrorCode.INSUFFICIENT_FUNDS,
        `Allowance of ${spender} over ${owner} is ${allowed}, needs ${amount}`
      );
    }
    this.allowances.set(key, allowed - amount);
  }

  private move(from: string, to: string, amount: bigint): void {
    assertAmount(amount);
    const source = normalizeAddress(from, "from");
    const target = normalizeAddress(to, "to");
    const balance = this.balanceOf(source);
    if (balance < amount) {
      throw new EscrowError(
        EscrowErrorCode.INSUFFICIENT_FUNDS,
        `Balance of ${source} is ${balance}, needs ${amount}`
      );
    }
    this.balances.set(source, balance - amount);
    this.balances.set(target, this.balanceOf(target) + amount);
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${normalizeAddress(owner, "owner")}:${normalizeAddress(spender, "spender")}`;
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `amount must not be negative, got ${amount}`);
  }
}
