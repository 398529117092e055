import {
  EscrowError,
  EscrowErrorCode,
  Executor,
  creditBalance,
  debitBalance,
  findAssetOwner,
  moveAsset,
  normalizeAddress,
  normalizeAssetId,
} from "@taproom/core";
import { IAssetRegistry, IValueLedger } from "@taproom/engine";

/**
 * Balances held in trust in the `balances` table. Every account is already
 * in the exchange's custody, so there are no allowances to check.
 */
export class PostgresCustodialLedger implements IValueLedger {
  constructor(
    private readonly escrowAddress: string,
    private readonly executor: Executor
  ) {}

  async transfer(to: string, amount: bigint): Promise<void> {
    await this.transferFrom(this.escrowAddress, to, amount);
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<void> {
    const source = normalizeAddress(from, "from");
    const target = normalizeAddress(to, "to");
    if (amount < 0n) {
      throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `amount must not be negative, got ${amount}`);
    }
    if (!(await debitBalance(source, amount, this.executor))) {
      throw new EscrowError(EscrowErrorCode.INSUFFICIENT_FUNDS, `Balance of ${source} cannot cover ${amount}`);
    }
    await creditBalance(target, amount, this.executor);
  }
}

/** Asset ownership held in trust in the `assets` table. */
export class PostgresCustodialRegistry implements IAssetRegistry {
  constructor(private readonly executor: Executor) {}

  async ownerOf(assetId: string): Promise<string> {
    const asset = normalizeAssetId(assetId);
    const owner = await findAssetOwner(asset, this.executor);
    if (!owner) {
      throw new EscrowError(EscrowErrorCode.NOT_FOUND, `Asset ${asset} does not exist`);
    }
    return owner;
  }

  async transferCustody(from: string, to: string, assetId: string): Promise<void> {
    const asset = normalizeAssetId(assetId);
    const source = normalizeAddress(from, "from");
    const moved = await moveAsset(asset, source, normalizeAddress(to, "to"), this.executor);
    if (!moved) {
      throw new EscrowError(EscrowErrorCode.UNAUTHORIZED, `Asset ${asset} is not owned by ${source}`);
    }
  }
}
