import {
  EscrowError,
  EscrowErrorCode,
  ensure,
  normalizeAddress,
  normalizeAssetId,
} from "@taproom/core";
import { IAssetRegistry } from "../interfaces/IAssetRegistry";
import { Checkpointable } from "./Checkpointable";

export interface RegistryConnectOptions {
  /** Skip operator approval checks: the operator already holds every asset in trust. */
  custodial?: boolean;
}

/**
 * Unique assets with ERC-721 style operator approvals.
 */
export class InMemoryAssetRegistry implements Checkpointable {
  private owners = new Map<string, string>();
  private approvals = new Set<string>();

  mint(to: string, assetId: string): void {
    const asset = normalizeAssetId(assetId);
    ensure(
      !this.owners.has(asset),
      EscrowErrorCode.ALREADY_IN_STATE,
      `Asset ${asset} already exists`
    );
    this.owners.set(asset, normalizeAddress(to, "to"));
  }

  ownerOf(assetId: string): string {
    const asset = normalizeAssetId(assetId);
    const owner = this.owners.get(asset);
    if (!owner) {
      throw new EscrowError(EscrowErrorCode.NOT_FOUND, `Asset ${asset} does not exist`);
    }
    return owner;
  }

  setApprovalForAll(owner: string, operator: string, approved: boolean): void {
    const key = approvalKey(owner, operator);
    if (approved) {
      this.approvals.add(key);
    } else {
      this.approvals.delete(key);
    }
  }

  isApprovedForAll(owner: string, operator: string): boolean {
    return this.approvals.has(approvalKey(owner, operator));
  }

  /** The registry as seen by `operator`, typically the escrow account. */
  connect(operator: string, opts: RegistryConnectOptions = {}): IAssetRegistry {
    const self = normalizeAddress(operator, "operator");
    return {
      ownerOf: async (assetId) => this.ownerOf(assetId),
      transferCustody: async (from, to, assetId) => {
        const asset = normalizeAssetId(assetId);
        const source = normalizeAddress(from, "from");
        ensure(
          this.ownerOf(asset) === source,
          EscrowErrorCode.UNAUTHORIZED,
          `Asset ${asset} is not owned by ${source}`
        );
        ensure(
          opts.custodial === true || source === self || this.isApprovedForAll(source, self),
          EscrowErrorCode.UNAUTHORIZED,
          `${self} is not approved to move assets of ${source}`
        );
        this.owners.set(asset, normalizeAddress(to, "to"));
      },
    };
  }

  checkpoint(): () => void {
    const owners = new Map(this.owners);
    const approvals = new Set(this.approvals);
    return () => {
      this.owners = owners;
      this.approvals = approvals;
    };
  }
}

function approvalKey(owner: string, operator: string): string {
  return `${normalizeAddress(owner, "owner")}:${normalizeAddress(operator, "operator")}`;
}
