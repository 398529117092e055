/**
 * Ownership of unique assets, as seen from the escrow's own account.
 */
export interface IAssetRegistry {
  /** Current owner of `assetId`; throws if the asset does not exist. */
  ownerOf(assetId: string): Promise<string>;

  /**
   * Move `assetId` from `from` to `to` on the escrow's authority.
   * Fails unless `from` owns the asset and has authorised the escrow.
   */
  transferCustody(from: string, to: string, assetId: string): Promise<void>;
}
