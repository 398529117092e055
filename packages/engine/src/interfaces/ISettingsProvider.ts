export interface ISettingsProvider {
  /** Sale tax, in basis points of the price */
  feeRate(): Promise<bigint>;
  /** Treasury share, in basis points of the tax */
  treasuryFeeRate(): Promise<bigint>;
  treasuryAddress(): Promise<string>;
  rewardPoolAddress(): Promise<string>;
}
