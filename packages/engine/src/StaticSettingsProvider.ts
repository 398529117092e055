import { assertBasisPoints, normalizeAddress } from "@taproom/core";
import { ISettingsProvider } from "./interfaces/ISettingsProvider";

export interface StaticSettings {
  feeRate: bigint;
  treasuryFeeRate: bigint;
  treasuryAddress: string;
  rewardPoolAddress: string;
}

/** Settings fixed at construction time. */
export class StaticSettingsProvider implements ISettingsProvider {
  private readonly settings: StaticSettings;

  constructor(settings: StaticSettings) {
    assertBasisPoints("feeRate", settings.feeRate);
    assertBasisPoints("treasuryFeeRate", settings.treasuryFeeRate);
    this.settings = {
      feeRate: settings.feeRate,
      treasuryFeeRate: settings.treasuryFeeRate,
      treasuryAddress: normalizeAddress(settings.treasuryAddress, "treasuryAddress"),
      rewardPoolAddress: normalizeAddress(settings.rewardPoolAddress, "rewardPoolAddress"),
    };
  }

  async feeRate(): Promise<bigint> {
    return this.settings.feeRate;
  }

  async treasuryFeeRate(): Promise<bigint> {
    return this.settings.treasuryFeeRate;
  }

  async treasuryAddress(): Promise<string> {
    return this.settings.treasuryAddress;
  }

  async rewardPoolAddress(): Promise<string> {
    return this.settings.rewardPoolAddress;
  }
}
