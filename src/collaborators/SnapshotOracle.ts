import { keccak256 } from "ethers";
import { BurnReading, OracleConfig, OracleReader } from "./types";

export interface OracleValues {
  mintPrice: bigint; // BASE_18
  burnPrice: bigint; // BASE_18
  deviation: bigint; // BASE_18
}

/**
 * Oracle stand-in answering from prices captured at a point in time, keyed
 * by the hash of each collateral's oracle config.
 */
export class SnapshotOracle implements OracleReader {
  private readonly values = new Map<string, OracleValues | null>();

  static configHash(config: OracleConfig): string {
    return keccak256(config);
  }

  set(config: OracleConfig, values: OracleValues): void {
    this.values.set(SnapshotOracle.configHash(config), { ...values });
  }

  // subsequent reads for this config throw, like a stale or reverting feed
  setUnavailable(config: OracleConfig): void {
    this.values.set(SnapshotOracle.configHash(config), null);
  }

  private get(config: OracleConfig): OracleValues {
    const values = this.values.get(SnapshotOracle.configHash(config));
    if (values === undefined) throw new Error(`SnapshotOracle: no reading for config ${config}`);
    if (values === null) throw new Error(`SnapshotOracle: feed unavailable for config ${config}`);
    return values;
  }

  readMint(config: OracleConfig): bigint {
    return this.get(config).mintPrice;
  }

  readBurn(config: OracleConfig): BurnReading {
    const v = this.get(config);
    return { price: v.burnPrice, deviation: v.deviation };
  }
}
