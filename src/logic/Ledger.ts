import { getAddress } from "ethers";
import Constants from "../lib/Constants";
import Helpers from "../lib/Helpers";
import { SwapperError } from "../lib/Errors";
import { createLogger, swapLog } from "../lib/Logger";
import { ManagerConfig, ManagerGateway, OracleConfig, OracleStorage } from "../collaborators/types";
import { ExposureState, FeeCurve } from "./ExposureCurve";

export type SwapAction = "mint" | "burn";

export interface CollateralRecord {
  decimals: number;          // 0 means not registered
  normalizedStables: bigint;
  oracleConfig: OracleConfig;
  oracleStorage: OracleStorage;
  xFeeMint: bigint[];
  yFeeMint: bigint[];
  xFeeBurn: bigint[];
  yFeeBurn: bigint[];
  isMintLive: boolean;
  isBurnLive: boolean;
  isManaged: boolean;
  managerConfig: ManagerConfig;
}

export interface LedgerSnapshot {
  normalizedStables: bigint;
  normalizer: bigint;
  collateralList: string[];
  collaterals: Map<string, CollateralRecord>;
  trusted: Set<string>;
  sellerTrusted: Set<string>;
}

function copyRecord(r: CollateralRecord): CollateralRecord {
  return {
    ...r,
    xFeeMint: r.xFeeMint.slice(),
    yFeeMint: r.yFeeMint.slice(),
    xFeeBurn: r.xFeeBurn.slice(),
    yFeeBurn: r.yFeeBurn.slice(),
  };
}

function copyCollaterals(src: Map<string, CollateralRecord>): Map<string, CollateralRecord> {
  const out = new Map<string, CollateralRecord>();
  for (const [asset, record] of src) out.set(asset, copyRecord(record));
  return out;
}

/**
 * Global issuance ledger: the two normalized counters, the normalizer that
 * scales them and one record per registered collateral. Settlement mutates it
 * only through `recordMint` / `recordBurn`, which move both counters by the
 * same delta.
 */
export class Ledger {
  public readonly stablecoin: string;
  public normalizedStables = 0n;
  public normalizer: bigint = Constants.BASE_27;
  public collateralList: string[] = [];
  public collaterals = new Map<string, CollateralRecord>();
  public trusted = new Set<string>();
  public sellerTrusted = new Set<string>();

  private readonly log = createLogger("ledger");

  constructor(stablecoin: string) {
    this.stablecoin = getAddress(stablecoin);
  }

  // ---------- snapshot/restore ----------
  snapshot(): LedgerSnapshot {
    return {
      normalizedStables: this.normalizedStables,
      normalizer: this.normalizer,
      collateralList: this.collateralList.slice(),
      collaterals: copyCollaterals(this.collaterals),
      trusted: new Set(this.trusted),
      sellerTrusted: new Set(this.sellerTrusted),
    };
  }

  restore(s: LedgerSnapshot): void {
    this.normalizedStables = s.normalizedStables;
    this.normalizer = s.normalizer;
    this.collateralList = s.collateralList.slice();
    this.collaterals = copyCollaterals(s.collaterals);
    this.trusted = new Set(s.trusted);
    this.sellerTrusted = new Set(s.sellerTrusted);
  }

  clone(): Ledger {
    const copy = new Ledger(this.stablecoin);
    copy.restore(this.snapshot());
    return copy;
  }

  // ---------- reads ----------
  isCollateral(asset: string): boolean {
    return (this.collaterals.get(getAddress(asset))?.decimals ?? 0) > 0;
  }

  getCollateral(asset: string): CollateralRecord {
    const record = this.collaterals.get(getAddress(asset));
    if (!record || record.decimals === 0) throw new SwapperError("NotCollateral", asset);
    return record;
  }

  getCollateralList(): string[] {
    return this.collateralList.slice();
  }

  curve(asset: string, action: SwapAction): FeeCurve {
    const r = this.getCollateral(asset);
    return action === "mint" ? { xFee: r.xFeeMint, yFee: r.yFeeMint } : { xFee: r.xFeeBurn, yFee: r.yFeeBurn };
  }

  exposureState(asset: string): ExposureState {
    return {
      collateralNormalized: this.getCollateral(asset).normalizedStables,
      totalNormalized: this.normalizedStables,
      normalizer: this.normalizer,
    };
  }

  /** Collateral share of the supply, BASE_9. Zero before the first mint. */
  getExposure(asset: string): bigint {
    const { collateralNormalized } = this.exposureState(asset);
    if (this.normalizedStables === 0n) return 0n;
    return (collateralNormalized * Constants.BASE_9) / this.normalizedStables;
  }

  getIssuedByCollateral(asset: string): { stablecoinsFromCollateral: bigint; stablecoinsIssued: bigint } {
    const record = this.getCollateral(asset);
    return {
      stablecoinsFromCollateral: (record.normalizedStables * this.normalizer) / Constants.BASE_27,
      stablecoinsIssued: this.getTotalIssued(),
    };
  }

  getTotalIssued(): bigint {
    return (this.normalizedStables * this.normalizer) / Constants.BASE_27;
  }

  isPaused(asset: string, action: SwapAction): boolean {
    const record = this.getCollateral(asset);
    return action === "mint" ? !record.isMintLive : !record.isBurnLive;
  }

  toNormalized(stableAmount: bigint): bigint {
    return (stableAmount * Constants.BASE_27) / this.normalizer;
  }

  // ---------- settlement ----------
  recordMint(asset: string, stableAmount: bigint): bigint {
    const record = this.getCollateral(asset);
    const delta = this.toNormalized(stableAmount);
    const collateralNext = Helpers.toUint128(record.normalizedStables + delta, "collateral normalizedStables");
    const totalNext = Helpers.toUint128(this.normalizedStables + delta, "normalizedStables");
    record.normalizedStables = collateralNext;
    this.normalizedStables = totalNext;
    return delta;
  }

  recordBurn(asset: string, stableAmount: bigint): bigint {
    const record = this.getCollateral(asset);
    const delta = this.toNormalized(stableAmount);
    const collateralNext = Helpers.checkedSub(record.normalizedStables, delta, "collateral normalizedStables");
    const totalNext = Helpers.checkedSub(this.normalizedStables, delta, "normalizedStables");
    record.normalizedStables = collateralNext;
    this.normalizedStables = totalNext;
    return delta;
  }

  // ---------- admin surface ----------
  /**
   * Registers a collateral. New collaterals start paused in both directions
   * and without fee curves.
   */
  addCollateral(asset: string, decimals: number, oracleConfig: OracleConfig = "0x", oracleStorage: OracleStorage = "0x"): void {
    const a = getAddress(asset);
    if (this.isCollateral(a)) throw new SwapperError("AlreadyAdded", a);
    if (!Number.isInteger(decimals) || decimals <= 0 || decimals > 36) {
      throw new SwapperError("InvalidParams", `decimals ${decimals}`);
    }
    this.collaterals.set(a, {
      decimals,
      normalizedStables: 0n,
      oracleConfig,
      oracleStorage,
      xFeeMint: [],
      yFeeMint: [],
      xFeeBurn: [],
      yFeeBurn: [],
      isMintLive: false,
      isBurnLive: false,
      isManaged: false,
      managerConfig: "0x",
    });
    this.collateralList.push(a);
    swapLog.adminChange(this.log, "addCollateral", { collateral: a, decimals });
  }

  /**
   * Removes a collateral that no longer backs any stablecoin. The list is
   * compacted by moving the last entry into the freed slot.
   */
  revokeCollateral(asset: string, manager?: ManagerGateway): void {
    const record = this.getCollateral(asset);
    const a = getAddress(asset);
    if (record.normalizedStables !== 0n) throw new SwapperError("CollateralBacked", a);
    if (record.isManaged) {
      if (!manager) throw new SwapperError("InvalidParams", "managed collateral needs a manager to revoke");
      manager.pullAll(a, record.managerConfig);
    }

    const index = this.collateralList.indexOf(a);
    const last = this.collateralList.length - 1;
    this.collateralList[index] = this.collateralList[last];
    this.collateralList.pop();
    this.collaterals.delete(a);
    swapLog.adminChange(this.log, "revokeCollateral", { collateral: a });
  }

  setFees(asset: string, xFee: readonly bigint[], yFee: readonly bigint[], action: SwapAction): void {
    const record = this.getCollateral(asset);
    Ledger.checkFees(xFee, yFee, action);
    if (action === "mint") {
      record.xFeeMint = xFee.slice();
      record.yFeeMint = yFee.slice();
    } else {
      record.xFeeBurn = xFee.slice();
      record.yFeeBurn = yFee.slice();
    }
    swapLog.adminChange(this.log, "setFees", { collateral: getAddress(asset), action, breakpoints: xFee.length });
  }

  /**
   * Mint curves start at exposure 0 and stay below 1 except for a last
   * breakpoint at 1; burn curves start at 1 and stay at or above 0. Fees
   * rise along the walk and keep both `1 - fee` and `1 + fee` positive.
   */
  static checkFees(xFee: readonly bigint[], yFee: readonly bigint[], action: SwapAction): void {
    const n = xFee.length;
    Helpers.assert(n > 0 && n === yFee.length, "fee arrays must be non-empty and of equal length");

    const mint = action === "mint";
    Helpers.assert(xFee[0] === (mint ? 0n : Constants.BASE_9), `first ${action} breakpoint must be ${mint ? "0" : "BASE_9"}`);

    for (let i = 0; i < n; i++) {
      const x = xFee[i];
      const y = yFee[i];
      if (mint) {
        Helpers.assert(x >= 0n && x <= Constants.BASE_9, `mint exposure ${x} out of [0, 1]`);
        Helpers.assert(x < Constants.BASE_9 || i === n - 1, "only the last mint breakpoint may sit at BASE_9");
      }
      else Helpers.assert(x >= 0n && x <= Constants.BASE_9, `burn exposure ${x} out of [0, 1]`);
      if (y <= -Constants.BASE_9 || y >= Constants.BASE_9) throw new SwapperError("InvalidRate", `fee ${y} outside (-1, 1)`);

      if (i > 0) {
        Helpers.assert(mint ? x >= xFee[i - 1] : x <= xFee[i - 1], `${action} exposures out of order at ${i}`);
        Helpers.assert(y >= yFee[i - 1], `${action} fees must not decrease at ${i}`);
      }
    }
  }

  togglePause(asset: string, action: SwapAction): boolean {
    const record = this.getCollateral(asset);
    if (action === "mint") {
      if (!record.isMintLive && record.xFeeMint.length === 0) throw new SwapperError("InvalidParams", "mint fees not set");
      record.isMintLive = !record.isMintLive;
    } else {
      if (!record.isBurnLive && record.xFeeBurn.length === 0) throw new SwapperError("InvalidParams", "burn fees not set");
      record.isBurnLive = !record.isBurnLive;
    }
    const paused = this.isPaused(asset, action);
    swapLog.adminChange(this.log, "togglePause", { collateral: getAddress(asset), action, paused });
    return paused;
  }

  setOracle(asset: string, oracleConfig: OracleConfig, oracleStorage: OracleStorage = "0x"): void {
    const record = this.getCollateral(asset);
    record.oracleConfig = oracleConfig;
    record.oracleStorage = oracleStorage;
    swapLog.adminChange(this.log, "setOracle", { collateral: getAddress(asset) });
  }

  /**
   * Attaches (`managerConfig` set) or detaches (`null`) a manager. Detaching
   * pulls every deployed unit back first.
   */
  setCollateralManager(asset: string, managerConfig: ManagerConfig | null, manager: ManagerGateway): void {
    const record = this.getCollateral(asset);
    const a = getAddress(asset);
    if (record.isManaged) manager.pullAll(a, record.managerConfig);
    record.isManaged = managerConfig !== null;
    record.managerConfig = managerConfig ?? "0x";
    swapLog.adminChange(this.log, "setCollateralManager", { collateral: a, managed: record.isManaged });
  }

  adjustStablecoins(asset: string, amount: bigint, increase: boolean): void {
    const record = this.getCollateral(asset);
    const delta = this.toNormalized(amount);
    if (increase) {
      const collateralNext = Helpers.toUint128(record.normalizedStables + delta, "collateral normalizedStables");
      this.normalizedStables = Helpers.toUint128(this.normalizedStables + delta, "normalizedStables");
      record.normalizedStables = collateralNext;
    } else {
      const collateralNext = Helpers.checkedSub(record.normalizedStables, delta, "collateral normalizedStables");
      this.normalizedStables = Helpers.checkedSub(this.normalizedStables, delta, "normalizedStables");
      record.normalizedStables = collateralNext;
    }
    swapLog.adminChange(this.log, "adjustStablecoins", { collateral: getAddress(asset), amount: amount.toString(), increase });
  }

  toggleTrusted(address: string, kind: "trusted" | "seller" = "trusted"): boolean {
    const a = getAddress(address);
    const set = kind === "trusted" ? this.trusted : this.sellerTrusted;
    if (set.has(a)) set.delete(a);
    else set.add(a);
    swapLog.adminChange(this.log, "toggleTrusted", { address: a, kind, trusted: set.has(a) });
    return set.has(a);
  }

  /**
   * Rebases the supply by `amount` stablecoins. When the normalizer drifts
   * out of (BASE_18, BASE_36) every counter is rescaled and the normalizer
   * goes back to BASE_27.
   */
  updateNormalizer(caller: string, amount: bigint, increase: boolean): bigint {
    if (!this.trusted.has(getAddress(caller))) throw new SwapperError("NotTrusted", caller);

    let next: bigint;
    if (this.normalizedStables === 0n) {
      next = Constants.BASE_27;
    } else {
      const step = (amount * Constants.BASE_27) / this.normalizedStables;
      next = increase ? this.normalizer + step : Helpers.checkedSub(this.normalizer, step, "normalizer");
    }

    if (next <= Constants.BASE_18 || next >= Constants.BASE_36) {
      let total = 0n;
      const rescaled = new Map<string, bigint>();
      for (const asset of this.collateralList) {
        const record = this.getCollateral(asset);
        const value = Helpers.toUint128((record.normalizedStables * next) / Constants.BASE_27, "collateral normalizedStables");
        rescaled.set(asset, value);
        total += value;
      }
      for (const [asset, value] of rescaled) this.getCollateral(asset).normalizedStables = value;
      this.normalizedStables = Helpers.toUint128(total, "normalizedStables");
      next = Constants.BASE_27;
    }

    this.normalizer = Helpers.toUint128(next, "normalizer");
    swapLog.adminChange(this.log, "updateNormalizer", { amount: amount.toString(), increase, normalizer: next.toString() });
    return next;
  }
}
