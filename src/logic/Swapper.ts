import { getAddress } from "ethers";
import pino from "pino";
import Constants from "../lib/Constants";
import Helpers from "../lib/Helpers";
import { SwapperError } from "../lib/Errors";
import { createLogger, swapLog } from "../lib/Logger";
import { ManagerGateway, OracleReader, TokenGateway } from "../collaborators/types";
import { BurnPrice, selectBurnPrice } from "./BurnPrice";
import { marginalFee, quoteFees } from "./ExposureCurve";
import { Ledger } from "./Ledger";

export interface SwapperDependencies {
  ledger: Ledger;
  oracle: OracleReader;
  manager: ManagerGateway;
  tokens: TokenGateway;
  now?: () => number; // unix seconds
}

interface SwapCommon {
  tokenIn: string;
  tokenOut: string;
  from: string;
  to: string;
  deadline?: number; // unix seconds, 0 or absent for none
}

export interface SwapExactInputParams extends SwapCommon {
  amountIn: bigint;
  amountOutMin: bigint;
}

export interface SwapExactOutputParams extends SwapCommon {
  amountOut: bigint;
  amountInMax: bigint;
}

export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
  isMint: boolean;
  collateral: string;
}

export class Swapper {
  public readonly ledger: Ledger;
  public readonly oracle: OracleReader;
  public readonly manager: ManagerGateway;
  public readonly tokens: TokenGateway;
  protected readonly log: pino.Logger;
  private readonly now: () => number;

  constructor(deps: SwapperDependencies) {
    this.ledger = deps.ledger;
    this.oracle = deps.oracle;
    this.manager = deps.manager;
    this.tokens = deps.tokens;
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
    this.log = createLogger("swapper");
  }

  // ---------- direction ----------
  /**
   * Resolves which side of the pair is the collateral and whether the swap
   * mints or burns, then checks the collateral is registered and live.
   */
  private getMintBurn(tokenIn: string, tokenOut: string, deadline = 0): { isMint: boolean; collateral: string } {
    if (deadline !== 0 && this.now() > deadline) throw new SwapperError("TooLate", `deadline ${deadline}`);

    const stablecoin = this.ledger.stablecoin;
    const inAddr = getAddress(tokenIn);
    const outAddr = getAddress(tokenOut);

    let isMint: boolean;
    let collateral: string;
    if (inAddr === stablecoin && outAddr !== stablecoin) {
      isMint = false;
      collateral = outAddr;
    } else if (outAddr === stablecoin && inAddr !== stablecoin) {
      isMint = true;
      collateral = inAddr;
    } else {
      throw new SwapperError("InvalidTokens", `${inAddr} -> ${outAddr}`);
    }

    if (!this.ledger.isCollateral(collateral)) throw new SwapperError("NotCollateral", collateral);
    if (this.ledger.isPaused(collateral, isMint ? "mint" : "burn")) {
      throw new SwapperError("Paused", `${isMint ? "mint" : "burn"} ${collateral}`);
    }
    return { isMint, collateral };
  }

  // ---------- quotes ----------
  quoteIn(amountIn: bigint, tokenIn: string, tokenOut: string): bigint {
    const { isMint, collateral } = this.getMintBurn(tokenIn, tokenOut);
    if (isMint) return this.quoteMintExactInput(collateral, amountIn);
    const amountOut = this.quoteBurnExactInput(collateral, amountIn);
    this.checkAvailability(collateral, amountOut);
    return amountOut;
  }

  quoteOut(amountOut: bigint, tokenIn: string, tokenOut: string): bigint {
    const { isMint, collateral } = this.getMintBurn(tokenIn, tokenOut);
    if (isMint) return this.quoteMintExactOutput(collateral, amountOut);
    this.checkAvailability(collateral, amountOut);
    return this.quoteBurnExactOutput(collateral, amountOut);
  }

  /** collateral in (collateral decimals) -> stablecoins out */
  quoteMintExactInput(collateral: string, amountIn: bigint): bigint {
    const record = this.ledger.getCollateral(collateral);
    const oracleValue = this.oracle.readMint(record.oracleConfig, record.oracleStorage);
    const amountStable = Helpers.convertDecimalTo(
      amountIn * oracleValue,
      Constants.STABLE_DECIMALS + record.decimals,
      Constants.STABLE_DECIMALS,
    );
    return quoteFees("MintExactInput", this.ledger.curve(collateral, "mint"), this.ledger.exposureState(collateral), amountStable);
  }

  /** stablecoins out -> collateral in */
  quoteMintExactOutput(collateral: string, amountOut: bigint): bigint {
    const record = this.ledger.getCollateral(collateral);
    const oracleValue = this.oracle.readMint(record.oracleConfig, record.oracleStorage);
    const amountStable = quoteFees(
      "MintExactOutput",
      this.ledger.curve(collateral, "mint"),
      this.ledger.exposureState(collateral),
      amountOut,
    );
    const amountIn18 = Helpers.mulDiv(amountStable, Constants.BASE_18, oracleValue, true);
    return Helpers.convertDecimalTo(amountIn18, Constants.STABLE_DECIMALS, record.decimals, true);
  }

  /** stablecoins in -> collateral out */
  quoteBurnExactInput(collateral: string, amountIn: bigint): bigint {
    const record = this.ledger.getCollateral(collateral);
    const { oracleValue } = this.getBurnOracle(collateral);
    const amountStable = quoteFees(
      "BurnExactInput",
      this.ledger.curve(collateral, "burn"),
      this.ledger.exposureState(collateral),
      amountIn,
    );
    const amountOut18 = Helpers.mulDiv(amountStable, oracleValue, Constants.BASE_18);
    return Helpers.convertDecimalTo(amountOut18, Constants.STABLE_DECIMALS, record.decimals);
  }

  /** collateral out -> stablecoins in */
  quoteBurnExactOutput(collateral: string, amountOut: bigint): bigint {
    const record = this.ledger.getCollateral(collateral);
    const { oracleValue } = this.getBurnOracle(collateral);
    const amountOut18 = Helpers.convertDecimalTo(amountOut, record.decimals, Constants.STABLE_DECIMALS);
    const amountStable = Helpers.mulDiv(amountOut18, Constants.BASE_18, oracleValue, true);
    return quoteFees("BurnExactOutput", this.ledger.curve(collateral, "burn"), this.ledger.exposureState(collateral), amountStable);
  }

  getBurnOracle(collateral: string): BurnPrice {
    return selectBurnPrice(this.ledger, this.oracle, collateral);
  }

  /** instantaneous fee (BASE_9) for the next unit minted or burnt */
  getCurrentFee(collateral: string, isMint: boolean): bigint {
    const curve = this.ledger.curve(collateral, isMint ? "mint" : "burn");
    return marginalFee(isMint, curve, this.ledger.exposureState(collateral));
  }

  // ---------- availability ----------
  checkAvailability(collateral: string, amountOut: bigint): void {
    const record = this.ledger.getCollateral(collateral);
    const available = record.isManaged
      ? this.manager.maxAvailable(collateral)
      : this.tokens.custodyBalance(collateral);
    if (amountOut > available) {
      throw new SwapperError("InvalidSwap", `${amountOut} requested, ${available} available for ${collateral}`);
    }
  }

  // ---------- swaps ----------
  swapExactInput(params: SwapExactInputParams): SwapResult {
    const { isMint, collateral } = this.getMintBurn(params.tokenIn, params.tokenOut, params.deadline);
    const amountOut = isMint
      ? this.quoteMintExactInput(collateral, params.amountIn)
      : this.quoteBurnExactInput(collateral, params.amountIn);

    if (amountOut < params.amountOutMin) {
      swapLog.rejected(this.log, "TooSmallAmountOut", { collateral, amountOut: amountOut.toString() });
      throw new SwapperError("TooSmallAmountOut", `${amountOut} < ${params.amountOutMin}`);
    }
    if (!isMint) this.checkAvailability(collateral, amountOut);

    this.settle(isMint, collateral, params.amountIn, amountOut, params.from, params.to);
    return { amountIn: params.amountIn, amountOut, isMint, collateral };
  }

  swapExactOutput(params: SwapExactOutputParams): SwapResult {
    const { isMint, collateral } = this.getMintBurn(params.tokenIn, params.tokenOut, params.deadline);
    const amountIn = isMint
      ? this.quoteMintExactOutput(collateral, params.amountOut)
      : this.quoteBurnExactOutput(collateral, params.amountOut);

    if (amountIn > params.amountInMax) {
      swapLog.rejected(this.log, "TooBigAmountIn", { collateral, amountIn: amountIn.toString() });
      throw new SwapperError("TooBigAmountIn", `${amountIn} > ${params.amountInMax}`);
    }
    if (!isMint) this.checkAvailability(collateral, params.amountOut);

    this.settle(isMint, collateral, amountIn, params.amountOut, params.from, params.to);
    return { amountIn, amountOut: params.amountOut, isMint, collateral };
  }

  /**
   * Moves the counters by the stablecoin side of the trade, then the tokens.
   * If any step throws, the ledger goes back to its state before the swap.
   */
  private settle(isMint: boolean, collateral: string, amountIn: bigint, amountOut: bigint, from: string, to: string): void {
    if (amountIn === 0n || amountOut === 0n) return;

    const record = this.ledger.getCollateral(collateral);
    const managerTarget = record.isManaged ? record.managerConfig : null;
    const snap = this.ledger.snapshot();

    let normalizedDelta: bigint;
    try {
      if (isMint) {
        normalizedDelta = this.ledger.recordMint(collateral, amountOut);
        this.tokens.transferCollateral(collateral, managerTarget, from, amountIn, true);
        this.tokens.mint(to, amountOut);
      } else {
        normalizedDelta = this.ledger.recordBurn(collateral, amountIn);
        this.tokens.burnSelf(amountIn, from);
        this.tokens.transferCollateral(collateral, managerTarget, to, amountOut, false);
      }
    } catch (err) {
      this.ledger.restore(snap);
      swapLog.rejected(this.log, err instanceof Error ? err.message : String(err), { collateral });
      throw err;
    }

    swapLog.settled(this.log, isMint ? "mint" : "burn", collateral, amountIn, amountOut, normalizedDelta);
  }
}
