import Constants from "./lib/Constants";
import { SwapperError } from "./lib/Errors";
import { Swapper } from "./logic/Swapper";

type FeeOutput = {
  currentFee: bigint
  maxFee: bigint
  feeAfter: bigint // marginal fee once the solved amount is minted
}

export default class ExposureSolver extends Swapper {
  /**
   * Runs `fn` against the current ledger and rolls every ledger change back
   * afterwards. Token movements are not rolled back, so `fn` should only use
   * quotes and `ledger.record*`.
   */
  simulate<T>(fn: () => T): T {
    const snap = this.ledger.snapshot();
    try {
      return fn();
    } finally {
      this.ledger.restore(snap);
    }
  }

  /**
   * Stablecoins to mint (or burn) against `collateral` to bring its exposure
   * to `targetExposure`.
   *
   * @param targetExposure - BASE_9, strictly below 1
   * @returns amount - stablecoin amount, isMint - direction of the trade
   */
  stablecoinsToTargetExposure(collateral: string, targetExposure: bigint): { amount: bigint; isMint: boolean } {
    if (targetExposure < 0n || targetExposure >= Constants.BASE_9) {
      throw new SwapperError("InvalidParams", `target exposure ${targetExposure} out of [0, 1)`);
    }
    const { stablecoinsFromCollateral, stablecoinsIssued } = this.ledger.getIssuedByCollateral(collateral);
    if (stablecoinsIssued === 0n) throw new SwapperError("InvalidParams", "exposure undefined on an empty ledger");

    const other = stablecoinsIssued - stablecoinsFromCollateral;
    const issuedAtTarget = (other * targetExposure) / (Constants.BASE_9 - targetExposure);

    if (issuedAtTarget >= stablecoinsFromCollateral) {
      return { amount: issuedAtTarget - stablecoinsFromCollateral, isMint: true };
    }
    return { amount: stablecoinsFromCollateral - issuedAtTarget, isMint: false };
  }

  /**
   * Largest collateral amount that can be minted while the marginal mint fee
   * afterwards stays at or below `maxFee`.
   *
   * @param maxFee - BASE_9
   * @param maxAmountIn - upper bound of the search, collateral decimals
   * @returns amountIn, amountOut, constrained - true when `maxAmountIn` was cut down, feeOutput
   */
  solveMintToFeeCeiling(
    collateral: string,
    maxFee: bigint,
    maxAmountIn: bigint,
  ): { amountIn: bigint; amountOut: bigint; constrained: boolean; feeOutput: FeeOutput } {
    const currentFee = this.getCurrentFee(collateral, true);

    const postFeeAndOut = (amountIn: bigint): { fee: bigint; amountOut: bigint } =>
      this.simulate(() => {
        const amountOut = this.quoteMintExactInput(collateral, amountIn);
        this.ledger.recordMint(collateral, amountOut);
        return { fee: this.getCurrentFee(collateral, true), amountOut };
      });

    const atMax = postFeeAndOut(maxAmountIn);
    if (atMax.fee <= maxFee) {
      return {
        amountIn: maxAmountIn,
        amountOut: atMax.amountOut,
        constrained: false,
        feeOutput: { currentFee, maxFee, feeAfter: atMax.fee },
      };
    }

    // Binary search for the largest amount that keeps the fee under the ceiling
    let lo = 0n;
    let hi = maxAmountIn;
    while (lo < hi) {
      const mid = (lo + hi + 1n) / 2n; // Bias high to find maximum
      if (postFeeAndOut(mid).fee <= maxFee) lo = mid;
      else hi = mid - 1n;
    }

    const final = lo > 0n ? postFeeAndOut(lo) : { fee: currentFee, amountOut: 0n };
    this.log.debug({
      collateral,
      amountIn: lo.toString(),
      feeAfter: final.fee.toString(),
      msg: "Solved mint to fee ceiling",
    });
    return {
      amountIn: lo,
      amountOut: final.amountOut,
      constrained: true,
      feeOutput: { currentFee, maxFee, feeAfter: final.fee },
    };
  }
}
