import Constants from "../lib/Constants";
import Helpers from "../lib/Helpers";
import { SwapperError } from "../lib/Errors";
import { applyFee, computeFee, invertFee, isExactInput, isMint, QuoteType } from "./FeeMath";

/**
 * Piecewise-linear fee curve. `xFee` holds exposures and `yFee` fees, both in
 * BASE_9. Mint curves start at exposure 0 and increase; burn curves start at
 * BASE_9 and decrease, so a walk always moves forward through the indices.
 * A mint curve may end at BASE_9, in which case its last segment is never
 * crossed.
 */
export interface FeeCurve {
  xFee: readonly bigint[];
  yFee: readonly bigint[];
}

export interface ExposureState {
  collateralNormalized: bigint; // this collateral's share, normalized units
  totalNormalized: bigint;      // whole supply, normalized units
  normalizer: bigint;           // BASE_27
}

export function currentExposure(state: ExposureState): bigint {
  if (state.totalNormalized === 0n) return 0n;
  return (state.collateralNormalized * Constants.BASE_9) / state.totalNormalized;
}

function sitsOn(exposure: bigint, state: ExposureState): boolean {
  return exposure * state.totalNormalized === state.collateralNormalized * Constants.BASE_9;
}

function interpolateFee(
  mint: boolean,
  lowerExposure: bigint,
  upperExposure: bigint,
  lowerFee: bigint,
  upperFee: bigint,
  exposure: bigint,
): bigint {
  if (lowerFee === upperFee) return lowerFee;
  const span = mint ? upperExposure - lowerExposure : lowerExposure - upperExposure;
  if (span <= 0n) return lowerFee;
  const travelled = mint ? exposure - lowerExposure : lowerExposure - exposure;
  return lowerFee + ((upperFee - lowerFee) * travelled) / span;
}

/**
 * Instantaneous fee at the collateral's current exposure.
 */
export function marginalFee(mint: boolean, curve: FeeCurve, state: ExposureState): bigint {
  const n = curve.xFee.length;
  requireCurve(mint, n);
  if (state.totalNormalized === 0n || n === 1) return curve.yFee[0];

  const exposure = currentExposure(state);
  const i = Helpers.findLowerBound(mint, curve.xFee, exposure);
  if (i === n - 1) return curve.yFee[n - 1];
  if (sitsOn(curve.xFee[i], state)) return curve.yFee[i];
  return interpolateFee(mint, curve.xFee[i], curve.xFee[i + 1], curve.yFee[i], curve.yFee[i + 1], exposure);
}

function requireCurve(mint: boolean, n: number): void {
  if (n === 0) throw new SwapperError("Paused", `${mint ? "mint" : "burn"} fee curve not set`);
}

/**
 * Mint segment ending at full exposure. The fee is averaged between the
 * current exposure and the exposure reached once `minted` stablecoins are
 * out, so exact input searches for the largest output whose exact-output
 * cost fits in `remaining`.
 */
function openMintSegment(
  quoteType: QuoteType,
  remaining: bigint,
  issued: bigint,
  other: bigint,
  lowerExposure: bigint,
  lowerFee: bigint,
  upperFee: bigint,
  currentFee: bigint,
): bigint {
  const feeFor = (minted: bigint): bigint => {
    const supply = issued + other + minted;
    const after = supply === 0n ? lowerExposure : ((issued + minted) * Constants.BASE_9) / supply;
    return (currentFee + interpolateFee(true, lowerExposure, Constants.BASE_9, lowerFee, upperFee, after)) / 2n;
  };

  if (!isExactInput(quoteType)) return invertFee(remaining, feeFor(remaining));

  // fees only rise along the segment, so the output is bounded by the current fee
  let lo = 0n;
  let hi = applyFee(remaining, currentFee);
  while (lo < hi) {
    const mid = (lo + hi + 1n) / 2n;
    if (invertFee(mid, feeFor(mid)) <= remaining) lo = mid;
    else hi = mid - 1n;
  }
  return lo;
}

/**
 * Walked amount consumed inside a segment of capacity `capacity` when the
 * remaining given amount lands in it. Only called when the given side is not
 * the side the exposure moves with.
 */
function consumedInSegment(
  mint: boolean,
  remaining: bigint,
  capacity: bigint,
  currentFee: bigint,
  upperFee: bigint,
): bigint {
  const slope = upperFee - currentFee;
  const headroom = Constants.BASE_9 - currentFee;
  let consumed: bigint;

  if (mint) {
    // remaining * (1 - fee(s)) = s, fee linear in s
    const twoC = 2n * capacity;
    consumed = (twoC * remaining * headroom) / (twoC * Constants.BASE_9 + remaining * slope);
  } else {
    if (slope === 0n) return remaining;
    // s * (1 - fee(s)) = remaining, take the root inside the segment
    const bc = headroom * capacity;
    let disc = bc * bc - 2n * slope * remaining * Constants.BASE_9 * capacity;
    if (disc < 0n) disc = 0n;
    consumed = (bc - Helpers.sqrt(disc)) / slope;
  }

  if (consumed < 0n) return 0n;
  return consumed > capacity ? capacity : consumed;
}

/**
 * Integrates the exposure-dependent fee across `amountStable` (stablecoin
 * units) and returns the counter amount in stablecoin units.
 *
 * The exposure moves with the stablecoins minted (mint) or burnt (burn), so
 * MintExactOutput and BurnExactInput walk the given amount directly while
 * MintExactInput and BurnExactOutput walk the counter amount.
 */
export function quoteFees(
  quoteType: QuoteType,
  curve: FeeCurve,
  state: ExposureState,
  amountStable: bigint,
): bigint {
  const mint = isMint(quoteType);
  const walkedIsGiven = mint !== isExactInput(quoteType);
  const n = curve.xFee.length;
  requireCurve(mint, n);

  if (state.totalNormalized === 0n || n === 1) {
    return computeFee(quoteType, amountStable, curve.yFee[0]);
  }

  const exposure = currentExposure(state);
  let i = Helpers.findLowerBound(mint, curve.xFee, exposure);

  const otherStablecoinSupply =
    (state.normalizer * (state.totalNormalized - state.collateralNormalized)) / Constants.BASE_27;
  let stablecoinsIssued = (state.normalizer * state.collateralNormalized) / Constants.BASE_27;
  let onLowerBreakpoint = sitsOn(curve.xFee[i], state);

  let amount = 0n;
  let remaining = amountStable;

  while (i < n - 1) {
    const lowerExposure = curve.xFee[i];
    const upperExposure = curve.xFee[i + 1];
    const lowerFee = curve.yFee[i];
    const upperFee = curve.yFee[i + 1];

    const currentFee = onLowerBreakpoint
      ? lowerFee
      : interpolateFee(mint, lowerExposure, upperExposure, lowerFee, upperFee, exposure);

    if (mint && upperExposure >= Constants.BASE_9) {
      return (
        amount +
        openMintSegment(quoteType, remaining, stablecoinsIssued, otherStablecoinSupply, lowerExposure, lowerFee, upperFee, currentFee)
      );
    }

    let capacity = 0n;
    if (upperExposure < Constants.BASE_9) {
      const issuedAtUpper = (otherStablecoinSupply * upperExposure) / (Constants.BASE_9 - upperExposure);
      capacity = mint ? issuedAtUpper - stablecoinsIssued : stablecoinsIssued - issuedAtUpper;
      if (capacity < 0n) capacity = 0n;
    }

    const midFee = (currentFee + upperFee) / 2n;

    // whole segment, expressed on the given side and on the counter side
    const capacityCounter = walkedIsGiven ? computeFee(quoteType, capacity, midFee) : capacity;
    const capacityGiven = walkedIsGiven
      ? capacity
      : computeFee(mint ? "MintExactOutput" : "BurnExactInput", capacity, midFee);

    if (remaining === capacityGiven) return amount + capacityCounter;

    if (remaining < capacityGiven) {
      const consumed = walkedIsGiven
        ? remaining
        : consumedInSegment(mint, remaining, capacity, currentFee, upperFee);
      const twoC = 2n * capacity;
      const fee = twoC === 0n ? currentFee : (currentFee * (twoC - consumed) + upperFee * consumed) / twoC;
      return amount + computeFee(quoteType, remaining, fee);
    }

    amount += capacityCounter;
    remaining -= capacityGiven;
    stablecoinsIssued = mint ? stablecoinsIssued + capacity : stablecoinsIssued - capacity;
    onLowerBreakpoint = true;
    ++i;
  }

  return amount + computeFee(quoteType, remaining, curve.yFee[n - 1]);
}
