import Constants from "../lib/Constants";
import Helpers from "../lib/Helpers";
import { SwapperError } from "../lib/Errors";

export type QuoteType = "MintExactInput" | "MintExactOutput" | "BurnExactInput" | "BurnExactOutput";

export function isMint(quoteType: QuoteType): boolean {
  return quoteType === "MintExactInput" || quoteType === "MintExactOutput";
}

export function isExactInput(quoteType: QuoteType): boolean {
  return quoteType === "MintExactInput" || quoteType === "BurnExactInput";
}

function checkFee(fee: bigint): void {
  if (fee <= -Constants.BASE_9 || fee >= Constants.BASE_9) {
    throw new SwapperError("InvalidRate", `fee ${fee} outside (-1, 1)`);
  }
}

/**
 * Amount left after charging `fee` (BASE_9). A negative fee is a rebate and
 * grows the amount by |fee|. Rounds down.
 */
export function applyFee(amount: bigint, fee: bigint): bigint {
  checkFee(fee);
  if (fee >= 0n) return Helpers.mulDiv(amount, Constants.BASE_9 - fee, Constants.BASE_9);
  return Helpers.mulDiv(amount, Constants.BASE_9 + Helpers.abs(fee), Constants.BASE_9);
}

/**
 * Inverse of `applyFee`: the amount that, once `fee` is charged, yields
 * `amount`. Rounds up so the caller never gets the better side of a wei.
 */
export function invertFee(amount: bigint, fee: bigint): bigint {
  checkFee(fee);
  if (fee >= 0n) return Helpers.mulDiv(amount, Constants.BASE_9, Constants.BASE_9 - fee, true);
  return Helpers.mulDiv(amount, Constants.BASE_9, Constants.BASE_9 + Helpers.abs(fee), true);
}

// exact-input quotes solve for the output, exact-output quotes for the input
export function computeFee(quoteType: QuoteType, amount: bigint, fee: bigint): bigint {
  return isExactInput(quoteType) ? applyFee(amount, fee) : invertFee(amount, fee);
}
