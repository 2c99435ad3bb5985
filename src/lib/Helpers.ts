import Constants from "./Constants";
import { SwapperError } from "./Errors";

export default class Helpers {
  static abs(x: bigint): bigint {
    return x < 0n ? -x : x;
  }

  static assert(cond: boolean, msg: string): asserts cond {
    if (!cond) throw new SwapperError("InvalidParams", msg);
  }

  static toUint128(x: bigint, what: string): bigint {
    if (x < 0n) throw new SwapperError("Underflow", what);
    if (x > Constants.MAX_UINT128) throw new SwapperError("Overflow", what);
    return x;
  }

  static toUint256(x: bigint, what: string): bigint {
    if (x < 0n) throw new SwapperError("Underflow", what);
    if (x > Constants.MAX_UINT256) throw new SwapperError("Overflow", what);
    return x;
  }

  static checkedSub(a: bigint, b: bigint, what: string): bigint {
    if (b > a) throw new SwapperError("Underflow", what);
    return a - b;
  }

  /**
   * a * b / d on non-negative values, rounding down unless `roundUp`.
   */
  static mulDiv(a: bigint, b: bigint, d: bigint, roundUp = false): bigint {
    if (d === 0n) throw new SwapperError("InvalidParams", "mulDiv: division by zero");
    const num = Helpers.toUint256(a * b, "mulDiv");
    const q = num / d;
    return roundUp && q * d !== num ? q + 1n : q;
  }

  static convertDecimalTo(amount: bigint, fromDecimals: number, toDecimals: number, roundUp = false): bigint {
    if (fromDecimals > toDecimals) return Helpers.mulDiv(amount, 1n, 10n ** BigInt(fromDecimals - toDecimals), roundUp);
    if (fromDecimals < toDecimals) return amount * 10n ** BigInt(toDecimals - fromDecimals);
    return amount;
  }

  /**
   * Index of the breakpoint at or before `element` in a monotone array: the
   * last index whose value is <= element (increasing) or >= element
   * (decreasing). Clamped to the last index. Index 0 is assumed to bound the
   * whole domain, which the fee setters enforce.
   */
  static findLowerBound(increasingArray: boolean, array: readonly bigint[], element: bigint): number {
    if (array.length === 0) return 0;
    let low = 1;
    let high = array.length;
    const last = array[high - 1];
    if ((increasingArray && last <= element) || (!increasingArray && last >= element)) return high - 1;

    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      const pastElement = increasingArray ? array[mid] > element : array[mid] < element;
      if (pastElement) high = mid;
      else low = mid + 1;
    }
    return low - 1;
  }

  // floor(sqrt(x)), Newton iteration
  static sqrt(x: bigint): bigint {
    if (x < 0n) throw new SwapperError("InvalidParams", "sqrt of negative");
    if (x < 2n) return x;
    let z = x;
    let y = (x + 1n) >> 1n;
    while (y < z) {
      z = y;
      y = (x / y + y) >> 1n;
    }
    return z;
  }
}
