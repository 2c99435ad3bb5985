export type SwapperErrorKind =
  | "Paused"
  | "InvalidTokens"
  | "NotCollateral"
  | "TooLate"
  | "TooSmallAmountOut"
  | "TooBigAmountIn"
  | "InvalidSwap"
  | "NotTrusted"
  | "InvalidParams"
  | "InvalidRate"
  | "CollateralBacked"
  | "AlreadyAdded"
  | "Overflow"
  | "Underflow";

/**
 * Every failure raised by the engine. A thrown SwapperError always leaves the
 * ledger exactly as it was before the call.
 */
export class SwapperError extends Error {
  public readonly kind: SwapperErrorKind;

  constructor(kind: SwapperErrorKind, message?: string) {
    super(message ? `${kind}: ${message}` : kind);
    this.name = "SwapperError";
    this.kind = kind;
  }
}

export function isSwapperError(err: unknown, kind?: SwapperErrorKind): err is SwapperError {
  return err instanceof SwapperError && (kind === undefined || err.kind === kind);
}
