import pino from "pino";
import { Config } from "./Config";

export const logger = pino({
  name: "stable-swapper",
  level: Config.getLogLevel(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Structured log helpers shared by the swapper and the ledger admin surface.
 * Amounts go out as decimal strings so bigint never reaches the serializer.
 */
export const swapLog = {
  settled: (
    log: pino.Logger,
    kind: "mint" | "burn",
    collateral: string,
    amountIn: bigint,
    amountOut: bigint,
    normalizedDelta: bigint,
  ) => {
    log.debug({
      kind,
      collateral,
      amountIn: amountIn.toString(),
      amountOut: amountOut.toString(),
      normalizedDelta: normalizedDelta.toString(),
      msg: "Swap settled",
    });
  },

  rejected: (log: pino.Logger, reason: string, context?: Record<string, string>) => {
    log.debug({ reason, ...context, msg: "Swap rejected" });
  },

  adminChange: (log: pino.Logger, action: string, context?: Record<string, string | boolean | number>) => {
    log.info({ action, ...context, msg: "Ledger updated" });
  },
};
