import { keccak256 } from "ethers";
import Constants from "../lib/Constants";
import { SwapperError } from "../lib/Errors";
import { OracleReader } from "../collaborators/types";
import { Ledger } from "./Ledger";

export interface BurnPrice {
  price: bigint;         // requested collateral's own burn reading, BASE_18
  minDeviation: bigint;  // worst deviation over every registered collateral, BASE_18
  oracleValue: bigint;   // collateral per stablecoin after the deviation haircut, BASE_18
}

/**
 * Burn-side price for `asset`. Every registered collateral is read, and the
 * lowest deviation among them scales the requested collateral's own price:
 * a de-peg on any collateral makes every redemption price as de-pegged. A
 * failing read on any collateral aborts the quote.
 */
export function selectBurnPrice(ledger: Ledger, oracle: OracleReader, asset: string): BurnPrice {
  const ownHash = keccak256(ledger.getCollateral(asset).oracleConfig);

  let price: bigint | undefined;
  let minDeviation = Constants.BASE_18;
  for (const collateral of ledger.collateralList) {
    const record = ledger.getCollateral(collateral);
    const reading = oracle.readBurn(record.oracleConfig, record.oracleStorage);
    if (price === undefined && keccak256(record.oracleConfig) === ownHash) price = reading.price;
    if (reading.deviation < minDeviation) minDeviation = reading.deviation;
  }

  if (price === undefined || price === 0n) throw new SwapperError("InvalidSwap", `no burn price for ${asset}`);
  if (minDeviation < 0n) throw new SwapperError("Underflow", "negative deviation");

  return { price, minDeviation, oracleValue: (minDeviation * Constants.BASE_18) / price };
}
