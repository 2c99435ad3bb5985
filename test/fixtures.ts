import { expect } from "chai";
import { ethers } from "ethers";
import { isSwapperError, SwapperErrorKind } from "../src/lib/Errors";
import { logger } from "../src/lib/Logger";
import { Ledger } from "../src/logic/Ledger";
import { SnapshotOracle } from "../src/collaborators/SnapshotOracle";
import { SnapshotManager } from "../src/collaborators/SnapshotManager";
import { InMemoryTokenGateway } from "../src/collaborators/InMemoryTokenGateway";
import ExposureSolver from "../src/ExposureSolver";

logger.level = "silent";

export const STABLE = "0x0000000000000000000000000000000000000100";
export const USDC = "0x0000000000000000000000000000000000000001";
export const DAI = "0x0000000000000000000000000000000000000002";
export const UNKNOWN = "0x0000000000000000000000000000000000000003";
export const ALICE = "0x0000000000000000000000000000000000001001";
export const BOB = "0x0000000000000000000000000000000000001002";
export const GOV = "0x0000000000000000000000000000000000009999";

export const USDC_ORACLE = "0x01";
export const DAI_ORACLE = "0x02";

export const ONE = ethers.parseEther("1");

export function expectSwapperError(fn: () => unknown, kind: SwapperErrorKind): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isSwapperError(caught, kind), `expected ${kind}, got ${String(caught)}`).to.equal(true);
}

export interface System {
  ledger: Ledger;
  oracle: SnapshotOracle;
  tokens: InMemoryTokenGateway;
  manager: SnapshotManager;
  solver: ExposureSolver;
  clock: { now: number };
}

/**
 * USDC (6 decimals) and DAI (18 decimals) registered, live, priced at 1 with
 * a flat 0.1% mint fee and a flat 0.2% burn fee. ALICE holds plenty of both.
 */
export function buildSystem(): System {
  const ledger = new Ledger(STABLE);
  const oracle = new SnapshotOracle();
  const tokens = new InMemoryTokenGateway(STABLE);
  const manager = new SnapshotManager(tokens);
  const clock = { now: 1_000 };

  for (const [asset, decimals, config] of [
    [USDC, 6, USDC_ORACLE],
    [DAI, 18, DAI_ORACLE],
  ] as const) {
    ledger.addCollateral(asset, decimals, config);
    oracle.set(config, { mintPrice: ONE, burnPrice: ONE, deviation: ONE });
    ledger.setFees(asset, [0n], [1_000_000n], "mint");
    ledger.setFees(asset, [1_000_000_000n], [2_000_000n], "burn");
    ledger.togglePause(asset, "mint");
    ledger.togglePause(asset, "burn");
  }

  tokens.fund(USDC, ALICE, ethers.parseUnits("10000", 6));
  tokens.fund(DAI, ALICE, ethers.parseEther("10000"));

  const solver = new ExposureSolver({ ledger, oracle, manager, tokens, now: () => clock.now });
  return { ledger, oracle, tokens, manager, solver, clock };
}

export function sumOfCollaterals(ledger: Ledger): bigint {
  let sum = 0n;
  for (const asset of ledger.getCollateralList()) sum += ledger.getCollateral(asset).normalizedStables;
  return sum;
}
