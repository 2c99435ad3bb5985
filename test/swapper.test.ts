import { expect } from "chai";
import { ethers } from "ethers";
import {
  ALICE,
  BOB,
  buildSystem,
  DAI,
  DAI_ORACLE,
  expectSwapperError,
  ONE,
  STABLE,
  sumOfCollaterals,
  System,
  UNKNOWN,
  USDC,
  USDC_ORACLE,
} from "./fixtures";
import ExposureSolver from "../src/ExposureSolver";
import { InMemoryTokenGateway } from "../src/collaborators/InMemoryTokenGateway";
import { SnapshotManager } from "../src/collaborators/SnapshotManager";

const usdc = (v: string) => ethers.parseUnits(v, 6);
const e18 = (v: string) => ethers.parseEther(v);

// reports twice the custody it holds, so payouts can fail after the burn
class OverReportingGateway extends InMemoryTokenGateway {
  custodyBalance(asset: string): bigint {
    return super.custodyBalance(asset) * 2n;
  }
}

describe("Swapper", () => {
  let sys: System;

  const mintUsdc = (amountIn: bigint) =>
    sys.solver.swapExactInput({ tokenIn: USDC, tokenOut: STABLE, from: ALICE, to: ALICE, amountIn, amountOutMin: 0n });

  beforeEach(() => {
    sys = buildSystem();
  });

  describe("quotes", () => {
    it("should quote the first mint at the first fee", () => {
      expect(sys.solver.quoteIn(usdc("1000"), USDC, STABLE)).to.equal(e18("999"));
    });

    it("should quote exact output as the inverse of exact input", () => {
      expect(sys.solver.quoteOut(e18("999"), USDC, STABLE)).to.equal(usdc("1000"));
    });

    it("should quote burns against the burn curve", () => {
      mintUsdc(usdc("1000"));
      expect(sys.solver.quoteIn(e18("100"), STABLE, USDC)).to.equal(99_800_000n);
      expect(sys.solver.quoteOut(99_800_000n, STABLE, USDC)).to.equal(e18("100"));
    });

    it("should haircut burns by the worst deviation across collaterals", () => {
      mintUsdc(usdc("1000"));
      sys.oracle.set(DAI_ORACLE, { mintPrice: ONE, burnPrice: ONE, deviation: e18("0.9") });

      const burnPrice = sys.solver.getBurnOracle(USDC);
      expect(burnPrice.minDeviation).to.equal(e18("0.9"));
      expect(burnPrice.price).to.equal(ONE);
      expect(burnPrice.oracleValue).to.equal(e18("0.9"));
      expect(sys.solver.quoteIn(e18("100"), STABLE, USDC)).to.equal(89_820_000n);
    });

    it("should divide by the collateral's own burn price", () => {
      sys.oracle.set(USDC_ORACLE, { mintPrice: ONE, burnPrice: e18("1.25"), deviation: ONE });
      expect(sys.solver.getBurnOracle(USDC).oracleValue).to.equal(e18("0.8"));
    });

    it("should fail the burn quote when any collateral's feed fails", () => {
      mintUsdc(usdc("1000"));
      sys.oracle.setUnavailable(DAI_ORACLE);
      expect(() => sys.solver.quoteIn(e18("100"), STABLE, USDC)).to.throw(/feed unavailable/);
    });

    it("should reject fee and quote reads on a direction without a curve", () => {
      sys.ledger.addCollateral(UNKNOWN, 18, "0x03");
      sys.oracle.set("0x03", { mintPrice: ONE, burnPrice: ONE, deviation: ONE });
      expectSwapperError(() => sys.solver.quoteMintExactInput(UNKNOWN, e18("1")), "Paused");
      expectSwapperError(() => sys.solver.solveMintToFeeCeiling(UNKNOWN, 0n, e18("1")), "Paused");

      sys.ledger.setFees(UNKNOWN, [0n], [1_000_000n], "mint");
      sys.ledger.adjustStablecoins(UNKNOWN, e18("10"), true);
      expect(sys.solver.getCurrentFee(UNKNOWN, true)).to.equal(1_000_000n);
      expectSwapperError(() => sys.solver.getCurrentFee(UNKNOWN, false), "Paused");
    });

    it("should report the current fee per direction", () => {
      expect(sys.solver.getCurrentFee(USDC, true)).to.equal(1_000_000n);
      expect(sys.solver.getCurrentFee(USDC, false)).to.equal(2_000_000n);
    });
  });

  describe("direction checks", () => {
    it("should reject pairs without exactly one stablecoin side", () => {
      expectSwapperError(() => sys.solver.quoteIn(1n, STABLE, STABLE), "InvalidTokens");
      expectSwapperError(() => sys.solver.quoteIn(1n, USDC, DAI), "InvalidTokens");
    });

    it("should reject unregistered collaterals", () => {
      expectSwapperError(() => sys.solver.quoteIn(1n, UNKNOWN, STABLE), "NotCollateral");
    });

    it("should reject paused directions", () => {
      sys.ledger.togglePause(USDC, "mint");
      expectSwapperError(() => sys.solver.quoteIn(1n, USDC, STABLE), "Paused");
      expect(sys.solver.quoteIn(e18("1"), DAI, STABLE)).to.equal(e18("0.999"));
    });

    it("should reject swaps past their deadline", () => {
      const params = { tokenIn: USDC, tokenOut: STABLE, from: ALICE, to: ALICE, amountIn: usdc("1"), amountOutMin: 0n };
      expectSwapperError(() => sys.solver.swapExactInput({ ...params, deadline: 999 }), "TooLate");
      expect(sys.solver.swapExactInput({ ...params, deadline: 1_000 }).amountOut).to.equal(e18("0.999"));
    });
  });

  describe("swaps", () => {
    it("should mint and move the tokens", () => {
      const result = mintUsdc(usdc("1000"));
      expect(result).to.deep.equal({ amountIn: usdc("1000"), amountOut: e18("999"), isMint: true, collateral: USDC });
      expect(sys.tokens.balanceOf(STABLE, ALICE)).to.equal(e18("999"));
      expect(sys.tokens.balanceOf(USDC, ALICE)).to.equal(usdc("9000"));
      expect(sys.tokens.custodyBalance(USDC)).to.equal(usdc("1000"));
      expect(sys.ledger.getExposure(USDC)).to.equal(1_000_000_000n);
    });

    it("should burn and pay the recipient", () => {
      mintUsdc(usdc("1000"));
      const result = sys.solver.swapExactInput({
        tokenIn: STABLE,
        tokenOut: USDC,
        from: ALICE,
        to: BOB,
        amountIn: e18("100"),
        amountOutMin: 99_800_000n,
      });
      expect(result.amountOut).to.equal(99_800_000n);
      expect(sys.tokens.balanceOf(STABLE, ALICE)).to.equal(e18("899"));
      expect(sys.tokens.balanceOf(USDC, BOB)).to.equal(99_800_000n);
      expect(sys.ledger.getTotalIssued()).to.equal(e18("899"));
    });

    it("should charge the quoted input on exact output", () => {
      const result = sys.solver.swapExactOutput({
        tokenIn: DAI,
        tokenOut: STABLE,
        from: ALICE,
        to: ALICE,
        amountOut: e18("10"),
        amountInMax: e18("11"),
      });
      // 10 / 0.999, rounded up
      expect(result.amountIn).to.equal(10010010010010010011n);
      expect(sys.tokens.balanceOf(STABLE, ALICE)).to.equal(e18("10"));
    });

    it("should enforce slippage bounds and leave the ledger untouched", () => {
      expectSwapperError(
        () =>
          sys.solver.swapExactInput({
            tokenIn: USDC,
            tokenOut: STABLE,
            from: ALICE,
            to: ALICE,
            amountIn: usdc("1000"),
            amountOutMin: e18("999") + 1n,
          }),
        "TooSmallAmountOut",
      );
      expectSwapperError(
        () =>
          sys.solver.swapExactOutput({
            tokenIn: USDC,
            tokenOut: STABLE,
            from: ALICE,
            to: ALICE,
            amountOut: e18("999"),
            amountInMax: usdc("1000") - 1n,
          }),
        "TooBigAmountIn",
      );
      expect(sys.ledger.normalizedStables).to.equal(0n);
    });

    it("should refuse burns beyond what custody holds", () => {
      mintUsdc(usdc("1000"));
      expectSwapperError(
        () =>
          sys.solver.swapExactOutput({
            tokenIn: STABLE,
            tokenOut: USDC,
            from: ALICE,
            to: ALICE,
            amountOut: usdc("2000"),
            amountInMax: e18("1000000"),
          }),
        "InvalidSwap",
      );
    });

    it("should check managed collateral against the manager's liquidity", () => {
      sys.ledger.setCollateralManager(USDC, "0xaa", sys.manager);
      mintUsdc(usdc("1000"));
      expect(sys.tokens.managedBalance(USDC)).to.equal(usdc("1000"));

      sys.manager.setLiquidity(USDC, usdc("50"));
      expectSwapperError(() => sys.solver.quoteIn(e18("100"), STABLE, USDC), "InvalidSwap");
      expect(sys.solver.quoteIn(e18("50"), STABLE, USDC)).to.equal(49_900_000n);
    });

    it("should roll the ledger back when a token movement fails", () => {
      mintUsdc(usdc("1000"));
      expect(() =>
        sys.solver.swapExactInput({
          tokenIn: STABLE,
          tokenOut: USDC,
          from: BOB,
          to: BOB,
          amountIn: e18("10"),
          amountOutMin: 0n,
        }),
      ).to.throw(/burnSelf/);
      expect(sys.ledger.normalizedStables).to.equal(e18("999"));
      expect(sys.ledger.getCollateral(USDC).normalizedStables).to.equal(e18("999"));
      expect(sys.tokens.custodyBalance(USDC)).to.equal(usdc("1000"));
    });

    it("should undo the burn and the ledger when the collateral payout fails", () => {
      const tokens = new OverReportingGateway(STABLE);
      tokens.fund(USDC, ALICE, usdc("1000"));
      const solver = new ExposureSolver({ ledger: sys.ledger, oracle: sys.oracle, manager: new SnapshotManager(tokens), tokens });
      solver.swapExactInput({ tokenIn: USDC, tokenOut: STABLE, from: ALICE, to: ALICE, amountIn: usdc("1000"), amountOutMin: 0n });
      tokens.transferCollateral(USDC, null, BOB, usdc("900"), false);

      expect(() =>
        solver.swapExactInput({ tokenIn: STABLE, tokenOut: USDC, from: ALICE, to: ALICE, amountIn: e18("150"), amountOutMin: 0n }),
      ).to.throw(/transferCollateral/);
      expect(tokens.balanceOf(STABLE, ALICE)).to.equal(e18("999"));
      expect(tokens.custodyBalance(USDC)).to.equal(usdc("200")); // 100 held
      expect(sys.ledger.normalizedStables).to.equal(e18("999"));
    });

    it("should skip settlement when an amount rounds to zero", () => {
      const result = mintUsdc(0n);
      expect(result.amountOut).to.equal(0n);
      expect(sys.ledger.normalizedStables).to.equal(0n);
      expect(sys.tokens.balanceOf(USDC, ALICE)).to.equal(usdc("10000"));
    });

    it("should keep the per-collateral counters summing to the total", () => {
      const steps = [
        () => mintUsdc(usdc("1000")),
        () =>
          sys.solver.swapExactInput({ tokenIn: DAI, tokenOut: STABLE, from: ALICE, to: ALICE, amountIn: e18("500"), amountOutMin: 0n }),
        () =>
          sys.solver.swapExactInput({ tokenIn: STABLE, tokenOut: USDC, from: ALICE, to: ALICE, amountIn: e18("100"), amountOutMin: 0n }),
        () =>
          sys.solver.swapExactInput({ tokenIn: STABLE, tokenOut: DAI, from: ALICE, to: ALICE, amountIn: e18("50"), amountOutMin: 0n }),
        () =>
          sys.solver.swapExactOutput({ tokenIn: DAI, tokenOut: STABLE, from: ALICE, to: ALICE, amountOut: e18("10"), amountInMax: e18("11") }),
      ];
      for (const step of steps) {
        step();
        expect(sumOfCollaterals(sys.ledger)).to.equal(sys.ledger.normalizedStables);
      }
      expect(sys.ledger.getTotalIssued()).to.equal(e18("1358.5"));
      expect(sys.tokens.balanceOf(STABLE, ALICE)).to.equal(e18("1358.5"));
    });
  });
});
