import "dotenv/config";
import { ethers } from "ethers";
import { IssuerState } from "./IssuerState";
import { Config } from "./lib/Config";
import { logger } from "./lib/Logger";

(async () => {
    const state = IssuerState.fromChainId(Config.getIssuerAddress(), Config.getChainId());
    const solver = await state.sync();
    const stablecoin = solver.ledger.stablecoin;

    for (const collateral of solver.ledger.getCollateralList()) {
        const record = solver.ledger.getCollateral(collateral);
        const one = ethers.parseUnits("1", record.decimals);
        logger.info({
            collateral,
            exposure: ethers.formatUnits(solver.ledger.getExposure(collateral), 9),
            mintFee: record.isMintLive ? ethers.formatUnits(solver.getCurrentFee(collateral, true), 9) : "paused",
            burnFee: record.isBurnLive ? ethers.formatUnits(solver.getCurrentFee(collateral, false), 9) : "paused",
            mintOneUnit: record.isMintLive ? ethers.formatEther(solver.quoteIn(one, collateral, stablecoin)) : "paused",
            msg: "Collateral quote",
        });
    }
})().catch((err: unknown) => {
    logger.error({ error: err instanceof Error ? err.message : String(err), msg: "Quote run failed" });
    process.exitCode = 1;
});
