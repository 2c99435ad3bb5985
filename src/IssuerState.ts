import { Provider, JsonRpcProvider } from "ethers";
import { IssuerReader, IssuerData } from "./readers/IssuerReader";
import ExposureSolver from "./ExposureSolver";
import { Ledger } from "./logic/Ledger";
import { SnapshotOracle } from "./collaborators/SnapshotOracle";
import { SnapshotManager } from "./collaborators/SnapshotManager";
import { InMemoryTokenGateway } from "./collaborators/InMemoryTokenGateway";
import { Config } from "./lib/Config";
import { createLogger } from "./lib/Logger";

/**
 * IssuerState manages fetching on-chain issuer state and rebuilding the
 * local ExposureSolver simulation from it.
 */
export class IssuerState {
  public readonly reader: IssuerReader;
  private _solver: ExposureSolver | null = null;
  private _lastFetchedData: IssuerData | null = null;
  private readonly log = createLogger("issuer-state");

  constructor(issuerAddress: string, provider: Provider) {
    this.reader = new IssuerReader(issuerAddress, provider);
  }

  static fromRpcUrl(issuerAddress: string, rpcUrl: string): IssuerState {
    const provider = new JsonRpcProvider(rpcUrl);
    return new IssuerState(issuerAddress, provider);
  }

  static fromChainId(issuerAddress: string, chainId: number): IssuerState {
    const rpcUrl = Config.getRPCUrl(chainId);
    return IssuerState.fromRpcUrl(issuerAddress, rpcUrl);
  }

  /**
   * Builds a fresh ledger and collaborator stand-ins from fetched data.
   */
  static buildSolver(data: IssuerData): ExposureSolver {
    const ledger = new Ledger(data.stablecoin);
    const oracle = new SnapshotOracle();
    const tokens = new InMemoryTokenGateway(data.stablecoin);
    const manager = new SnapshotManager(tokens);

    for (const c of data.collaterals) {
      ledger.addCollateral(c.address, c.decimals, c.oracleConfig);
      oracle.set(c.oracleConfig, c.oracleValues);

      if (c.xFeeMint.length > 0) ledger.setFees(c.address, c.xFeeMint, c.yFeeMint, "mint");
      if (c.xFeeBurn.length > 0) ledger.setFees(c.address, c.xFeeBurn, c.yFeeBurn, "burn");
      if (c.isMintLive && c.xFeeMint.length > 0) ledger.togglePause(c.address, "mint");
      if (c.isBurnLive && c.xFeeBurn.length > 0) ledger.togglePause(c.address, "burn");

      if (c.stablecoinsFromCollateral > 0n) ledger.adjustStablecoins(c.address, c.stablecoinsFromCollateral, true);

      tokens.seedCustody(c.address, c.custodyBalance);
      if (c.isManaged) {
        ledger.setCollateralManager(c.address, c.managerConfig, manager);
        tokens.seedCustody(c.address, c.managerAvailable, true);
      }
    }

    return new ExposureSolver({ ledger, oracle, manager, tokens });
  }

  /**
   * Fetch the latest state from chain and create a fresh ExposureSolver instance
   */
  async sync(): Promise<ExposureSolver> {
    const data = await this.reader.getIssuerData();
    this._lastFetchedData = data;
    this._solver = IssuerState.buildSolver(data);
    this.log.info({ collaterals: data.collaterals.length, issued: data.stablecoinsIssued.toString(), msg: "Issuer state synced" });
    return this._solver;
  }

  /**
   * Get the current ExposureSolver instance (fetches if not yet initialized)
   */
  async getSolver(): Promise<ExposureSolver> {
    if (!this._solver) {
      return this.sync();
    }
    return this._solver;
  }

  get lastFetchedData(): IssuerData | null {
    return this._lastFetchedData;
  }

  get solver(): ExposureSolver | null {
    return this._solver;
  }
}
