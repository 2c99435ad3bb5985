import { AbiCoder, Contract, JsonRpcProvider, Provider } from "ethers";
import { OracleValues } from "../collaborators/SnapshotOracle";

const ISSUER_ABI = [
  "function stablecoin() view returns (address)",
  "function getCollateralList() view returns (address[])",
  "function getCollateralDecimals(address collateral) view returns (uint8)",
  "function getCollateralMintFees(address collateral) view returns (uint64[] xFeeMint, int64[] yFeeMint)",
  "function getCollateralBurnFees(address collateral) view returns (uint64[] xFeeBurn, int64[] yFeeBurn)",
  "function getIssuedByCollateral(address collateral) view returns (uint256 stablecoinsFromCollateral, uint256 stablecoinsIssued)",
  "function getOracle(address collateral) view returns (uint8 oracleType, uint8 targetType, bytes oracleData, bytes targetData, bytes hyperparameters)",
  "function getOracleValues(address collateral) view returns (uint256 mint, uint256 burn, uint256 ratio)",
  "function isPaused(address collateral, uint8 action) view returns (bool)",
  "function getManagerData(address collateral) view returns (bool isManaged, bytes config)",
];

const ERC20_ABI = [
  "function balanceOf(address owner) view returns (uint256)",
];

const MANAGER_ABI = [
  "function maxAvailable() view returns (uint256)",
];

// isPaused action ids
const ACTION_MINT = 0;
const ACTION_BURN = 1;

export interface CollateralData {
  address: string;
  decimals: number;
  oracleConfig: string;
  oracleValues: OracleValues;
  xFeeMint: bigint[];
  yFeeMint: bigint[];
  xFeeBurn: bigint[];
  yFeeBurn: bigint[];
  stablecoinsFromCollateral: bigint;
  isMintLive: boolean;
  isBurnLive: boolean;
  isManaged: boolean;
  managerConfig: string;
  custodyBalance: bigint;
  managerAvailable: bigint;
}

export interface IssuerData {
  stablecoin: string;
  stablecoinsIssued: bigint;
  collaterals: CollateralData[];
}

/**
 * Reader for a deployed issuer contract. Collects everything the local
 * Swapper needs to quote and settle against a copy of on-chain state.
 */
export class IssuerReader {
  private contract: Contract;
  public readonly provider: Provider;
  public readonly address: string;

  constructor(issuerAddress: string, provider: Provider) {
    this.address = issuerAddress;
    this.provider = provider;
    this.contract = new Contract(issuerAddress, ISSUER_ABI, provider);
  }

  static fromRpcUrl(issuerAddress: string, rpcUrl: string): IssuerReader {
    const provider = new JsonRpcProvider(rpcUrl);
    return new IssuerReader(issuerAddress, provider);
  }

  async getStablecoin(): Promise<string> {
    return await this.contract.stablecoin();
  }

  async getCollateralList(): Promise<string[]> {
    const list: string[] = await this.contract.getCollateralList();
    return list.map((a) => String(a));
  }

  async getDecimals(collateral: string): Promise<number> {
    return Number(await this.contract.getCollateralDecimals(collateral));
  }

  async getFees(collateral: string, mint: boolean): Promise<{ xFee: bigint[]; yFee: bigint[] }> {
    const [xFee, yFee] = mint
      ? await this.contract.getCollateralMintFees(collateral)
      : await this.contract.getCollateralBurnFees(collateral);
    return {
      xFee: Array.from(xFee, (v: bigint) => BigInt(v)),
      yFee: Array.from(yFee, (v: bigint) => BigInt(v)),
    };
  }

  async getIssuedByCollateral(collateral: string): Promise<{ stablecoinsFromCollateral: bigint; stablecoinsIssued: bigint }> {
    const [stablecoinsFromCollateral, stablecoinsIssued] = await this.contract.getIssuedByCollateral(collateral);
    return { stablecoinsFromCollateral: BigInt(stablecoinsFromCollateral), stablecoinsIssued: BigInt(stablecoinsIssued) };
  }

  /**
   * Oracle descriptor packed into one opaque blob, so identical feeds hash to
   * the same value.
   */
  async getOracleConfig(collateral: string): Promise<string> {
    const [oracleType, targetType, oracleData, targetData, hyperparameters] = await this.contract.getOracle(collateral);
    return AbiCoder.defaultAbiCoder().encode(
      ["uint8", "uint8", "bytes", "bytes", "bytes"],
      [oracleType, targetType, oracleData, targetData, hyperparameters],
    );
  }

  async getOracleValues(collateral: string): Promise<OracleValues> {
    const [mint, burn, ratio] = await this.contract.getOracleValues(collateral);
    return { mintPrice: BigInt(mint), burnPrice: BigInt(burn), deviation: BigInt(ratio) };
  }

  async isPaused(collateral: string, mint: boolean): Promise<boolean> {
    return await this.contract.isPaused(collateral, mint ? ACTION_MINT : ACTION_BURN);
  }

  async getManagerData(collateral: string): Promise<{ isManaged: boolean; config: string }> {
    const [isManaged, config] = await this.contract.getManagerData(collateral);
    return { isManaged: Boolean(isManaged), config: String(config) };
  }

  /**
   * Liquid collateral of a manager; its config is abi-encoded as
   * (uint8 managerType, bytes data) with data holding the manager address.
   */
  async getManagerAvailable(managerConfig: string): Promise<bigint> {
    const coder = AbiCoder.defaultAbiCoder();
    const [, data] = coder.decode(["uint8", "bytes"], managerConfig);
    const [managerAddress] = coder.decode(["address"], data);
    const manager = new Contract(String(managerAddress), MANAGER_ABI, this.provider);
    return BigInt(await manager.maxAvailable());
  }

  async getCustodyBalance(collateral: string): Promise<bigint> {
    const token = new Contract(collateral, ERC20_ABI, this.provider);
    return BigInt(await token.balanceOf(this.address));
  }

  async getCollateralData(collateral: string): Promise<CollateralData> {
    const [decimals, oracleConfig, oracleValues, mintFees, burnFees, issued, mintPaused, burnPaused, managerData, custodyBalance] =
      await Promise.all([
        this.getDecimals(collateral),
        this.getOracleConfig(collateral),
        this.getOracleValues(collateral),
        this.getFees(collateral, true),
        this.getFees(collateral, false),
        this.getIssuedByCollateral(collateral),
        this.isPaused(collateral, true),
        this.isPaused(collateral, false),
        this.getManagerData(collateral),
        this.getCustodyBalance(collateral),
      ]);

    const managerAvailable = managerData.isManaged ? await this.getManagerAvailable(managerData.config) : 0n;

    return {
      address: collateral,
      decimals,
      oracleConfig,
      oracleValues,
      xFeeMint: mintFees.xFee,
      yFeeMint: mintFees.yFee,
      xFeeBurn: burnFees.xFee,
      yFeeBurn: burnFees.yFee,
      stablecoinsFromCollateral: issued.stablecoinsFromCollateral,
      isMintLive: !mintPaused,
      isBurnLive: !burnPaused,
      isManaged: managerData.isManaged,
      managerConfig: managerData.config,
      custodyBalance,
      managerAvailable,
    };
  }

  /**
   * Get all issuer data needed to initialize a local Ledger/Swapper
   */
  async getIssuerData(): Promise<IssuerData> {
    const [stablecoin, list] = await Promise.all([this.getStablecoin(), this.getCollateralList()]);
    const collaterals = await Promise.all(list.map((c) => this.getCollateralData(c)));
    const stablecoinsIssued = list.length > 0
      ? (await this.getIssuedByCollateral(list[0])).stablecoinsIssued
      : 0n;
    return { stablecoin, stablecoinsIssued, collaterals };
  }
}
