/**
 * Contracts the engine consumes from its collaborators. Every call is
 * synchronous and must not re-enter the ledger.
 */

export type OracleConfig = string;  // opaque hex bytes
export type OracleStorage = string; // opaque hex bytes
export type ManagerConfig = string; // opaque hex bytes

export interface BurnReading {
  price: bigint;     // BASE_18, stablecoins per collateral unit
  deviation: bigint; // BASE_18, 1.0 = on peg
}

export interface OracleReader {
  readMint(config: OracleConfig, storage: OracleStorage): bigint;
  readBurn(config: OracleConfig, storage: OracleStorage): BurnReading;
}

export interface ManagerGateway {
  /** collateral the manager can release right now, in collateral decimals */
  maxAvailable(asset: string): bigint;
  pullAll(asset: string, managerConfig: ManagerConfig): void;
}

/**
 * Token movements of one settlement: collateral in and stablecoins minted, or
 * stablecoins burnt and collateral out. The swapper rolls back only its
 * ledger when a call throws, so a gateway must apply the two movements of a
 * settlement together or not at all: if `transferCollateral` fails after
 * `burnSelf` succeeded, the burn has to be undone by the gateway.
 */
export interface TokenGateway {
  transferCollateral(
    asset: string,
    managerTarget: ManagerConfig | null,
    recipient: string,
    amount: bigint,
    isMint: boolean,
  ): void;
  mint(to: string, amount: bigint): void;
  burnSelf(amount: bigint, from: string): void;
  /** collateral held directly by the issuer, in collateral decimals */
  custodyBalance(asset: string): bigint;
}
