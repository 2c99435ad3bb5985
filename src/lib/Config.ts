export class Config {
  static getRPCUrl(chainId: number): string {
    const rpc = process.env["RPC_" + chainId];
    if (!rpc) {
      throw new Error(`RPC not set in env. Add one as RPC_${chainId}=<url>`);
    }
    return rpc;
  }

  static getIssuerAddress(): string {
    const address = process.env.ISSUER_ADDRESS;
    if (!address) {
      throw new Error("ISSUER_ADDRESS not set in env");
    }
    return address;
  }

  static getChainId(): number {
    const raw = process.env.CHAIN_ID ?? "1";
    const chainId = Number.parseInt(raw, 10);
    if (!Number.isInteger(chainId) || chainId <= 0) {
      throw new Error(`CHAIN_ID must be a positive integer, got "${raw}"`);
    }
    return chainId;
  }

  static getLogLevel(): string {
    return process.env.LOG_LEVEL ?? "info";
  }
}
