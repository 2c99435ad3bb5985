import { getAddress } from "ethers";
import { InMemoryTokenGateway } from "./InMemoryTokenGateway";
import { ManagerConfig, ManagerGateway } from "./types";

/**
 * Manager stand-in: funds sit in the gateway's managed book and only a
 * configurable slice of them is liquid.
 */
export class SnapshotManager implements ManagerGateway {
  private readonly liquidity = new Map<string, bigint>();
  private readonly tokens: InMemoryTokenGateway;

  constructor(tokens: InMemoryTokenGateway) {
    this.tokens = tokens;
  }

  setLiquidity(asset: string, amount: bigint): void {
    this.liquidity.set(getAddress(asset), amount);
  }

  maxAvailable(asset: string): bigint {
    const managed = this.tokens.managedBalance(asset);
    const liquid = this.liquidity.get(getAddress(asset));
    return liquid === undefined || liquid > managed ? managed : liquid;
  }

  pullAll(asset: string, _managerConfig: ManagerConfig): void {
    this.tokens.releaseManaged(asset);
    this.liquidity.delete(getAddress(asset));
  }
}
