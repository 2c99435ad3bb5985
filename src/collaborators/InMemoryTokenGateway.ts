import { getAddress } from "ethers";
import { ManagerConfig, TokenGateway } from "./types";

/**
 * Token stand-in keeping plain balance maps. Each call checks its balances
 * before moving anything, so a failed call changes nothing. A burn stays
 * pending until the collateral payout that follows it; a failed payout
 * re-credits the burnt stablecoins.
 */
export class InMemoryTokenGateway implements TokenGateway {
  public readonly stablecoin: string;
  private readonly holdings = new Map<string, Map<string, bigint>>();
  private readonly custody = new Map<string, bigint>();
  private readonly managed = new Map<string, bigint>();
  private pendingBurn: { from: string; amount: bigint } | null = null;

  constructor(stablecoin: string) {
    this.stablecoin = getAddress(stablecoin);
  }

  balanceOf(token: string, holder: string): bigint {
    return this.holdings.get(getAddress(holder))?.get(getAddress(token)) ?? 0n;
  }

  private setBalance(token: string, holder: string, amount: bigint): void {
    const h = getAddress(holder);
    let book = this.holdings.get(h);
    if (!book) {
      book = new Map();
      this.holdings.set(h, book);
    }
    book.set(getAddress(token), amount);
  }

  fund(token: string, holder: string, amount: bigint): void {
    this.setBalance(token, holder, this.balanceOf(token, holder) + amount);
  }

  seedCustody(asset: string, amount: bigint, managed = false): void {
    const book = managed ? this.managed : this.custody;
    const a = getAddress(asset);
    book.set(a, (book.get(a) ?? 0n) + amount);
  }

  custodyBalance(asset: string): bigint {
    return this.custody.get(getAddress(asset)) ?? 0n;
  }

  managedBalance(asset: string): bigint {
    return this.managed.get(getAddress(asset)) ?? 0n;
  }

  // everything deployed through the manager comes back under direct custody
  releaseManaged(asset: string): bigint {
    const a = getAddress(asset);
    const amount = this.managed.get(a) ?? 0n;
    this.managed.set(a, 0n);
    this.custody.set(a, (this.custody.get(a) ?? 0n) + amount);
    return amount;
  }

  transferCollateral(
    asset: string,
    managerTarget: ManagerConfig | null,
    recipient: string,
    amount: bigint,
    isMint: boolean,
  ): void {
    const a = getAddress(asset);
    const book = managerTarget !== null ? this.managed : this.custody;
    const held = book.get(a) ?? 0n;

    if (isMint) {
      const payerBalance = this.balanceOf(a, recipient);
      if (payerBalance < amount) throw new Error(`transferCollateral: ${recipient} holds ${payerBalance} < ${amount}`);
      this.setBalance(a, recipient, payerBalance - amount);
      book.set(a, held + amount);
    } else {
      const burn = this.pendingBurn;
      this.pendingBurn = null;
      if (held < amount) {
        if (burn) this.fund(this.stablecoin, burn.from, burn.amount);
        throw new Error(`transferCollateral: issuer holds ${held} < ${amount}`);
      }
      book.set(a, held - amount);
      this.fund(a, recipient, amount);
    }
  }

  mint(to: string, amount: bigint): void {
    this.fund(this.stablecoin, to, amount);
  }

  burnSelf(amount: bigint, from: string): void {
    const balance = this.balanceOf(this.stablecoin, from);
    if (balance < amount) throw new Error(`burnSelf: ${from} holds ${balance} < ${amount}`);
    this.setBalance(this.stablecoin, from, balance - amount);
    this.pendingBurn = { from, amount };
  }
}
