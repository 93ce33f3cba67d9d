/**
 * ERC-20 style balance and allowance ledger.
 *
 * Shared by the token ledger and the legacy token it migrates from.
 * Failures are raised in a fixed order per operation:
 * - transfer:     InvalidRecipient, InsufficientBalance
 * - transferFrom: InvalidAddress (from), InvalidRecipient, InsufficientAllowance, InsufficientBalance
 * - approve and the relative allowance updates: InvalidAddress (spender)
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  Address,
  CallContext,
  LedgerRuntime,
  OwnedContract,
  StorageMap,
  StorageValue,
  ZERO_ADDRESS,
  checkedAdd,
  checkedSub,
  compositeKey,
  isZeroAddress,
  saturatingSub,
  uint256Codec,
} from '../../runtime';
import { EventType } from '../../types/events';

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

export abstract class Erc20Ledger extends OwnedContract {
  readonly metadata: TokenMetadata;
  private readonly balances: StorageMap<bigint>;
  private readonly allowances: StorageMap<bigint>;
  private readonly supply: StorageValue<bigint>;

  protected constructor(
    runtime: LedgerRuntime,
    address: Address,
    owner: Address,
    metadata: TokenMetadata
  ) {
    super(runtime, address, owner);
    this.metadata = metadata;
    this.balances = this.map('balances', uint256Codec);
    this.allowances = this.map('allowances', uint256Codec);
    this.supply = this.value('totalSupply', uint256Codec);
  }

  name(): string {
    return this.metadata.name;
  }

  symbol(): string {
    return this.metadata.symbol;
  }

  decimals(): number {
    return this.metadata.decimals;
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(compositeKey(owner, spender));
  }

  /**
   * Every account with a stored balance, including those back at zero.
   */
  accounts(): Array<[Address, bigint]> {
    return [...this.balances.entries()];
  }

  transfer(ctx: CallContext, to: Address, amount: bigint): boolean {
    if (isZeroAddress(to)) {
      throw ApiError.invalidRecipient();
    }
    this.move(ctx.sender, to, amount);
    return true;
  }

  approve(ctx: CallContext, spender: Address, amount: bigint): boolean {
    this.setAllowance(ctx.sender, spender, amount);
    return true;
  }

  increaseAllowance(ctx: CallContext, spender: Address, delta: bigint): boolean {
    this.setAllowance(ctx.sender, spender, checkedAdd(this.allowance(ctx.sender, spender), delta));
    return true;
  }

  /**
   * Decreasing past zero leaves the allowance at zero.
   */
  decreaseAllowance(ctx: CallContext, spender: Address, delta: bigint): boolean {
    this.setAllowance(ctx.sender, spender, saturatingSub(this.allowance(ctx.sender, spender), delta));
    return true;
  }

  transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): boolean {
    if (isZeroAddress(from)) {
      throw ApiError.invalidAddress('Cannot transfer from the zero address');
    }
    if (isZeroAddress(to)) {
      throw ApiError.invalidRecipient();
    }

    const key = compositeKey(from, ctx.sender);
    const remaining = checkedSub(this.allowances.get(key), amount, () =>
      ApiError.insufficientAllowance()
    );
    if (amount > this.balanceOf(from)) {
      throw ApiError.insufficientBalance();
    }

    this.allowances.set(key, remaining);
    this.move(from, to, amount);
    return true;
  }

  protected mintTo(to: Address, amount: bigint): void {
    if (isZeroAddress(to)) {
      throw ApiError.invalidRecipient('Cannot mint to the zero address');
    }
    this.supply.set(checkedAdd(this.supply.get(), amount));
    this.balances.set(to, checkedAdd(this.balances.get(to), amount));
    this.emit({
      eventType: EventType.TRANSFER,
      payload: { from: ZERO_ADDRESS, to, value: amount.toString() },
    });
  }

  protected burnFrom(account: Address, amount: bigint): void {
    this.balances.set(
      account,
      checkedSub(this.balances.get(account), amount, () => ApiError.insufficientBalance())
    );
    this.supply.set(this.supply.get() - amount);
    this.emit({
      eventType: EventType.TRANSFER,
      payload: { from: account, to: ZERO_ADDRESS, value: amount.toString() },
    });
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.balances.set(
      from,
      checkedSub(this.balances.get(from), amount, () => ApiError.insufficientBalance())
    );
    this.balances.set(to, checkedAdd(this.balances.get(to), amount));
    this.emit({
      eventType: EventType.TRANSFER,
      payload: { from, to, value: amount.toString() },
    });
  }

  private setAllowance(owner: Address, spender: Address, amount: bigint): void {
    if (isZeroAddress(spender)) {
      throw ApiError.invalidAddress('Cannot approve the zero address');
    }
    this.allowances.set(compositeKey(owner, spender), amount);
    this.emit({
      eventType: EventType.APPROVAL,
      payload: { owner, spender, value: amount.toString() },
    });
  }
}
