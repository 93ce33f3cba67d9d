/**
 * Token Ledger
 *
 * The user-facing token: balances and allowances, mint on bridge deposit,
 * burn on withdraw, migration from the legacy token, and holdInEscrow, which
 * moves tokens into the escrow ledger and credits them under a user/job id.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  Address,
  CallContext,
  LedgerRuntime,
  StorageValue,
  ZERO_ADDRESS,
  addressCodec,
  decodeUint256Word,
  isZeroAddress,
} from '../../runtime';
import { EventType } from '../../types/events';
import { isEscrowFundingPort, isLegacyBalanceSource } from '../ledger/ledger.ports';
import { Erc20Ledger, TokenMetadata } from './erc20.ledger';

export interface TokenLedgerOptions extends TokenMetadata {
  owner: Address;
  bridgeManager: Address;
  escrowContractAddress?: Address;
  legacyTokenAddress?: Address;
}

export class TokenLedger extends Erc20Ledger {
  private readonly escrowAddressSlot: StorageValue<Address>;
  private readonly bridgeManagerSlot: StorageValue<Address>;
  private readonly legacyTokenSlot: StorageValue<Address>;

  constructor(runtime: LedgerRuntime, address: Address, options: TokenLedgerOptions) {
    super(runtime, address, options.owner, {
      name: options.name,
      symbol: options.symbol,
      decimals: options.decimals,
    });

    this.escrowAddressSlot = this.value('escrowContractAddress', addressCodec);
    this.bridgeManagerSlot = this.value('bridgeManager', addressCodec);
    this.legacyTokenSlot = this.value('legacyToken', addressCodec);

    this.escrowAddressSlot.initialize(options.escrowContractAddress ?? ZERO_ADDRESS);
    this.bridgeManagerSlot.initialize(options.bridgeManager);
    this.legacyTokenSlot.initialize(options.legacyTokenAddress ?? ZERO_ADDRESS);
  }

  escrowContractAddress(): Address {
    return this.escrowAddressSlot.get();
  }

  bridgeManager(): Address {
    return this.bridgeManagerSlot.get();
  }

  legacyTokenAddress(): Address {
    return this.legacyTokenSlot.get();
  }

  /**
   * Move `amount` to the escrow ledger and credit it under `userId` there.
   * Both legs commit together: if the escrow credit fails, so does the debit.
   */
  holdInEscrow(ctx: CallContext, userId: string, amount: bigint): boolean {
    const escrowAddress = this.escrowContractAddress();
    if (isZeroAddress(escrowAddress)) {
      throw ApiError.escrowNotConfigured();
    }

    this.transfer(ctx, escrowAddress, amount);

    const escrow = this.resolvePort(escrowAddress, isEscrowFundingPort);
    escrow.fundUser(this.self(), userId, amount);

    this.emit({
      eventType: EventType.TOKENS_ESCROWED,
      payload: { sender: ctx.sender, userId, amount: amount.toString() },
    });
    return true;
  }

  setEscrowContractAddress(ctx: CallContext, escrowAddress: Address): void {
    this.requireOwner(ctx);
    if (isZeroAddress(escrowAddress)) {
      throw ApiError.invalidAddress('Escrow contract address must not be the zero address');
    }
    this.escrowAddressSlot.set(escrowAddress);
    this.emit({
      eventType: EventType.ESCROW_CONTRACT_ADDRESS_UPDATED,
      payload: { escrowAddress },
    });
  }

  updateBridgeManager(ctx: CallContext, bridgeManager: Address): void {
    this.requireOwner(ctx);
    if (isZeroAddress(bridgeManager)) {
      throw ApiError.invalidAddress('Bridge manager must not be the zero address');
    }
    this.bridgeManagerSlot.set(bridgeManager);
    this.emit({
      eventType: EventType.BRIDGE_MANAGER_UPDATED,
      payload: { bridgeManager },
    });
  }

  /**
   * Bridge credit: mint the amount encoded in `depositData` to `user`.
   */
  deposit(ctx: CallContext, user: Address, depositData: string): bigint {
    if (ctx.sender !== this.bridgeManager()) {
      throw ApiError.notAuthorized('Caller is not the bridge manager');
    }
    const amount = decodeUint256Word(depositData);
    this.mintTo(user, amount);
    return amount;
  }

  withdraw(ctx: CallContext, amount: bigint): void {
    this.burnFrom(ctx.sender, amount);
  }

  /**
   * Pull the caller's whole legacy balance into this ledger's legacy account
   * and mint the same amount here. The caller must have approved this ledger
   * for at least that balance on the legacy token.
   */
  migrate(ctx: CallContext): bigint {
    const legacyAddress = this.legacyTokenAddress();
    if (isZeroAddress(legacyAddress)) {
      throw ApiError.migrationNotConfigured();
    }
    const legacy = this.resolvePort(legacyAddress, isLegacyBalanceSource);

    const amount = legacy.balanceOf(ctx.sender);
    if (legacy.allowance(ctx.sender, this.address) < amount) {
      throw ApiError.insufficientAllowance('Legacy balance must be approved before migrating');
    }

    legacy.transferFrom(this.self(), ctx.sender, this.address, amount);
    this.mintTo(ctx.sender, amount);

    this.emit({
      eventType: EventType.TOKENS_MIGRATED,
      payload: { account: ctx.sender, amount: amount.toString() },
    });
    return amount;
  }
}
