/**
 * Escrow Ledger
 *
 * Holds tokens under opaque user/job identifiers until the disbursal
 * authority pays them out. Credits arrive only from the configured token
 * ledger (via holdInEscrow); payouts are token transfers from this ledger's
 * own token balance.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  Address,
  CallContext,
  LedgerRuntime,
  OwnedContract,
  StorageMap,
  StorageValue,
  addressCodec,
  checkedAdd,
  checkedSub,
  isZeroAddress,
  uint256Codec,
} from '../../runtime';
import { EventType } from '../../types/events';
import { TokenTransferPort, isTokenTransferPort } from '../ledger/ledger.ports';

export class EscrowLedger extends OwnedContract {
  private readonly userBalances: StorageMap<bigint>;
  private readonly escrowedTotal: StorageValue<bigint>;
  private readonly disbursalSlot: StorageValue<Address>;
  private readonly tokenSlot: StorageValue<Address>;

  /**
   * Disbursal authority starts out as the owner.
   */
  constructor(runtime: LedgerRuntime, address: Address, owner: Address, renderTokenAddress: Address) {
    super(runtime, address, owner);
    if (isZeroAddress(renderTokenAddress)) {
      throw ApiError.invalidAddress('Token address must not be the zero address');
    }

    this.userBalances = this.map('userBalances', uint256Codec);
    this.escrowedTotal = this.value('totalEscrowed', uint256Codec);
    this.disbursalSlot = this.value('disbursalAddress', addressCodec);
    this.tokenSlot = this.value('renderTokenAddress', addressCodec);

    this.disbursalSlot.initialize(owner);
    this.tokenSlot.initialize(renderTokenAddress);
  }

  disbursalAddress(): Address {
    return this.disbursalSlot.get();
  }

  renderTokenAddress(): Address {
    return this.tokenSlot.get();
  }

  userBalance(userId: string): bigint {
    return this.userBalances.get(userId);
  }

  jobBalance(jobId: string): bigint {
    return this.userBalance(jobId);
  }

  totalEscrowed(): bigint {
    return this.escrowedTotal.get();
  }

  fundUser(ctx: CallContext, userId: string, amount: bigint): void {
    if (ctx.sender !== this.renderTokenAddress()) {
      throw ApiError.notAuthorized('Only the token ledger can fund escrow');
    }

    const balance = checkedAdd(this.userBalance(userId), amount);
    this.userBalances.set(userId, balance);
    this.escrowedTotal.set(checkedAdd(this.escrowedTotal.get(), amount));
    this.emitBalance(userId, balance);
  }

  fundJob(ctx: CallContext, jobId: string, amount: bigint): void {
    this.fundUser(ctx, jobId, amount);
  }

  /**
   * Pay `amounts[i]` to `recipients[i]` in order out of `userId`'s balance.
   *
   * The total is not checked up front. If recipient i fails, payouts 0..i-1
   * stay committed along with a balance update, and the error is raised.
   */
  disburseFunds(ctx: CallContext, userId: string, recipients: Address[], amounts: bigint[]): void {
    if (ctx.sender !== this.disbursalAddress()) {
      throw ApiError.notAuthorized('Caller is not the disbursal authority');
    }
    if (this.userBalance(userId) === 0n) {
      throw ApiError.noBalance();
    }
    if (recipients.length !== amounts.length) {
      throw ApiError.lengthMismatch();
    }

    const token = this.resolvePort(this.renderTokenAddress(), isTokenTransferPort);

    let paid = 0;
    for (let i = 0; i < recipients.length; i++) {
      try {
        this.runtime.savepoint(() => this.payOut(token, userId, recipients[i], amounts[i]));
      } catch (error) {
        if (paid > 0) {
          this.emitBalance(userId, this.userBalance(userId));
          this.runtime.settle();
        }
        throw error;
      }
      paid++;
    }

    this.emitBalance(userId, this.userBalance(userId));
  }

  disburseJob(ctx: CallContext, jobId: string, recipients: Address[], amounts: bigint[]): void {
    this.disburseFunds(ctx, jobId, recipients, amounts);
  }

  changeDisbursalAddress(ctx: CallContext, disbursalAddress: Address): void {
    this.requireOwner(ctx);
    this.disbursalSlot.set(disbursalAddress);
    this.emit({
      eventType: EventType.DISBURSAL_ADDRESS_UPDATED,
      payload: { disbursalAddress },
    });
  }

  changeRenderTokenAddress(ctx: CallContext, renderTokenAddress: Address): void {
    this.requireOwner(ctx);
    if (isZeroAddress(renderTokenAddress)) {
      throw ApiError.invalidAddress('Token address must not be the zero address');
    }
    this.tokenSlot.set(renderTokenAddress);
    this.emit({
      eventType: EventType.RENDER_TOKEN_ADDRESS_UPDATED,
      payload: { renderTokenAddress },
    });
  }

  private payOut(
    token: TokenTransferPort,
    userId: string,
    recipient: Address,
    amount: bigint
  ): void {
    const insufficient = () => ApiError.insufficientEscrowBalance();
    this.userBalances.set(userId, checkedSub(this.userBalance(userId), amount, insufficient));
    this.escrowedTotal.set(checkedSub(this.escrowedTotal.get(), amount, insufficient));
    token.transfer(this.self(), recipient, amount);
  }

  private emitBalance(userId: string, balance: bigint): void {
    this.emit({
      eventType: EventType.USER_BALANCE_UPDATE,
      payload: { userId, balance: balance.toString() },
    });
  }
}
