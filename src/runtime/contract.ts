import { ApiError } from '../middlewares/errorHandler';
import { EventInput, EventType } from '../types/events';
import { Address, ZERO_ADDRESS, isZeroAddress } from './address';
import { CallContext, DeployedContract, LedgerRuntime } from './runtime';
import { Codec, StorageMap, StorageValue, addressCodec } from './storage';

/**
 * Base class for a ledger living in a LedgerRuntime. Owns its storage tables
 * and raises notifications stamped with its own address.
 */
export abstract class Contract implements DeployedContract {
  readonly address: Address;
  protected readonly runtime: LedgerRuntime;

  protected constructor(runtime: LedgerRuntime, address: Address) {
    this.runtime = runtime;
    this.address = address;
  }

  protected map<V>(name: string, codec: Codec<V>): StorageMap<V> {
    return this.runtime.createTable(this.address, name, codec);
  }

  protected value<V>(name: string, codec: Codec<V>): StorageValue<V> {
    return new StorageValue(this.map(name, codec));
  }

  protected emit(event: EventInput): void {
    this.runtime.emit({ ...event, contract: this.address });
  }

  /**
   * Context for a call this ledger makes into another one.
   */
  protected self(): CallContext {
    return { sender: this.address };
  }

  /**
   * Look up a ledger by address and check it offers the capability we need.
   */
  protected resolvePort<P>(address: Address, guard: (candidate: unknown) => candidate is P): P {
    const target = this.runtime.resolve(address);
    if (!guard(target)) {
      throw ApiError.contractUnreachable(address);
    }
    return target;
  }
}

/**
 * A ledger with a single administrative owner.
 */
export abstract class OwnedContract extends Contract {
  private readonly ownerSlot: StorageValue<Address>;

  protected constructor(runtime: LedgerRuntime, address: Address, owner: Address) {
    super(runtime, address);
    this.ownerSlot = this.value('owner', addressCodec);
    this.ownerSlot.initialize(owner);
  }

  owner(): Address {
    return this.ownerSlot.get();
  }

  transferOwnership(ctx: CallContext, newOwner: Address): void {
    this.requireOwner(ctx);
    if (isZeroAddress(newOwner)) {
      throw ApiError.invalidAddress('New owner is the zero address');
    }
    this.setOwner(newOwner);
  }

  renounceOwnership(ctx: CallContext): void {
    this.requireOwner(ctx);
    this.setOwner(ZERO_ADDRESS);
  }

  protected requireOwner(ctx: CallContext): void {
    if (ctx.sender !== this.owner()) {
      throw ApiError.notOwner();
    }
  }

  private setOwner(newOwner: Address): void {
    const previousOwner = this.owner();
    this.ownerSlot.set(newOwner);
    this.emit({
      eventType: EventType.OWNERSHIP_TRANSFERRED,
      payload: { previousOwner, newOwner },
    });
  }
}
