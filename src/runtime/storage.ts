import { Address, ZERO_ADDRESS, toAddress } from './address';

/**
 * String encoding of a stored value, used when slots are persisted and reloaded.
 */
export interface Codec<V> {
  readonly zero: V;
  encode(value: V): string;
  decode(raw: string): V;
}

export const uint256Codec: Codec<bigint> = {
  zero: 0n,
  encode: (value) => value.toString(10),
  decode: (raw) => BigInt(raw),
};

export const addressCodec: Codec<Address> = {
  zero: ZERO_ADDRESS,
  encode: (value) => value,
  decode: (raw) => toAddress(raw),
};

export interface JournalEntry {
  table: StorageTable;
  key: string;
  undo(): void;
}

/**
 * Receives every write so the runtime can roll it back.
 */
export interface StorageJournal {
  recordWrite(entry: JournalEntry): void;
}

export interface StorageTable {
  readonly contract: Address;
  readonly name: string;
  encodedValue(key: string): string;
  hydrate(key: string, raw: string): void;
}

export const compositeKey = (...parts: string[]): string => parts.join(':');

/**
 * Keyed storage owned by one contract. Missing keys read as the codec's zero,
 * so accounts exist implicitly and persist at zero.
 */
export class StorageMap<V> implements StorageTable {
  private readonly values = new Map<string, V>();

  constructor(
    private readonly journal: StorageJournal,
    readonly contract: Address,
    readonly name: string,
    private readonly codec: Codec<V>
  ) {}

  get(key: string): V {
    const value = this.values.get(key);
    return value === undefined ? this.codec.zero : value;
  }

  set(key: string, value: V): void {
    const existed = this.values.has(key);
    const previous = this.values.get(key);

    this.journal.recordWrite({
      table: this,
      key,
      undo: () => {
        if (existed && previous !== undefined) {
          this.values.set(key, previous);
        } else {
          this.values.delete(key);
        }
      },
    });

    this.values.set(key, value);
  }

  /**
   * Genesis write: not journaled, not part of any commit.
   */
  initialize(key: string, value: V): void {
    this.values.set(key, value);
  }

  entries(): IterableIterator<[string, V]> {
    return this.values.entries();
  }

  encodedValue(key: string): string {
    return this.codec.encode(this.get(key));
  }

  hydrate(key: string, raw: string): void {
    this.values.set(key, this.codec.decode(raw));
  }
}

const VALUE_KEY = 'value';

/**
 * A single configuration slot (owner, escrow address, total supply, ...).
 */
export class StorageValue<V> {
  constructor(private readonly map: StorageMap<V>) {}

  get(): V {
    return this.map.get(VALUE_KEY);
  }

  set(value: V): void {
    this.map.set(VALUE_KEY, value);
  }

  initialize(value: V): void {
    this.map.initialize(VALUE_KEY, value);
  }
}
