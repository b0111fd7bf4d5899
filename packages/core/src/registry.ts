/**
 * Generic Registry<K, V>
 *
 * A consistent, type-safe replacement for ad-hoc Map-based registries, with
 * a configurable policy for keys that are registered twice.
 */

import { RegistryError } from "./errors.js";

/**
 * Duplicate handling strategy for registry entries.
 */
export type DuplicateStrategy =
  | "error" // Throw on duplicate (default)
  | "skip" // Keep the existing entry; with valueEquals, throw if the values differ
  | "replace"; // Replace existing entry

/**
 * Options for creating a Registry instance.
 */
export interface RegistryOptions<V> {
  /** How to handle duplicate entries (default: "error") */
  duplicateStrategy?: DuplicateStrategy;

  /** Equality check for values (used with "skip" strategy) */
  valueEquals?: (a: V, b: V) => boolean;

  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs.
 *
 * @example
 * ```typescript
 * const handlers = createGenericRegistry<string, Handler>({
 *   name: "Handlers",
 *   duplicateStrategy: "skip",
 *   valueEquals: (a, b) => a.run === b.run,
 * });
 *
 * handlers.set("point", pointHandler);
 * handlers.set("point", pointHandler); // no-op
 * handlers.set("point", otherHandler); // throws RegistryError
 * ```
 */
export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  /** Register a new entry */
  set(key: K, value: V): void;

  /** Get an entry by key */
  get(key: K): V | undefined;

  /** Check if a key exists */
  has(key: K): boolean;

  /** Delete an entry */
  delete(key: K): boolean;

  /** Get all entries */
  entries(): IterableIterator<[K, V]>;

  /** Get all keys */
  keys(): IterableIterator<K>;

  /** Get all values */
  values(): IterableIterator<V>;

  /** Number of entries */
  readonly size: number;

  /** Registry name used in error messages */
  readonly name: string;

  /** Clear all entries */
  clear(): void;

  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private readonly strategy: DuplicateStrategy;
  private readonly valueEquals: ((a: V, b: V) => boolean) | undefined;
  readonly name: string;

  constructor(options: RegistryOptions<V> = {}) {
    this.strategy = options.duplicateStrategy ?? "error";
    this.valueEquals = options.valueEquals;
    this.name = options.name ?? "Registry";
  }

  set(key: K, value: V): void {
    const existing = this.store.get(key);

    if (existing !== undefined) {
      switch (this.strategy) {
        case "error":
          throw new RegistryError(
            this.name,
            String(key),
            `${this.name}: entry for key '${String(key)}' already exists`,
          );

        case "skip":
          if (this.valueEquals && !this.valueEquals(existing, value)) {
            throw new RegistryError(
              this.name,
              String(key),
              `${this.name}: different value for key '${String(key)}' already exists`,
            );
          }
          return;

        case "replace":
          break;
      }
    }

    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this.store.entries();
  }

  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

/**
 * Create a new generic registry instance.
 */
export function createGenericRegistry<K, V>(
  options?: RegistryOptions<V>,
): GenericRegistry<K, V> {
  return new GenericRegistryImpl<K, V>(options);
}
