/**
 * Runtime side of the association protocol.
 *
 * Types are erased at runtime, so each composite registers its call logic
 * once under a name. Function variants built through `HoType.fun` carry
 * that name under `variantName`; `dispatcher` turns a handle or such a
 * variant into a function of the argument.
 */

import {
  RegistryError,
  createGenericRegistry,
  createLogger,
  getGlobalTracer,
  invariant,
} from "@hodata/core";
import { type Apply, type TypeFunction, unsafeCoerce } from "@hodata/type-system";
import { AssociationConflictError, MissingAssociationError } from "./errors.js";
import { isFunc } from "./func.js";
import { formatPath, type LeafPath } from "./shape.js";
import { type Variant, isVariant, variantName } from "./variant.js";

/**
 * What a consumer writes once per composite type: how to resolve its
 * function variant against an argument. The usual implementation calls each
 * field with the same argument and reassembles the value.
 */
export interface HoDefinition<V, F extends TypeFunction> {
  /** Registry key, also used in errors and traces. */
  readonly name: string;
  call<X>(f: Apply<F, X>, x: X): V;
}

/**
 * A registered composite type.
 */
export interface HoType<V, F extends TypeFunction> extends HoDefinition<V, F> {
  /**
   * Make a function variant from its fields: a frozen copy stamped with
   * this type's name, which `call`, `resolve` and `hmap` dispatch on.
   */
  fun<X>(fields: Apply<F, X>): Variant<Apply<F, X>>;
}

interface Registered {
  readonly name: string;
  /** The consumer's own call implementation; compared on re-registration. */
  readonly source: unknown;
  readonly call: (f: unknown, x: unknown) => unknown;
}

const log = createLogger("ho");

const definitions = createGenericRegistry<string, Registered>({
  name: "HoRegistry",
  duplicateStrategy: "skip",
  valueEquals: (a, b) => a.source === b.source,
});

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (isObject(value)) return "an untagged object";
  return `a value of type ${typeof value}`;
}

/**
 * Register a composite type's call logic.
 *
 * Registering the same definition twice is a no-op.
 *
 * @throws AssociationConflictError if the name is taken by a different definition
 */
export function defineHo<V, F extends TypeFunction>(definition: HoDefinition<V, F>): HoType<V, F> {
  const { name } = definition;
  const entry: Registered = {
    name,
    source: definition.call,
    call: (f, x) => definition.call<unknown>(unsafeCoerce<unknown, Apply<F, unknown>>(f), x),
  };

  try {
    definitions.set(name, entry);
  } catch (error) {
    if (error instanceof RegistryError) {
      throw new AssociationConflictError(name, { cause: error });
    }
    throw error;
  }

  getGlobalTracer().record("register", name);
  log.debug(`registered '${name}'`);

  return {
    name,
    call(f, x) {
      return definition.call(f, x);
    },
    fun(fields) {
      if (!isObject(fields)) {
        throw new MissingAssociationError(describeValue(fields));
      }
      const variant = { ...fields };
      Object.defineProperty(variant, variantName, { value: name });
      invariant(isVariant(variant), `'${name}' variant was not stamped`);
      Object.freeze(variant);
      return variant;
    },
  };
}

/** Check whether a composite name is registered. */
export function hasHo(name: string): boolean {
  return definitions.has(name);
}

/** Names of all registered composites, in registration order. */
export function listHo(): string[] {
  return [...definitions.keys()];
}

/**
 * Remove every registration (for testing). Variants made earlier stop
 * dispatching until their type is registered again.
 */
export function clearHoRegistry(): void {
  definitions.clear();
}

/**
 * Resolve how `f` is called: a handle is invoked directly, a function
 * variant goes through its registered definition. Resolved once, then
 * shared by every leaf it is applied to; `at` is the leaf's container
 * path, recorded in the trace.
 *
 * @throws MissingAssociationError for anything else
 */
export function dispatcher(f: unknown): (x: unknown, at?: LeafPath) => unknown {
  const tracer = getGlobalTracer();
  const where = (at: LeafPath | undefined): string | undefined =>
    at === undefined || !tracer.isEnabled() ? undefined : formatPath(at);

  if (isFunc(f)) {
    const handle = f;
    return (x, at) => {
      tracer.record("leaf", "handle", where(at));
      return handle(x);
    };
  }

  if (isVariant(f)) {
    const name = f[variantName];
    const entry = definitions.get(name);
    if (!entry) {
      throw new MissingAssociationError(`a function variant of unregistered type '${name}'`);
    }
    const variant = f;
    return (x, at) => {
      tracer.record("composite", entry.name, where(at));
      return entry.call(variant, x);
    };
  }

  throw new MissingAssociationError(describeValue(f));
}
