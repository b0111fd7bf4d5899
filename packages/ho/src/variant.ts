/**
 * Function-variant brand.
 *
 * A composite's function variant only dispatches at runtime when it was
 * built by `HoType.fun`, which stamps it with the name of its registered
 * type. The same stamp is part of the variant's static type, so a record
 * literal that merely has the right fields does not type-check as one.
 */

/** Key of the registered type name carried by every function variant. */
export const variantName: unique symbol = Symbol("hodata.variantName");

/** The stamp `HoType.fun` adds. */
export interface HoVariant {
  readonly [variantName]: string;
}

/** `T` as produced by `HoType.fun`. */
export type Variant<T> = T & HoVariant;

export function isVariant(value: unknown): value is HoVariant {
  return (
    typeof value === "object" &&
    value !== null &&
    variantName in value &&
    typeof value[variantName] === "string"
  );
}
