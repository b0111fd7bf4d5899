import { HodataError } from "@hodata/core";

/**
 * Thrown at registration when a composite name is already associated with
 * a different call implementation.
 */
export class AssociationConflictError extends HodataError {
  constructor(
    readonly typeName: string,
    options?: ErrorOptions,
  ) {
    super(
      "HO_ASSOCIATION_CONFLICT",
      `'${typeName}' is already associated with a different function type`,
      options,
    );
    this.name = "AssociationConflictError";
  }
}

/**
 * Thrown when a value reaching the call protocol is neither a callable
 * handle nor a function variant of a registered composite.
 */
export class MissingAssociationError extends HodataError {
  constructor(readonly received: string) {
    super(
      "HO_MISSING_ASSOCIATION",
      `No function type is associated with ${received}: expected a callable handle ` +
        `or a function variant created by a registered higher order type`,
    );
    this.name = "MissingAssociationError";
  }
}

/**
 * Thrown when pairing a container with a leaf, or two leaves of different kinds.
 */
export class ShapeMismatchError extends HodataError {
  constructor(
    readonly path: string,
    readonly left: string,
    readonly right: string,
  ) {
    super("HO_SHAPE_MISMATCH", `Cannot pair ${left} with ${right} at ${path}`);
    this.name = "ShapeMismatchError";
  }
}

/**
 * Thrown when pairing arrays of different lengths under the "error" policy.
 */
export class LengthMismatchError extends HodataError {
  constructor(
    readonly path: string,
    readonly leftLength: number,
    readonly rightLength: number,
  ) {
    super(
      "HO_LENGTH_MISMATCH",
      `Cannot pair arrays of length ${leftLength} and ${rightLength} at ${path}`,
    );
    this.name = "LengthMismatchError";
  }
}
