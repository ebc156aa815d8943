/**
 * Error taxonomy for tracing and program assembly
 *
 * Every failure raised while building a graph or assembling a program is an
 * instance of {@link EdslError}. Errors are thrown eagerly at the offending
 * construction call, or by the assembler for properties that are only known
 * once the whole graph is visible.
 */

/**
 * Structured details attached to an error for diagnostics
 */
export type ErrorContext = Readonly<Record<string, unknown>>;

// =============================================================================
// Base Error
// =============================================================================

export class EdslError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = 'EdslError';
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

/**
 * Dimension mismatch, negative or unresolvable size, reshape size mismatch
 *
 * @example
 * const [N] = g.dims(1);
 * A.bindDims(N); // binds N to 3
 * B.bindDims(N); // B has 4 elements -> ShapeError
 */
export class ShapeError extends EdslError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ShapeError';
  }
}

/**
 * Wrong number of dimensions or indices for a tensor
 */
export class RankError extends EdslError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    context?: ErrorContext,
  ) {
    super(message, { expected, actual, ...context });
    this.name = 'RankError';
  }
}

/**
 * Illegal dtype combination, narrowing, or a literal that cannot be
 * represented in the dtype it is combined with
 */
export class DTypeError extends EdslError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'DTypeError';
  }
}

/**
 * Elementwise operands whose shapes cannot be broadcast together
 */
export class BroadcastError extends EdslError {
  constructor(
    message: string,
    public readonly shapes: readonly (readonly number[])[],
  ) {
    super(message, { shapes });
    this.name = 'BroadcastError';
  }
}

/**
 * A contraction index whose range cannot be derived from accesses or constraints
 */
export class UnboundIndexError extends EdslError {
  constructor(
    message: string,
    public readonly index: string,
    context?: ErrorContext,
  ) {
    super(message, { index, ...context });
    this.name = 'UnboundIndexError';
  }
}

/**
 * Index arithmetic that leaves the affine fragment (index times index,
 * arithmetic on a floor division, floor division in a constraint)
 */
export class IndexExpressionError extends EdslError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'IndexExpressionError';
  }
}

/**
 * Misuse of the contraction builder (missing or repeated aggregation)
 */
export class ContractionError extends EdslError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ContractionError';
  }
}

/**
 * A program requested over a graph with unresolved nodes, or a contraction
 * whose write pattern is not well defined
 */
export class AssemblyError extends EdslError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'AssemblyError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Exhaustiveness check for switches over tagged unions
 *
 * @example
 * switch (node.kind) {
 *   case 'placeholder': ...
 *   case 'constant': ...
 *   default:
 *     return assertExhaustiveSwitch(node); // compile error if a kind is missing
 * }
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
