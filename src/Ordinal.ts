/**
 * Ordinal and cardinality types.
 *
 * An ordinal identifies one logical position in a replicated, ordered
 * workload. Ordinals are non-negative signed 32-bit integers. A cardinality
 * is the number of members a workload should have.
 *
 * Both are branded numbers: the constructors validate their input, so the
 * allocator only ever sees well-formed values.
 *
 * @since 0.1.0
 */
import * as Brand from "effect/Brand"
import * as Data from "effect/Data"
import * as Either from "effect/Either"
import * as Schema from "effect/Schema"

// =============================================================================
// Constants
// =============================================================================

/**
 * Largest ordinal that fits in a signed 32-bit integer.
 *
 * @since 0.1.0
 * @category constants
 */
export const MAX_ORDINAL = 2_147_483_647

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a caller supplies a negative, fractional or out-of-range
 * ordinal or cardinality.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
  readonly message: string
}> {}

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export type Ordinal = number & Brand.Brand<"Ordinal">

/**
 * @since 0.1.0
 * @category models
 */
export type Cardinality = number & Brand.Brand<"Cardinality">

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an ordinal, throwing `Brand.BrandErrors` when the value is not an
 * integer in `[0, MAX_ORDINAL]`.
 *
 * @example
 * ```ts
 * import { Ordinal } from "ordinal-slots/Ordinal"
 *
 * const third = Ordinal(2)
 * Ordinal.is(-1) // false
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const Ordinal = Brand.refined<Ordinal>(
  (n) => Number.isInteger(n) && n >= 0 && n <= MAX_ORDINAL,
  (n) => Brand.error(`Expected ${n} to be an integer between 0 and ${MAX_ORDINAL}`)
)

/**
 * Largest cardinality: one member per ordinal.
 *
 * @since 0.1.0
 * @category constants
 */
export const MAX_CARDINALITY = MAX_ORDINAL + 1

/**
 * Creates a cardinality, throwing `Brand.BrandErrors` when the value is not
 * an integer in `[0, MAX_CARDINALITY]`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const Cardinality = Brand.refined<Cardinality>(
  (n) => Number.isInteger(n) && n >= 0 && n <= MAX_CARDINALITY,
  (n) => Brand.error(`Expected ${n} to be an integer between 0 and ${MAX_CARDINALITY}`)
)

const toInvalidArgument = (errors: Brand.Brand.BrandErrors): InvalidArgument =>
  new InvalidArgument({ message: errors.map((error) => error.message).join("; ") })

/**
 * Validates an untrusted number as an ordinal.
 *
 * @since 0.1.0
 * @category constructors
 */
export const decodeOrdinal = (n: number): Either.Either<Ordinal, InvalidArgument> =>
  Either.mapLeft(Ordinal.either(n), toInvalidArgument)

/**
 * Validates an untrusted number as a cardinality, e.g. the replica count of
 * a scale request.
 *
 * @example
 * ```ts
 * import { decodeCardinality } from "ordinal-slots/Ordinal"
 * import * as Either from "effect/Either"
 *
 * Either.isLeft(decodeCardinality(-1)) // true
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const decodeCardinality = (n: number): Either.Either<Cardinality, InvalidArgument> =>
  Either.mapLeft(Cardinality.either(n), toInvalidArgument)

// =============================================================================
// Schemas
// =============================================================================

/**
 * @since 0.1.0
 * @category schemas
 */
export const OrdinalSchema: Schema.BrandSchema<Ordinal, number> = Schema.Number.pipe(
  Schema.fromBrand(Ordinal)
)

/**
 * @since 0.1.0
 * @category schemas
 */
export const CardinalitySchema: Schema.BrandSchema<Cardinality, number> = Schema.Number.pipe(
  Schema.fromBrand(Cardinality)
)
