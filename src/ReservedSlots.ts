/**
 * Reserved-slot sets.
 *
 * A reserved-slot set holds the ordinals an operator has permanently
 * excluded from allocation. Storage order carries no meaning; allocation
 * always walks the set in ascending order.
 *
 * @since 0.1.0
 */
import * as Array from "effect/Array"
import * as Effect from "effect/Effect"
import type * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import * as Sets from "./internal/sets.js"
import { Ordinal, OrdinalSchema } from "./Ordinal.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export type ReservedSlotSet = ReadonlySet<Ordinal>

// =============================================================================
// Constructors
// =============================================================================

/**
 * The empty reservation set.
 *
 * @since 0.1.0
 * @category constructors
 */
export const empty: ReservedSlotSet = new Set<Ordinal>()

/**
 * @example
 * ```ts
 * import * as ReservedSlots from "ordinal-slots/ReservedSlots"
 * import { Ordinal } from "ordinal-slots/Ordinal"
 *
 * const reserved = ReservedSlots.make(Ordinal(2), Ordinal(4))
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (...ordinals: ReadonlyArray<Ordinal>): ReservedSlotSet => new Set(ordinals)

/**
 * Collapses duplicates.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromIterable = (ordinals: Iterable<Ordinal>): ReservedSlotSet => new Set(ordinals)

// =============================================================================
// Combinators
// =============================================================================

/**
 * @since 0.1.0
 * @category combinators
 */
export const union = (self: ReservedSlotSet, that: Iterable<Ordinal>): ReservedSlotSet =>
  Sets.union(self, that)

/**
 * @since 0.1.0
 * @category combinators
 */
export const difference = (self: ReservedSlotSet, that: Iterable<Ordinal>): ReservedSlotSet =>
  Sets.difference(self, that)

// =============================================================================
// Getters
// =============================================================================

/**
 * Members in ascending numeric order, the order allocation depends on.
 *
 * @since 0.1.0
 * @category getters
 */
export const ascending = (self: ReservedSlotSet): ReadonlyArray<Ordinal> => Sets.ascending(self)

// =============================================================================
// Codec
// =============================================================================

/**
 * Annotation encoding: a JSON array of ordinals, written ascending.
 *
 * @since 0.1.0
 * @category schemas
 */
export const AnnotationValue = Schema.parseJson(Schema.Array(OrdinalSchema))

/**
 * What a stored annotation may hold: a JSON array of integers in any order,
 * duplicates allowed.
 *
 * @since 0.1.0
 * @category schemas
 */
export const StoredAnnotationValue = Schema.parseJson(Schema.Array(Schema.Int))

/**
 * Integers that are not ordinals (negative or beyond the 32-bit range) are
 * dropped; the rest of the array still counts.
 *
 * @since 0.1.0
 * @category codec
 */
export const decodeAnnotation = (
  value: string
): Effect.Effect<ReservedSlotSet, ParseResult.ParseError> =>
  Effect.map(Schema.decode(StoredAnnotationValue)(value), (ns) => fromIterable(Array.filter(ns, Ordinal.is)))

/**
 * @since 0.1.0
 * @category codec
 */
export const encodeAnnotation = (
  self: ReservedSlotSet
): Effect.Effect<string, ParseResult.ParseError> => Schema.encode(AnnotationValue)(ascending(self))
