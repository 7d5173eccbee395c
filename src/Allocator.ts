/**
 * Ordinal allocation.
 *
 * Given a desired cardinality `d` and a reserved-slot set `R`, the allocator
 * decides which ordinals should have a live member. The active ordinals are
 * the first `d` ordinals that are not reserved, so removing an arbitrary
 * member only requires reserving its ordinal: nothing else is renumbered.
 *
 * Properties:
 * - `|activeOrdinals(d, R)| = d`
 * - `activeOrdinals(d, R) = [0, boundary) \ consumed`, with `consumed ⊆ R`
 * - reservations at or above the boundary are latent and change nothing
 * - scale-out only hands out ordinals above the current maximum
 *
 * Every operation is pure and synchronous. Cardinalities arrive already
 * validated as `Cardinality` values.
 *
 * @since 0.1.0
 */
import * as Array from "effect/Array"
import { dual } from "effect/Function"
import * as Option from "effect/Option"
import { type Cardinality, Ordinal } from "./Ordinal.js"
import * as ReservedSlots from "./ReservedSlots.js"
import type { ReservedSlotSet } from "./ReservedSlots.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Result of resolving a reservation set against a cardinality.
 *
 * @since 0.1.0
 * @category models
 */
export interface Resolution {
  /** Exclusive upper bound of the ordinals considered. */
  readonly boundary: number
  /** Reservations below the boundary, excluded from the active set. */
  readonly consumed: ReservedSlotSet
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Computes the boundary and the consumed reservations.
 *
 * The boundary starts at the cardinality. Reservations are visited in
 * ascending order; each one below the current boundary is consumed and
 * pushes the boundary up by one, the rest are dropped. The walk must be
 * ascending: a reservation just under the final boundary is only reached
 * once the smaller ones have grown it.
 *
 * @example
 * ```ts
 * import { resolveBoundaryAndConsumed } from "ordinal-slots/Allocator"
 * import { Cardinality, Ordinal } from "ordinal-slots/Ordinal"
 * import * as ReservedSlots from "ordinal-slots/ReservedSlots"
 *
 * const { boundary, consumed } = resolveBoundaryAndConsumed(
 *   Cardinality(3),
 *   ReservedSlots.make(Ordinal(2), Ordinal(4))
 * )
 * // boundary = 4, consumed = {2}
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const resolveBoundaryAndConsumed: {
  (reserved: ReservedSlotSet): (cardinality: Cardinality) => Resolution
  (cardinality: Cardinality, reserved: ReservedSlotSet): Resolution
} = dual(2, (cardinality: Cardinality, reserved: ReservedSlotSet): Resolution => {
  let boundary: number = cardinality
  const consumed = new Set<Ordinal>()
  for (const slot of ReservedSlots.ascending(reserved)) {
    if (slot < boundary) {
      boundary++
      consumed.add(slot)
    }
  }
  return { boundary, consumed }
})

const ascendingActive = (cardinality: Cardinality, reserved: ReservedSlotSet): ReadonlyArray<Ordinal> => {
  const { boundary, consumed } = resolveBoundaryAndConsumed(cardinality, reserved)
  const active: Ordinal[] = []
  for (let i = 0; i < boundary; i++) {
    const ordinal = Ordinal(i)
    if (!consumed.has(ordinal)) {
      active.push(ordinal)
    }
  }
  return active
}

/**
 * The ordinals that should currently have a live member.
 *
 * @example
 * ```ts
 * import { activeOrdinals } from "ordinal-slots/Allocator"
 * import { Cardinality, Ordinal } from "ordinal-slots/Ordinal"
 * import * as ReservedSlots from "ordinal-slots/ReservedSlots"
 *
 * activeOrdinals(Cardinality(3), ReservedSlots.make(Ordinal(2), Ordinal(4)))
 * // Set {0, 1, 3}
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const activeOrdinals: {
  (reserved: ReservedSlotSet): (cardinality: Cardinality) => ReadonlySet<Ordinal>
  (cardinality: Cardinality, reserved: ReservedSlotSet): ReadonlySet<Ordinal>
} = dual(
  2,
  (cardinality: Cardinality, reserved: ReservedSlotSet): ReadonlySet<Ordinal> =>
    new Set(ascendingActive(cardinality, reserved))
)

/**
 * Largest active ordinal, `None` when the cardinality is zero.
 *
 * @since 0.1.0
 * @category operations
 */
export const maxActiveOrdinal: {
  (reserved: ReservedSlotSet): (cardinality: Cardinality) => Option.Option<Ordinal>
  (cardinality: Cardinality, reserved: ReservedSlotSet): Option.Option<Ordinal>
} = dual(
  2,
  (cardinality: Cardinality, reserved: ReservedSlotSet): Option.Option<Ordinal> =>
    Array.last(ascendingActive(cardinality, reserved))
)

/**
 * Smallest active ordinal, `None` when the cardinality is zero.
 *
 * @since 0.1.0
 * @category operations
 */
export const minActiveOrdinal: {
  (reserved: ReservedSlotSet): (cardinality: Cardinality) => Option.Option<Ordinal>
  (cardinality: Cardinality, reserved: ReservedSlotSet): Option.Option<Ordinal>
} = dual(
  2,
  (cardinality: Cardinality, reserved: ReservedSlotSet): Option.Option<Ordinal> =>
    Array.head(ascendingActive(cardinality, reserved))
)

/**
 * Ordinals to assign, in order, when growing from `current` to `target`
 * members.
 *
 * New ordinals continue upward from the largest ordinal active at `current`
 * and skip every reserved ordinal, latent ones included. Gaps below the
 * current maximum are never filled. Shrinking or staying put yields an empty
 * sequence.
 *
 * @example
 * ```ts
 * import { scaleOutOrdinals } from "ordinal-slots/Allocator"
 * import { Cardinality, Ordinal } from "ordinal-slots/Ordinal"
 * import * as ReservedSlots from "ordinal-slots/ReservedSlots"
 *
 * // active {0, 1, 3}; 4 is reserved
 * scaleOutOrdinals(Cardinality(3), Cardinality(5), ReservedSlots.make(Ordinal(2), Ordinal(4)))
 * // [5, 6]
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const scaleOutOrdinals: {
  (target: Cardinality, reserved: ReservedSlotSet): (current: Cardinality) => ReadonlyArray<Ordinal>
  (current: Cardinality, target: Cardinality, reserved: ReservedSlotSet): ReadonlyArray<Ordinal>
} = dual(
  3,
  (current: Cardinality, target: Cardinality, reserved: ReservedSlotSet): ReadonlyArray<Ordinal> => {
    if (target <= current) {
      return []
    }
    const wanted = target - current
    const assigned: Ordinal[] = []
    let candidate = Option.match(maxActiveOrdinal(current, reserved), {
      onNone: () => 0,
      onSome: (max) => max + 1
    })
    while (assigned.length < wanted) {
      const ordinal = Ordinal(candidate)
      if (!reserved.has(ordinal)) {
        assigned.push(ordinal)
      }
      candidate++
    }
    return assigned
  }
)
