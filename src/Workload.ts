/**
 * Object-level ordinal queries.
 *
 * Each operation reads the reserved-slot set from a workload's identity
 * object through the `ReservationStore` service and runs the matching
 * allocator operation on it.
 *
 * @since 0.1.0
 */
import * as Effect from "effect/Effect"
import type * as Option from "effect/Option"
import * as Allocator from "./Allocator.js"
import type { Annotated } from "./Annotated.js"
import type { Cardinality, Ordinal } from "./Ordinal.js"
import { ReservationStore } from "./ReservationStore.js"

/**
 * Active ordinals of a workload running `replicas` members.
 *
 * @example
 * ```ts
 * import * as Workload from "ordinal-slots/Workload"
 * import * as ReservationStore from "ordinal-slots/ReservationStore"
 * import * as Annotated from "ordinal-slots/Annotated"
 * import { Cardinality } from "ordinal-slots/Ordinal"
 * import * as Effect from "effect/Effect"
 *
 * const statefulSet = Annotated.make({ "delete-slots": "[1]" })
 *
 * Workload.ordinalsFor(statefulSet, Cardinality(2)).pipe(
 *   Effect.provide(ReservationStore.layer()),
 *   Effect.runSync
 * ) // Set {0, 2}
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const ordinalsFor = (
  object: Annotated,
  replicas: Cardinality
): Effect.Effect<ReadonlySet<Ordinal>, never, ReservationStore> =>
  Effect.flatMap(ReservationStore, (store) =>
    Effect.map(store.read(object), (reserved) => Allocator.activeOrdinals(replicas, reserved)))

/**
 * @since 0.1.0
 * @category getters
 */
export const maxOrdinalFor = (
  object: Annotated,
  replicas: Cardinality
): Effect.Effect<Option.Option<Ordinal>, never, ReservationStore> =>
  Effect.flatMap(ReservationStore, (store) =>
    Effect.map(store.read(object), (reserved) => Allocator.maxActiveOrdinal(replicas, reserved)))

/**
 * @since 0.1.0
 * @category getters
 */
export const minOrdinalFor = (
  object: Annotated,
  replicas: Cardinality
): Effect.Effect<Option.Option<Ordinal>, never, ReservationStore> =>
  Effect.flatMap(ReservationStore, (store) =>
    Effect.map(store.read(object), (reserved) => Allocator.minActiveOrdinal(replicas, reserved)))

/**
 * Ordinals to assign when growing the workload from `current` to `target`
 * members.
 *
 * @since 0.1.0
 * @category getters
 */
export const scaleOutOrdinalsFor = (
  object: Annotated,
  current: Cardinality,
  target: Cardinality
): Effect.Effect<ReadonlyArray<Ordinal>, never, ReservationStore> =>
  Effect.flatMap(ReservationStore, (store) =>
    Effect.map(store.read(object), (reserved) => Allocator.scaleOutOrdinals(current, target, reserved)))
