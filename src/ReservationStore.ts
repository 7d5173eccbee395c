/**
 * Reservation store.
 *
 * Reads and writes a workload's reserved-slot set in the annotation bag of
 * its identity object. The bag is the only copy of the set: an absent key,
 * an empty array and an unreadable value all mean "no reservations".
 *
 * The annotation key is a single configuration value, `delete-slots` unless
 * overridden through `RESERVED_SLOTS_ANNOTATION`.
 *
 * Writes follow plain read-modify-write. Two concurrent `addReservations`
 * against the same object can lose an update unless the caller serializes
 * them, for example with a conditional save keyed on a version (see
 * `Persistence`).
 *
 * @since 0.1.0
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Record from "effect/Record"
import type { Annotated, Annotations } from "./Annotated.js"
import type { Ordinal } from "./Ordinal.js"
import * as ReservedSlots from "./ReservedSlots.js"
import type { ReservedSlotSet } from "./ReservedSlots.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * @since 0.1.0
 * @category symbols
 */
export const TypeId: unique symbol = Symbol.for("ordinal-slots/ReservationStore")

/**
 * @since 0.1.0
 * @category symbols
 */
export type TypeId = typeof TypeId

// =============================================================================
// Constants
// =============================================================================

/**
 * @since 0.1.0
 * @category constants
 */
export const DEFAULT_ANNOTATION_KEY = "delete-slots"

/**
 * Name of the config entry overriding the annotation key.
 *
 * @since 0.1.0
 * @category constants
 */
export const ANNOTATION_KEY_CONFIG = "RESERVED_SLOTS_ANNOTATION"

// =============================================================================
// Errors
// =============================================================================

/**
 * The stored annotation could not be decoded. Never surfaced: `read`
 * recovers from it with the empty set.
 *
 * @since 0.1.0
 * @category errors
 */
export class DecodingError extends Data.TaggedError("DecodingError")<{
  readonly annotationKey: string
  readonly message: string
}> {}

/**
 * The reservation set could not be encoded.
 *
 * @since 0.1.0
 * @category errors
 */
export class EncodingError extends Data.TaggedError("EncodingError")<{
  readonly annotationKey: string
  readonly message: string
}> {}

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface ReservationStore {
  readonly [TypeId]: TypeId

  /**
   * Annotation key the set lives under.
   */
  readonly annotationKey: string

  /**
   * Current reservations of an object; empty when absent or unreadable.
   */
  readonly read: (object: Annotated) => Effect.Effect<ReservedSlotSet>

  /**
   * Replaces the reservations. Writing the empty set removes the key.
   */
  readonly write: (object: Annotated, reserved: ReservedSlotSet) => Effect.Effect<void, EncodingError>

  /**
   * Adds ordinals to the reservations. Idempotent.
   */
  readonly addReservations: (
    object: Annotated,
    additional: Iterable<Ordinal>
  ) => Effect.Effect<void, EncodingError>

  /**
   * Releases ordinals so they can be allocated again.
   */
  readonly removeReservations: (
    object: Annotated,
    released: Iterable<Ordinal>
  ) => Effect.Effect<void, EncodingError>

  /**
   * Removes every reservation.
   */
  readonly clearReservations: (object: Annotated) => Effect.Effect<void>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const ReservationStore: Context.Tag<ReservationStore, ReservationStore> = Context.GenericTag<
  ReservationStore
>("ordinal-slots/ReservationStore")

// =============================================================================
// Constructors
// =============================================================================

const noAnnotations: Annotations = {}

/**
 * Creates a store that keeps reservations under `annotationKey`.
 *
 * @example
 * ```ts
 * import * as ReservationStore from "ordinal-slots/ReservationStore"
 * import * as Annotated from "ordinal-slots/Annotated"
 * import { Ordinal } from "ordinal-slots/Ordinal"
 * import * as Effect from "effect/Effect"
 *
 * const store = ReservationStore.make("delete-slots")
 * const statefulSet = Annotated.make()
 *
 * Effect.runSync(store.addReservations(statefulSet, [Ordinal(2)]))
 * statefulSet.getAnnotations() // { "delete-slots": "[2]" }
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (annotationKey: string): ReservationStore => {
  const read = (object: Annotated): Effect.Effect<ReservedSlotSet> =>
    pipe(
      Effect.sync(() => Record.get(object.getAnnotations() ?? noAnnotations, annotationKey)),
      Effect.flatMap(
        Option.match({
          onNone: () => Effect.succeed(ReservedSlots.empty),
          onSome: (value) =>
            pipe(
              ReservedSlots.decodeAnnotation(value),
              Effect.mapError((error) => new DecodingError({ annotationKey, message: error.message }))
            )
        })
      ),
      Effect.catchTag("DecodingError", (error) =>
        pipe(
          Effect.logDebug("Ignoring unreadable reserved-slot annotation"),
          Effect.annotateLogs({ annotationKey: error.annotationKey, cause: error.message }),
          Effect.as(ReservedSlots.empty)
        ))
    )

  const write = (object: Annotated, reserved: ReservedSlotSet): Effect.Effect<void, EncodingError> =>
    Effect.suspend(() => {
      const current = object.getAnnotations()
      if (reserved.size === 0) {
        if (current === undefined || !Record.has(current, annotationKey)) {
          return Effect.void
        }
        const next = { ...current }
        delete next[annotationKey]
        object.setAnnotations(next)
        return Effect.logDebug("Cleared reserved slots").pipe(Effect.annotateLogs({ annotationKey }))
      }
      return pipe(
        ReservedSlots.encodeAnnotation(reserved),
        Effect.mapError((error) => new EncodingError({ annotationKey, message: error.message })),
        Effect.flatMap((value) =>
          pipe(
            Effect.sync(() => object.setAnnotations({ ...current, [annotationKey]: value })),
            Effect.zipRight(Effect.logDebug("Stored reserved slots")),
            Effect.annotateLogs({ annotationKey, reserved: value })
          )
        )
      )
    })

  return {
    [TypeId]: TypeId,
    annotationKey,
    read,
    write,
    addReservations: (object, additional) =>
      Effect.flatMap(read(object), (current) => write(object, ReservedSlots.union(current, additional))),
    removeReservations: (object, released) =>
      Effect.flatMap(read(object), (current) => write(object, ReservedSlots.difference(current, released))),
    clearReservations: (object) => Effect.orDie(write(object, ReservedSlots.empty))
  }
}

// =============================================================================
// Layers
// =============================================================================

/**
 * Store with an explicit annotation key, `delete-slots` by default.
 *
 * @since 0.1.0
 * @category layers
 */
export const layer = (annotationKey: string = DEFAULT_ANNOTATION_KEY): Layer.Layer<ReservationStore> =>
  Layer.succeed(ReservationStore, make(annotationKey))

/**
 * Store whose annotation key comes from the `RESERVED_SLOTS_ANNOTATION`
 * config entry, falling back to `delete-slots`.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerConfig: Layer.Layer<ReservationStore, ConfigError.ConfigError> = Layer.effect(
  ReservationStore,
  pipe(
    Config.string(ANNOTATION_KEY_CONFIG),
    Config.withDefault(DEFAULT_ANNOTATION_KEY),
    Effect.map(make)
  )
)
