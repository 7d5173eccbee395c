/**
 * Persistence for identity objects' annotation bags.
 *
 * Stores each workload's annotations under its name in a `KeyValueStore`,
 * together with a version. `save` only succeeds when the caller presents the
 * version it last loaded, so two writers racing on the same reservation set
 * cannot silently overwrite each other.
 *
 * @since 0.1.0
 */

import * as KeyValueStore from "@effect/platform/KeyValueStore"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import * as Annotated from "./Annotated.js"

/**
 * @since 0.1.0
 * @category symbols
 */
export const TypeId: unique symbol = Symbol.for("ordinal-slots/Persistence")

/**
 * @since 0.1.0
 * @category symbols
 */
export type TypeId = typeof TypeId

/**
 * @since 0.1.0
 * @category errors
 */
export class LoadError extends Schema.TaggedError<LoadError>("ordinal-slots/Persistence/LoadError")(
  "PersistenceLoadError",
  { message: Schema.String }
) { }

/**
 * @since 0.1.0
 * @category errors
 */
export class SaveError extends Schema.TaggedError<SaveError>("ordinal-slots/Persistence/SaveError")(
  "PersistenceSaveError",
  { message: Schema.String }
) { }

/**
 * @since 0.1.0
 * @category errors
 */
export class DeleteError extends Schema.TaggedError<DeleteError>("ordinal-slots/Persistence/DeleteError")(
  "PersistenceDeleteError",
  { message: Schema.String }
) { }

/**
 * The stored version no longer matches the one the caller loaded.
 *
 * @since 0.1.0
 * @category errors
 */
export class ConflictError extends Schema.TaggedError<ConflictError>("ordinal-slots/Persistence/ConflictError")(
  "PersistenceConflictError",
  {
    objectName: Schema.String,
    expectedVersion: Schema.Number,
    actualVersion: Schema.Number,
    message: Schema.String
  }
) { }

/**
 * Version of an object that has never been saved.
 *
 * @since 0.1.0
 * @category constants
 */
export const UNSAVED = 0

/**
 * @since 0.1.0
 * @category schemas
 */
export const VersionedAnnotations = Schema.Struct({
  version: Schema.Int.pipe(Schema.positive()),
  annotations: Schema.Record({ key: Schema.String, value: Schema.String })
})

/**
 * @since 0.1.0
 * @category models
 */
export type VersionedAnnotations = typeof VersionedAnnotations.Type

/**
 * @since 0.1.0
 * @category models
 */
export interface IdentityStore {
  /**
   * @since 0.1.0
   */
  readonly [TypeId]: TypeId

  /**
   * Load an object's annotations. Returns None if the object was never saved.
   *
   * @since 0.1.0
   */
  readonly load: (name: string) => Effect.Effect<Option.Option<VersionedAnnotations>, LoadError>

  /**
   * Save an object's annotations if its stored version is still
   * `expectedVersion` (`UNSAVED` for a new object). Returns the new version.
   *
   * @since 0.1.0
   */
  readonly save: (
    name: string,
    annotations: Annotated.Annotations,
    expectedVersion: number
  ) => Effect.Effect<number, LoadError | SaveError | ConflictError>

  /**
   * @since 0.1.0
   */
  readonly delete: (name: string) => Effect.Effect<void, DeleteError>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const IdentityStore: Context.Tag<IdentityStore, IdentityStore> = Context.GenericTag<IdentityStore>(
  "ordinal-slots/Persistence/IdentityStore"
)

/**
 * Creates the KeyValueStore-backed store. Load-compare-store and delete run
 * under a single permit, so the version check is atomic within the process.
 *
 * @internal
 */
const make = (kv: KeyValueStore.KeyValueStore, lock: Effect.Semaphore): IdentityStore => {
  const store = kv.forSchema(VersionedAnnotations)

  const load = (name: string) =>
    store.get(name).pipe(Effect.mapError((e) => new LoadError({ message: e.message })))

  const save = (name: string, annotations: Annotated.Annotations, expectedVersion: number) =>
    Effect.gen(function* () {
      const actualVersion = Option.match(yield* load(name), {
        onNone: () => UNSAVED,
        onSome: (stored) => stored.version
      })
      if (actualVersion !== expectedVersion) {
        return yield* new ConflictError({
          objectName: name,
          expectedVersion,
          actualVersion,
          message: `${name} is at version ${actualVersion}, expected ${expectedVersion}`
        })
      }
      const version = actualVersion + 1
      yield* store.set(name, { version, annotations }).pipe(
        Effect.mapError((e) => new SaveError({ message: e.message }))
      )
      yield* Effect.logDebug("Saved annotations").pipe(Effect.annotateLogs({ name, version }))
      return version
    }).pipe(lock.withPermits(1))

  return {
    [TypeId]: TypeId,
    load,
    save,
    delete: (name) =>
      store.remove(name).pipe(
        Effect.mapError((e) => new DeleteError({ message: e.message })),
        lock.withPermits(1)
      )
  }
}

/**
 * Base layer that creates an IdentityStore from a KeyValueStore.
 *
 * @since 0.1.0
 * @category layers
 */
export const layer: Layer.Layer<IdentityStore, never, KeyValueStore.KeyValueStore> = Layer.effect(
  IdentityStore,
  Effect.gen(function* () {
    const kv = yield* KeyValueStore.KeyValueStore
    const lock = yield* Effect.makeSemaphore(1)
    return make(kv, lock)
  })
)

/**
 * Layer for in-memory persistence.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerMemory: Layer.Layer<IdentityStore> = layer.pipe(
  Layer.provide(KeyValueStore.layerMemory)
)

/**
 * Runs `f` against a stored object and saves the result conditionally on the
 * version that was loaded. A concurrent save in between fails the whole
 * operation with `ConflictError`; callers retry from a fresh load.
 *
 * @example
 * ```ts
 * import * as Persistence from "ordinal-slots/Persistence"
 * import * as ReservationStore from "ordinal-slots/ReservationStore"
 * import { Ordinal } from "ordinal-slots/Ordinal"
 * import * as Effect from "effect/Effect"
 *
 * const store = ReservationStore.make("delete-slots")
 *
 * const program = Persistence.modify("web", (statefulSet) =>
 *   store.addReservations(statefulSet, [Ordinal(2)])
 * ).pipe(Effect.provide(Persistence.layerMemory))
 * ```
 *
 * @since 0.1.0
 * @category combinators
 */
export const modify = <A, E, R>(
  name: string,
  f: (object: Annotated.Annotated) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | LoadError | SaveError | ConflictError, R | IdentityStore> =>
  Effect.gen(function* () {
    const identities = yield* IdentityStore
    const loaded = yield* identities.load(name)
    const expectedVersion = Option.match(loaded, {
      onNone: () => UNSAVED,
      onSome: (stored) => stored.version
    })
    const object = Annotated.make(pipe(loaded, Option.map((stored) => stored.annotations), Option.getOrUndefined))
    const result = yield* f(object)
    yield* identities.save(name, object.getAnnotations() ?? {}, expectedVersion)
    return result
  })

