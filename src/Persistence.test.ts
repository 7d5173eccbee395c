/**
 * Unit tests for identity persistence.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import { Ordinal } from "./Ordinal.js"
import * as Persistence from "./Persistence.js"
import * as ReservationStore from "./ReservationStore.js"

const store = ReservationStore.make(ReservationStore.DEFAULT_ANNOTATION_KEY)

describe("Persistence", () => {
  it("should load None for unknown objects", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      return yield* identities.load("web")
    })

    const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    expect(Option.isNone(result)).toBe(true)
  })

  it("should save and load versioned annotations", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      const first = yield* identities.save("web", { "delete-slots": "[2]" }, Persistence.UNSAVED)
      const second = yield* identities.save("web", { "delete-slots": "[2,4]" }, first)
      const loaded = yield* identities.load("web")
      return { first, second, loaded }
    })

    const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    expect(result.first).toBe(1)
    expect(result.second).toBe(2)
    expect(Option.getOrUndefined(result.loaded)).toEqual({
      version: 2,
      annotations: { "delete-slots": "[2,4]" }
    })
  })

  it("should reject saves against a stale version", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      yield* identities.save("web", { "delete-slots": "[2]" }, Persistence.UNSAVED)
      return yield* Effect.flip(identities.save("web", { "delete-slots": "[3]" }, Persistence.UNSAVED))
    })

    const error = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    expect(error._tag).toBe("PersistenceConflictError")
    if (error._tag === "PersistenceConflictError") {
      expect(error.expectedVersion).toBe(0)
      expect(error.actualVersion).toBe(1)
    }
  })

  it("should delete stored objects", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      yield* identities.save("web", {}, Persistence.UNSAVED)
      yield* identities.delete("web")
      return yield* identities.load("web")
    })

    const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    expect(Option.isNone(result)).toBe(true)
  })

  it("should restart versions after a delete", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      const saved = yield* identities.save("web", { "delete-slots": "[2]" }, Persistence.UNSAVED)
      yield* identities.delete("web")
      const stale = yield* Effect.flip(identities.save("web", { "delete-slots": "[3]" }, saved))
      const recreated = yield* identities.save("web", { "delete-slots": "[5]" }, Persistence.UNSAVED)
      return { stale, recreated }
    })

    const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    expect(result.recreated).toBe(1)
    expect(result.stale._tag).toBe("PersistenceConflictError")
    if (result.stale._tag === "PersistenceConflictError") {
      expect(result.stale.expectedVersion).toBe(1)
      expect(result.stale.actualVersion).toBe(0)
    }
  })

  it("should not interleave a delete with a concurrent save", async () => {
    const program = Effect.gen(function* () {
      const identities = yield* Persistence.IdentityStore
      const saved = yield* identities.save("web", {}, Persistence.UNSAVED)
      const [outcome] = yield* Effect.all(
        [Effect.either(identities.save("web", { "delete-slots": "[1]" }, saved)), identities.delete("web")],
        { concurrency: "unbounded" }
      )
      const loaded = yield* identities.load("web")
      return { outcome, loaded }
    })

    const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
    // The save either lands first and is then deleted, or sees the delete and conflicts.
    expect(Option.isNone(result.loaded)).toBe(true)
  })

  describe("modify", () => {
    it("should persist reservation edits", async () => {
      const program = Effect.gen(function* () {
        yield* Persistence.modify("web", (statefulSet) => store.addReservations(statefulSet, [Ordinal(2)]))
        yield* Persistence.modify("web", (statefulSet) => store.addReservations(statefulSet, [Ordinal(4)]))
        const identities = yield* Persistence.IdentityStore
        return yield* identities.load("web")
      })

      const result = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
      expect(Option.getOrUndefined(result)).toEqual({
        version: 2,
        annotations: { "delete-slots": "[2,4]" }
      })
    })

    it("should return the result of the edit", async () => {
      const program = Persistence.modify("web", (statefulSet) =>
        Effect.map(store.read(statefulSet), (reserved) => reserved.size))

      const size = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
      expect(size).toBe(0)
    })

    it("should fail when another writer saved in between", async () => {
      const program = Effect.gen(function* () {
        const identities = yield* Persistence.IdentityStore
        yield* identities.save("web", {}, Persistence.UNSAVED)

        return yield* Effect.flip(
          Persistence.modify("web", (statefulSet) =>
            Effect.gen(function* () {
              yield* identities.save("web", { "delete-slots": "[9]" }, 1)
              yield* store.addReservations(statefulSet, [Ordinal(2)])
            }))
        )
      })

      const error = await Effect.runPromise(program.pipe(Effect.provide(Persistence.layerMemory)))
      expect(error._tag).toBe("PersistenceConflictError")
    })
  })
})
