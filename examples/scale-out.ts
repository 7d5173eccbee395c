/**
 * Example: removing arbitrary members and scaling out again.
 *
 * A workload runs 5 members. The operator removes the members at ordinals 2
 * and 4 by reserving those slots and scaling down to 3, then scales back up
 * to 5. The surviving members keep their ordinals and the new ones are
 * placed after the highest ordinal in use.
 *
 * @since 0.1.0
 */

import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Persistence from "../src/Persistence.js"
import { Cardinality, Ordinal } from "../src/Ordinal.js"
import * as ReservationStore from "../src/ReservationStore.js"
import * as Workload from "../src/Workload.js"

const format = (ordinals: Iterable<Ordinal>) => `[${Array.from(ordinals).join(", ")}]`

const program = Effect.gen(function* () {
  const reservations = yield* ReservationStore.ReservationStore
  const identities = yield* Persistence.IdentityStore

  yield* identities.save("web", {}, Persistence.UNSAVED)

  yield* Persistence.modify("web", (statefulSet) =>
    Effect.gen(function* () {
      yield* Console.log(`Before: ${format(yield* Workload.ordinalsFor(statefulSet, Cardinality(5)))}`)
      yield* reservations.addReservations(statefulSet, [Ordinal(2), Ordinal(4)])
    }))

  yield* Persistence.modify("web", (statefulSet) =>
    Effect.gen(function* () {
      const remaining = yield* Workload.ordinalsFor(statefulSet, Cardinality(3))
      yield* Console.log(`After removing 2 and 4: ${format(remaining)}`) // [0, 1, 3]

      const added = yield* Workload.scaleOutOrdinalsFor(statefulSet, Cardinality(3), Cardinality(5))
      yield* Console.log(`Scale-out assigns: ${format(added)}`) // [5, 6]

      const max = yield* Workload.maxOrdinalFor(statefulSet, Cardinality(5))
      yield* Console.log(`Highest ordinal at 5 replicas: ${Option.getOrElse(max, () => "none")}`) // 6
    }))

  const stored = yield* identities.load("web")
  yield* Console.log("Stored annotations:", Option.map(stored, (s) => s.annotations))
})

Effect.runPromise(
  program.pipe(
    Effect.provide(ReservationStore.layerConfig),
    Effect.provide(Persistence.layerMemory)
  )
).catch(console.error)
