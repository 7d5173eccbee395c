/**
 * Annotated objects.
 *
 * The reservation store only needs one capability from the object that owns
 * a workload's identity: reading and replacing a string-keyed annotation bag.
 * Any cluster object, database row or in-memory record can provide it.
 *
 * @since 0.1.0
 */
import * as Predicate from "effect/Predicate"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export type Annotations = Readonly<Record<string, string>>

/**
 * Get/set access to an annotation bag. `getAnnotations` returns `undefined`
 * when the object has no bag yet.
 *
 * @since 0.1.0
 * @category models
 */
export interface Annotated {
  readonly getAnnotations: () => Annotations | undefined
  readonly setAnnotations: (annotations: Annotations) => void
}

// =============================================================================
// Guards
// =============================================================================

/**
 * @since 0.1.0
 * @category guards
 */
export const isAnnotated = (u: unknown): u is Annotated =>
  Predicate.hasProperty(u, "getAnnotations") &&
  Predicate.isFunction(u.getAnnotations) &&
  Predicate.hasProperty(u, "setAnnotations") &&
  Predicate.isFunction(u.setAnnotations)

// =============================================================================
// Constructors
// =============================================================================

/**
 * In-memory annotated object. The bag is copied on the way in and out, so
 * callers cannot mutate it behind the object's back.
 *
 * @example
 * ```ts
 * import * as Annotated from "ordinal-slots/Annotated"
 *
 * const statefulSet = Annotated.make({ owner: "team-a" })
 * statefulSet.getAnnotations() // { owner: "team-a" }
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (initial?: Annotations): Annotated => {
  let annotations: Annotations | undefined = initial === undefined ? undefined : { ...initial }
  return {
    getAnnotations: () => (annotations === undefined ? undefined : { ...annotations }),
    setAnnotations: (next) => {
      annotations = { ...next }
    }
  }
}
