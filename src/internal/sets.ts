/**
 * Internal set utilities shared by the reservation modules.
 *
 * @since 0.1.0
 * @internal
 */

import { Array, Order, pipe } from "effect"

/**
 * Union of two sets.
 *
 * @internal
 */
export const union = <A>(a: ReadonlySet<A>, b: Iterable<A>): Set<A> => {
  const result = new Set(a)

  pipe(
    Array.fromIterable(b),
    Array.forEach((item) => {
      result.add(item)
    })
  )

  return result
}

/**
 * Members of `a` that are not in `b`.
 *
 * @internal
 */
export const difference = <A>(a: ReadonlySet<A>, b: Iterable<A>): Set<A> => {
  const excluded = new Set(b)
  return new Set(Array.filter(Array.fromIterable(a), (item) => !excluded.has(item)))
}

/**
 * Members of a numeric set in ascending order.
 *
 * @internal
 */
export const ascending = <A extends number>(set: Iterable<A>): ReadonlyArray<A> =>
  Array.sort(Array.fromIterable(set), Order.number)
