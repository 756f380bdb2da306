/**
 * Deterministic ordering for node ids and id tuples.
 */

export type TupleElement = string | number

/**
 * Numbers sort before strings; numbers compare numerically, strings by code unit.
 */
export function compareNodeIds(a: TupleElement, b: TupleElement): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b
  }
  if (typeof a === "number") return -1
  if (typeof b === "number") return 1
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Element-wise comparison; a proper prefix sorts first.
 */
export function compareTuples(a: readonly TupleElement[], b: readonly TupleElement[]): number {
  for (let i = 0; i < a.length && i < b.length; i++) {
    const left = a[i]
    const right = b[i]
    if (left === undefined || right === undefined) break
    const order = compareNodeIds(left, right)
    if (order !== 0) return order
  }
  return a.length - b.length
}
