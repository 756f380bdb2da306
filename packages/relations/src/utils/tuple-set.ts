/**
 * Tuple Set
 *
 * A set of fixed-length id tuples with structural equality:
 * two tuples are the same member when their elements are identical
 * in value and type (`1` and `"1"` stay distinct).
 */

import { compareTuples, type TupleElement } from "./ordering"

export class TupleSet<T extends readonly TupleElement[]> implements Iterable<T> {
  /** Encoded key -> first tuple stored under it */
  private readonly members = new Map<string, T>()

  constructor(values?: Iterable<T>) {
    if (values) {
      for (const value of values) {
        this.add(value)
      }
    }
  }

  private static keyOf(tuple: readonly TupleElement[]): string {
    return JSON.stringify(tuple)
  }

  get size(): number {
    return this.members.size
  }

  add(tuple: T): this {
    const key = TupleSet.keyOf(tuple)
    if (!this.members.has(key)) {
      this.members.set(key, tuple)
    }
    return this
  }

  has(tuple: T): boolean {
    return this.members.has(TupleSet.keyOf(tuple))
  }

  delete(tuple: T): boolean {
    return this.members.delete(TupleSet.keyOf(tuple))
  }

  values(): IterableIterator<T> {
    return this.members.values()
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values()
  }

  /**
   * Members in insertion order.
   */
  toArray(): T[] {
    return Array.from(this.members.values())
  }

  /**
   * Members in ascending element-wise order.
   */
  sorted(): T[] {
    return this.toArray().sort(compareTuples)
  }
}
