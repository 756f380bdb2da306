/**
 * Typed accessors with defaults for optional edge fields.
 */

import { InvalidWeightError } from "../errors"
import type { GraphEdge } from "../types"

export const DEFAULT_WEIGHT = 1

/**
 * Read `properties.weight`, defaulting to {@link DEFAULT_WEIGHT}.
 *
 * @throws InvalidWeightError if a weight is present but is not a finite number
 */
export function edgeWeight(edge: GraphEdge): number {
  const weight = edge.properties?.weight
  if (weight === undefined) {
    return DEFAULT_WEIGHT
  }
  if (typeof weight !== "number" || !Number.isFinite(weight)) {
    throw new InvalidWeightError(weight)
  }
  return weight
}

/**
 * Read `label`, falling back when the edge carries none.
 */
export function edgeLabelOr(edge: GraphEdge, fallback: string): string {
  return edge.label ?? fallback
}
