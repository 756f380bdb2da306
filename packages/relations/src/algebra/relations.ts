/**
 * Relational Algebra
 *
 * Inversion, composition and lifting of edge lists. Every operation returns
 * new edges; input edges are never modified.
 */

import { RelationNotFoundError } from "../errors"
import { edgeLabelOr, edgeWeight } from "../utils"
import type { ComposedEdge, EdgeLabelIndex, GraphEdge, LabeledEdge, NodeId } from "../types"

export const INVERSE_PREFIX = "inv_"

// =============================================================================
// INVERT
// =============================================================================

/**
 * Swap `source` and `target` of every edge and prefix its label with `inv_`
 * (an unlabeled edge becomes `inv_edge`).
 *
 * Other fields are copied shallowly, so nested objects such as `properties`
 * are shared with the input edge.
 */
export function invert<E extends GraphEdge>(edges: readonly E[]): Array<E & LabeledEdge> {
  return edges.map((edge) => ({
    ...edge,
    source: edge.target,
    target: edge.source,
    label: INVERSE_PREFIX + edgeLabelOr(edge, "edge"),
  }))
}

// =============================================================================
// COMPOSE
// =============================================================================

interface HopEntry {
  target: NodeId
  label: string
  weight: number
}

/**
 * Relational join of `l1` and `l2` on `l1.target == l2.source`.
 *
 * - `l2` is indexed by source; when several `l2` edges share a source, the
 *   last one wins.
 * - Each matching pair yields `l1.source -> l2.target` with weight
 *   `l1.weight * l2.weight` and label `newLabel`, or `"<l1 label>-<l2 label>"`
 *   (defaults `edge2` and `edge1`).
 * - Pairs that land on the same `(source, target)` add their weights into the
 *   first edge produced for it, whose label is kept.
 *
 * @example
 * ```typescript
 * compose(
 *   [{ source: 1, target: 2, label: 'r', properties: { weight: 2 } }],
 *   [{ source: 2, target: 3, label: 's', properties: { weight: 3 } }],
 * )
 * // [{ source: 1, target: 3, label: 'r-s', properties: { weight: 6 } }]
 * ```
 */
export function compose(
  l1: readonly GraphEdge[],
  l2: readonly GraphEdge[],
  newLabel?: string,
): ComposedEdge[] {
  const hops = new Map<NodeId, HopEntry>()
  for (const edge of l2) {
    hops.set(edge.source, {
      target: edge.target,
      label: edgeLabelOr(edge, "edge1"),
      weight: edgeWeight(edge),
    })
  }

  // source -> target -> composed edge, in first-occurrence order
  const result = new Map<NodeId, Map<NodeId, ComposedEdge>>()
  const ordered: ComposedEdge[] = []

  for (const edge of l1) {
    const hop = hops.get(edge.target)
    if (!hop) continue

    const weight = hop.weight * edgeWeight(edge)
    let byTarget = result.get(edge.source)
    if (!byTarget) {
      byTarget = new Map()
      result.set(edge.source, byTarget)
    }

    const existing = byTarget.get(hop.target)
    if (existing) {
      existing.properties.weight += weight
      continue
    }

    const composed: ComposedEdge = {
      source: edge.source,
      target: hop.target,
      label: newLabel ? newLabel : `${edgeLabelOr(edge, "edge2")}-${hop.label}`,
      properties: { weight },
    }
    byTarget.set(hop.target, composed)
    ordered.push(composed)
  }

  return ordered
}

// =============================================================================
// LIFT
// =============================================================================

/**
 * Two hops forward then back through `rel1`:
 * `compose(compose(rel1, rel2), invert(rel1), newLabel)`.
 *
 * The result relates ids of `rel1`'s source space.
 */
export function lift(
  rel1: readonly GraphEdge[],
  rel2: readonly GraphEdge[],
  newLabel?: string,
): ComposedEdge[] {
  return compose(compose(rel1, rel2), invert(rel1), newLabel)
}

// =============================================================================
// LOOKUP
// =============================================================================

/**
 * Get the edges of one relation.
 *
 * @throws RelationNotFoundError if the index has no such label
 */
export function requireRelation(edges: EdgeLabelIndex, label: string): LabeledEdge[] {
  const relation = edges.get(label)
  if (!relation) {
    throw new RelationNotFoundError(label, Array.from(edges.keys()))
  }
  return relation
}
