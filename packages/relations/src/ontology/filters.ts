/**
 * Label-based filtering of nodes and edges.
 */

import { MissingLabelsError } from "../errors"
import { requireNode } from "./labels"
import type { GraphEdge, NodeId, NodeMap } from "../types"

/**
 * Keep the entries carrying at least one of `labels`.
 *
 * @throws MissingLabelsError if an entry has no `labels`
 */
export function filterObjectsByLabels<K, V extends { labels?: readonly string[] }>(
  data: ReadonlyMap<K, V>,
  labels: Iterable<string>,
): Map<K, V> {
  const wanted = new Set(labels)
  const filtered = new Map<K, V>()

  for (const [key, object] of data) {
    const objectLabels = object.labels
    if (objectLabels === undefined) {
      throw new MissingLabelsError(key)
    }
    if (objectLabels.some((label) => wanted.has(label))) {
      filtered.set(key, object)
    }
  }
  return filtered
}

/**
 * Keep the edges whose source and target nodes both carry `label`.
 *
 * @throws NodeNotFoundError if an endpoint is absent from `nodes`
 */
export function getEdgesWithLabels<E extends GraphEdge>(nodes: NodeMap, edges: readonly E[], label: string): E[] {
  return edges.filter((edge) => {
    const sourceLabels = requireNode(nodes, edge.source).labels ?? []
    if (!sourceLabels.includes(label)) return false
    const targetLabels = requireNode(nodes, edge.target).labels ?? []
    return targetLabels.includes(label)
  })
}

/**
 * Keep the edges whose endpoints are both in `selectedNodes`.
 */
export function extractEdges<E extends GraphEdge>(edges: readonly E[], selectedNodes: Iterable<NodeId>): E[] {
  const selected = new Set(selectedNodes)
  return edges.filter((edge) => selected.has(edge.source) && selected.has(edge.target))
}
