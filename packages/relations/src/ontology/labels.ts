/**
 * Label & Ontology Extraction
 *
 * Schema-level summaries of which node labels each relation connects.
 */

import { NodeNotFoundError } from "../errors"
import { TupleSet } from "../utils"
import type { EdgeLabelIndex, GraphEdge, GraphNode, LabelPair, NodeId, NodeMap, Ontology } from "../types"

/**
 * Look up an endpoint node.
 *
 * @throws NodeNotFoundError if the id is absent from the map
 */
export function requireNode(nodes: NodeMap, id: NodeId): GraphNode {
  const node = nodes.get(id)
  if (!node) {
    throw new NodeNotFoundError(id)
  }
  return node
}

/**
 * Union of the `labels` of every object. Objects whose `labels` is missing
 * or not an array are skipped.
 */
export function getAllLabels<K>(objects: ReadonlyMap<K, { labels?: unknown }>): Set<string> {
  const labels = new Set<string>()
  for (const object of objects.values()) {
    if (!Array.isArray(object.labels)) continue
    for (const label of object.labels) {
      if (typeof label === "string") {
        labels.add(label)
      }
    }
  }
  return labels
}

/**
 * Cartesian product of the source node's labels and the target node's labels.
 */
export function getEdgeNodeLabels(edge: GraphEdge, nodes: NodeMap): LabelPair[] {
  const sourceLabels = requireNode(nodes, edge.source).labels ?? []
  const targetLabels = requireNode(nodes, edge.target).labels ?? []

  const pairs: LabelPair[] = []
  for (const sourceLabel of sourceLabels) {
    for (const targetLabel of targetLabels) {
      pairs.push([sourceLabel, targetLabel])
    }
  }
  return pairs
}

/**
 * Distinct `[sourceLabel, targetLabel]` pairs over a list of edges.
 */
export function getSourceAndTargetLabels(edges: readonly GraphEdge[], nodes: NodeMap): TupleSet<LabelPair> {
  const pairs = new TupleSet<LabelPair>()
  for (const edge of edges) {
    for (const pair of getEdgeNodeLabels(edge, nodes)) {
      pairs.add(pair)
    }
  }
  return pairs
}

/**
 * Map each relation label to the node-label pairs it connects.
 *
 * @example
 * ```typescript
 * const ontology = getOntology(edges, nodes)
 * ontology.get('hasScript')?.has(['Type', 'Script']) // true
 * ```
 */
export function getOntology(edges: EdgeLabelIndex, nodes: NodeMap): Ontology {
  const ontology: Ontology = new Map()
  for (const [label, relation] of edges) {
    ontology.set(label, getSourceAndTargetLabels(relation, nodes))
  }
  return ontology
}
