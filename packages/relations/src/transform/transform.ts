/**
 * Graph Transform
 *
 * Reorganizes a raw graph document into a node map and an edge label index.
 */

import { MissingEdgeLabelError } from "../errors"
import type {
  EdgeLabelIndex,
  GraphEdge,
  LabeledEdge,
  NodeMap,
  RawGraphDocument,
  TransformedGraph,
} from "../types"

export function hasLabel(edge: GraphEdge): edge is LabeledEdge {
  return typeof edge.label === "string"
}

/**
 * Ensure an edge has a `label`, synthesizing one from `labels` joined by commas.
 *
 * The synthesized label is written back onto the edge object itself.
 *
 * @throws MissingEdgeLabelError if the edge has neither `label` nor `labels`
 */
export function normalizeEdgeLabel(edge: GraphEdge): LabeledEdge {
  if (hasLabel(edge)) {
    return edge
  }
  if (!Array.isArray(edge.labels)) {
    throw new MissingEdgeLabelError(edge.source, edge.target)
  }
  return Object.assign(edge, { label: edge.labels.join(",") })
}

/**
 * Transform a raw graph document into `{ nodes, edges }`.
 *
 * - `nodes` maps node id to node data (later duplicates replace earlier ones).
 * - `edges` groups edge data by label, keeping input order inside each group.
 *
 * The grouped edges are the document's own `data` objects, so a synthesized
 * label is visible through the input document too.
 *
 * @example
 * ```typescript
 * const { edges } = transformGraph({
 *   elements: {
 *     nodes: [{ data: { id: 'a' } }],
 *     edges: [{ data: { source: 'a', target: 'a', labels: ['x', 'y'] } }],
 *   },
 * })
 * edges.get('x,y') // [{ source: 'a', target: 'a', labels: ['x', 'y'], label: 'x,y' }]
 * ```
 */
export function transformGraph(graph: RawGraphDocument): TransformedGraph {
  const nodes: NodeMap = new Map()
  for (const { data } of graph.elements.nodes) {
    nodes.set(data.id, data)
  }

  const edges: EdgeLabelIndex = new Map()
  for (const { data } of graph.elements.edges) {
    const edge = normalizeEdgeLabel(data)
    const group = edges.get(edge.label)
    if (group) {
      group.push(edge)
    } else {
      edges.set(edge.label, [edge])
    }
  }

  return { nodes, edges }
}
