/**
 * Graph Data Model
 *
 * Shapes of the nodes and edges exported by the code analysis tool,
 * plus the lookup structures built from them.
 */

import type { TupleSet } from "../utils/tuple-set"

// =============================================================================
// ELEMENTS
// =============================================================================

/**
 * Node identifier. Ids compare by identity, so `1` and `"1"` are distinct.
 */
export type NodeId = string | number

/**
 * Graph vertex representing a code entity (package, class, method, ...).
 */
export interface GraphNode {
  /** Unique identifier */
  id: NodeId
  /** Role labels, e.g. `["Class"]` */
  labels?: string[]
  /** Mutable annotations such as `description` */
  properties?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Directed relation between two node ids.
 */
export interface GraphEdge {
  source: NodeId
  target: NodeId
  /** Relation type. Synthesized from `labels` when missing. */
  label?: string
  labels?: string[]
  /** Edge annotations; `weight` defaults to 1 */
  properties?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Edge after label normalization.
 */
export type LabeledEdge = GraphEdge & { label: string }

/**
 * Edge produced by composition: label and weight are always present.
 */
export type ComposedEdge = {
  source: NodeId
  target: NodeId
  label: string
  properties: { weight: number }
}

// =============================================================================
// LOOKUP STRUCTURES
// =============================================================================

export type NodeMap = Map<NodeId, GraphNode>

/** Edges grouped by label, in input order within each group */
export type EdgeLabelIndex = Map<string, LabeledEdge[]>

/** `[sourceNodeLabel, targetNodeLabel]` */
export type LabelPair = readonly [string, string]

/** `[origin, via, destination]` */
export type Path = readonly [NodeId, NodeId, NodeId]

/**
 * Edge label → the node-label pairs that relation connects.
 */
export type Ontology = Map<string, TupleSet<LabelPair>>

// =============================================================================
// RAW DOCUMENT
// =============================================================================

/**
 * Graph document as exported by the analysis tool.
 */
export interface RawGraphDocument {
  elements: {
    nodes: Array<{ data: GraphNode }>
    edges: Array<{ data: GraphEdge }>
  }
}

/**
 * Result of {@link transformGraph}.
 */
export interface TransformedGraph {
  nodes: NodeMap
  edges: EdgeLabelIndex
}
