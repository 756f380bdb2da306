/**
 * Types Module
 */

export type {
  NodeId,
  GraphNode,
  GraphEdge,
  LabeledEdge,
  ComposedEdge,
  NodeMap,
  EdgeLabelIndex,
  LabelPair,
  Path,
  Ontology,
  RawGraphDocument,
  TransformedGraph,
} from "./graph"
