/**
 * Knowledge-Graph Relations
 *
 * Typed lookup structures and a small relational algebra over the labeled,
 * weighted edges of a source-code knowledge graph.
 *
 * @example
 * ```typescript
 * import { transformGraph, compose, invert, lift, findPaths, getOntology } from '@kgsum/relations';
 *
 * const { nodes, edges } = transformGraph(document);
 *
 * // Type -> Script -> Type
 * const calls = lift(edges.get('hasScript') ?? [], edges.get('invokes') ?? [], 'calls');
 *
 * // package -> class -> method triples
 * const methods = findPaths(edges.get('contains') ?? [], edges.get('hasScript') ?? []).sorted();
 *
 * // Which node labels each relation connects
 * const ontology = getOntology(edges, nodes);
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// TYPES
// =============================================================================

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
} from "./types"

// =============================================================================
// TRANSFORM
// =============================================================================

export { transformGraph, normalizeEdgeLabel, hasLabel } from "./transform"

// =============================================================================
// ALGEBRA
// =============================================================================

export { invert, compose, lift, findPaths, requireRelation, INVERSE_PREFIX } from "./algebra"

// =============================================================================
// ONTOLOGY
// =============================================================================

export {
  getAllLabels,
  getEdgeNodeLabels,
  getSourceAndTargetLabels,
  getOntology,
  requireNode,
  filterObjectsByLabels,
  getEdgesWithLabels,
  extractEdges,
} from "./ontology"

// =============================================================================
// UTILITIES
// =============================================================================

export { TupleSet, compareNodeIds, compareTuples, edgeWeight, edgeLabelOr, DEFAULT_WEIGHT } from "./utils"
export type { TupleElement } from "./utils"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphRelationsError,
  MissingEdgeLabelError,
  NodeNotFoundError,
  MissingLabelsError,
  InvalidWeightError,
  RelationNotFoundError,
} from "./errors"
