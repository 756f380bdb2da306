/**
 * Ontology Module
 */

export {
  getAllLabels,
  getEdgeNodeLabels,
  getSourceAndTargetLabels,
  getOntology,
  requireNode,
} from "./labels"
export { filterObjectsByLabels, getEdgesWithLabels, extractEdges } from "./filters"
