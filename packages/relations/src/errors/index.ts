/**
 * Errors Module
 */

export {
  GraphRelationsError,
  MissingEdgeLabelError,
  NodeNotFoundError,
  MissingLabelsError,
  InvalidWeightError,
  RelationNotFoundError,
} from "./errors"
