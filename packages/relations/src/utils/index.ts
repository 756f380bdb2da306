/**
 * Utilities Module
 */

export { TupleSet } from "./tuple-set"
export { compareNodeIds, compareTuples } from "./ordering"
export type { TupleElement } from "./ordering"
export { edgeWeight, edgeLabelOr, DEFAULT_WEIGHT } from "./access"
