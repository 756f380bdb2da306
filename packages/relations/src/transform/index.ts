/**
 * Transform Module
 */

export { transformGraph, normalizeEdgeLabel, hasLabel } from "./transform"
