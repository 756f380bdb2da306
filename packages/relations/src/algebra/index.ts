/**
 * Algebra Module
 */

export { invert, compose, lift, requireRelation, INVERSE_PREFIX } from "./relations"
export { findPaths } from "./paths"
