/**
 * Hierarchy Module
 */

export { prepareElements, hierarchyToObject, CONTAINS_RELATION, HAS_SCRIPT_RELATION } from "./hierarchy"
export type { ProjectHierarchy, PrepareOptions, PreparedElements } from "./hierarchy"
