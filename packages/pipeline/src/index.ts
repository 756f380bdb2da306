/**
 * Knowledge-Graph Summarization Pipeline Helpers
 *
 * Configuration, graph loading and hierarchy preparation on top of
 * `@kgsum/relations`.
 *
 * @example
 * ```typescript
 * import { setup, prepareElements, describeNode, sentence } from '@kgsum/pipeline';
 *
 * const { projectName, nodes, edges, clientArgs, model } = await setup('project.ini');
 * const { hierarchy } = prepareElements(nodes, edges);
 *
 * for (const [pkg, classes] of hierarchy) {
 *   for (const [cls, methods] of classes) {
 *     // summarize methods, then the class, then the package
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SETUP & CONFIGURATION
// =============================================================================

export {
  setup,
  parseIni,
  readIniFile,
  ProjectConfigSchema,
  DEFAULT_MODEL,
  parseProjectConfig,
  loadProjectConfig,
  buildClientArgs,
  resolveModel,
} from "./config"
export type { IniSections, ProjectConfig, ClientArgs, SetupOptions, SetupResult } from "./config"

// =============================================================================
// HIERARCHY
// =============================================================================

export { prepareElements, hierarchyToObject, CONTAINS_RELATION, HAS_SCRIPT_RELATION } from "./hierarchy"
export type { ProjectHierarchy, PrepareOptions, PreparedElements } from "./hierarchy"

// =============================================================================
// IO
// =============================================================================

export {
  parseJson,
  prettifyJson,
  readJsonFile,
  writeJsonFile,
  GraphDocumentSchema,
  parseGraphDocument,
  loadGraphDocument,
} from "./io"

// =============================================================================
// TEXT
// =============================================================================

export { removeJavaComments, sentence, lowerFirst, describeNode, DESCRIPTION_KEYS } from "./text"
export type { DescriptionKey } from "./text"

// =============================================================================
// LOGGING & ERRORS
// =============================================================================

export { Logger, createLogger } from "./logging"
export type { LogLevel, LoggerOptions } from "./logging"
export { ConfigurationError, GraphDocumentError } from "./errors"
