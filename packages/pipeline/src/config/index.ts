/**
 * Config Module
 */

export { parseIni, readIniFile } from "./ini"
export type { IniSections } from "./ini"
export {
  ProjectConfigSchema,
  DEFAULT_MODEL,
  parseProjectConfig,
  loadProjectConfig,
  buildClientArgs,
  resolveModel,
} from "./project"
export type { ProjectConfig, ClientArgs } from "./project"
export { setup } from "./setup"
export type { SetupOptions, SetupResult } from "./setup"
