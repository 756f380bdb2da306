/**
 * Project Configuration
 *
 * ```ini
 * [project]
 * name = my-service
 * desc = Order management backend
 * ifile = graphs/my-service.json
 *
 * [openai]
 * apikey = ...
 * apibase = http://localhost:8000/v1
 * model = gpt-4o-mini
 * ```
 */

import { z } from "zod"
import { ConfigurationError } from "../errors"
import { readIniFile, type IniSections } from "./ini"

export const DEFAULT_MODEL = "gpt-3.5-turbo"

export const ProjectConfigSchema = z.object({
  project: z.object({
    name: z.string().min(1),
    desc: z.string(),
    ifile: z.string().min(1),
  }),
  openai: z
    .object({
      apikey: z.string().min(1).optional(),
      apibase: z.string().url().optional(),
      model: z.string().min(1).optional(),
    })
    .default({}),
})

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

/**
 * Options for constructing the LLM client. Only keys set in the
 * configuration are present.
 */
export interface ClientArgs {
  apiKey?: string
  baseURL?: string
}

/**
 * Validate INI sections as a project configuration.
 *
 * @throws ConfigurationError naming the first offending section and key
 */
export function parseProjectConfig(sections: IniSections, filePath?: string): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(sections)
  if (!result.success) {
    const firstError = result.error.errors[0]
    const [section, key] = firstError?.path ?? []
    const where = filePath ? ` in ${filePath}` : ""
    const at = firstError && firstError.path.length > 0 ? `${firstError.path.join(".")}: ` : ""
    throw new ConfigurationError(
      `Invalid configuration${where}: ${at}${firstError?.message ?? "validation failed"}`,
      typeof section === "string" ? section : undefined,
      typeof key === "string" ? key : undefined,
    )
  }
  return result.data
}

/**
 * Read and validate a project configuration file.
 *
 * @throws ConfigurationError if the file cannot be read or is invalid
 */
export async function loadProjectConfig(filePath: string): Promise<ProjectConfig> {
  let sections: IniSections
  try {
    sections = await readIniFile(filePath)
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    throw new ConfigurationError(
      `Cannot read configuration file ${filePath}`,
      undefined,
      undefined,
      error instanceof Error ? error : undefined,
    )
  }
  return parseProjectConfig(sections, filePath)
}

export function buildClientArgs(config: ProjectConfig): ClientArgs {
  const args: ClientArgs = {}
  if (config.openai.apikey !== undefined) {
    args.apiKey = config.openai.apikey
  }
  if (config.openai.apibase !== undefined) {
    args.baseURL = config.openai.apibase
  }
  return args
}

export function resolveModel(config: ProjectConfig): string {
  return config.openai.model ?? DEFAULT_MODEL
}
