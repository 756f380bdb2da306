/**
 * INI reading.
 *
 * Accepted syntax:
 * - `key = value` and `key: value`, split at the first `=` or `:`
 * - full-line comments starting with `#` or `;`; the same characters
 *   inside a value are kept
 * - indented lines continue the previous value, joined with `\n`
 */

import { readFile } from "node:fs/promises"
import ini from "ini"
import { ConfigurationError } from "../errors"

export type IniSections = Record<string, Record<string, string>>

const SECTION_PATTERN = /^\[(.+)\]/
const OPTION_PATTERN = /^(.*?)\s*[=:]\s*(.*)$/

interface PendingOption {
  key: string
  indent: number
  lines: string[]
}

function isSection(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length
}

/**
 * Rewrite INI text so that every option is one `"key" = "value"` line with
 * JSON-quoted parts, which `ini` reads back without comment stripping.
 *
 * @throws ConfigurationError for a line that is neither a section, an option nor a continuation
 */
function canonicalize(text: string): string {
  const output: string[] = []
  let section: string | undefined
  let pending: PendingOption | undefined

  const flush = () => {
    if (!pending) return
    const value = pending.lines.join("\n").trimEnd()
    output.push(`${JSON.stringify(pending.key)} = ${JSON.stringify(value)}`)
    pending = undefined
  }

  text.split(/\r?\n/).forEach((line, index) => {
    const stripped = line.trim()
    if (stripped.startsWith("#") || stripped.startsWith(";")) return

    if (stripped === "") {
      pending?.lines.push("")
      return
    }

    if (pending && indentOf(line) > pending.indent) {
      pending.lines.push(stripped)
      return
    }
    flush()

    const header = SECTION_PATTERN.exec(stripped)
    if (header?.[1] !== undefined) {
      section = header[1]
      output.push(`[${section}]`)
      return
    }

    const option = OPTION_PATTERN.exec(stripped)
    const key = option?.[1]
    if (option === null || !key) {
      throw new ConfigurationError(`Line ${index + 1} is not a "key = value" option: ${stripped}`, section)
    }
    pending = { key: key.toLowerCase(), indent: indentOf(line), lines: [option[2] ?? ""] }
  })
  flush()

  return output.join("\n")
}

/**
 * Parse INI text into `section -> key -> value`.
 *
 * Values outside any section are dropped and keys are lower-cased. Nested
 * sections (`[a.b]`) and array keys are not part of a section's entries.
 */
export function parseIni(text: string): IniSections {
  const parsed: Record<string, unknown> = ini.parse(canonicalize(text))
  const sections: IniSections = {}

  for (const [name, body] of Object.entries(parsed)) {
    if (!isSection(body)) continue
    const entries: Record<string, string> = {}
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value === null) {
        entries[key] = String(value)
      }
    }
    sections[name] = entries
  }
  return sections
}

export async function readIniFile(filePath: string): Promise<IniSections> {
  return parseIni(await readFile(filePath, "utf8"))
}
