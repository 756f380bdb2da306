/**
 * JSON file helpers.
 */

import { readFile, writeFile } from "node:fs/promises"

export function parseJson(text: string): unknown {
  return JSON.parse(text)
}

/**
 * Serialize with a two-space indent.
 */
export function prettifyJson(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, "utf8")
  return parseJson(text)
}

export async function writeJsonFile(value: unknown, filePath: string): Promise<void> {
  await writeFile(filePath, prettifyJson(value), "utf8")
}
