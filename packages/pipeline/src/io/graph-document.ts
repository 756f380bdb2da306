/**
 * Graph Document Loading
 *
 * Reads a graph exported by the code analysis tool and checks its shape.
 * Only the fields the relations package relies on are validated; everything
 * else in the document is kept as-is.
 */

import { z } from "zod"
import type { RawGraphDocument } from "@kgsum/relations"
import { GraphDocumentError } from "../errors"
import { readJsonFile } from "./json"

// =============================================================================
// SCHEMA
// =============================================================================

const NodeIdSchema = z.union([z.string(), z.number()])

// Exporters write `null` for absent fields; read it as missing.
const PropertiesSchema = z
  .record(z.unknown())
  .nullish()
  .transform((properties) => properties ?? undefined)

const NodeDataSchema = z
  .object({
    id: NodeIdSchema,
    labels: z.array(z.string()).optional(),
    properties: PropertiesSchema,
  })
  .passthrough()

const EdgeDataSchema = z
  .object({
    source: NodeIdSchema,
    target: NodeIdSchema,
    label: z
      .string()
      .nullish()
      .transform((label) => label ?? undefined),
    labels: z.array(z.string()).optional(),
    properties: PropertiesSchema,
  })
  .passthrough()

export const GraphDocumentSchema = z
  .object({
    elements: z
      .object({
        nodes: z.array(z.object({ data: NodeDataSchema }).passthrough()),
        edges: z.array(z.object({ data: EdgeDataSchema }).passthrough()),
      })
      .passthrough(),
  })
  .passthrough()

// =============================================================================
// LOADING
// =============================================================================

/**
 * Validate an already parsed value as a graph document.
 *
 * @throws GraphDocumentError if the value does not have the document shape
 */
export function parseGraphDocument(value: unknown, filePath?: string): RawGraphDocument {
  const result = GraphDocumentSchema.safeParse(value)
  if (!result.success) {
    const firstError = result.error.errors[0]
    const where = filePath ? ` in ${filePath}` : ""
    const at = firstError && firstError.path.length > 0 ? ` at ${firstError.path.join(".")}` : ""
    throw new GraphDocumentError(
      `Invalid graph document${where}${at}: ${firstError?.message ?? "validation failed"}`,
      filePath,
    )
  }
  const document: RawGraphDocument = result.data
  return document
}

/**
 * Read and validate a graph document from a JSON file.
 */
export async function loadGraphDocument(filePath: string): Promise<RawGraphDocument> {
  return parseGraphDocument(await readJsonFile(filePath), filePath)
}
