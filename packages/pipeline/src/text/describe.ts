/**
 * Node Description
 *
 * Renders the summary annotations of a node as markdown for prompts.
 */

import type { GraphNode } from "@kgsum/relations"

/** Annotation keys, in rendering order */
export const DESCRIPTION_KEYS = [
  "description",
  "reason",
  "howToUse",
  "howItWorks",
  "assertions",
  "roleStereotype",
  "layer",
] as const

export type DescriptionKey = (typeof DESCRIPTION_KEYS)[number]

// Prompt text spells scalars the way the summarization prompts were written.
function formatValue(value: unknown): string {
  if (typeof value === "string") return value
  if (value === null || value === undefined) return "None"
  if (typeof value === "boolean") return value ? "True" : "False"
  return JSON.stringify(value) ?? String(value)
}

/**
 * `**key**: value. ` for every annotation present on the node.
 *
 * @example
 * ```typescript
 * describeNode({ id: 'Foo', properties: { description: 'Parses input', layer: 'Domain' } })
 * // '**description**: Parses input. **layer**: Domain. '
 * ```
 */
export function describeNode(node: GraphNode): string {
  const properties = node.properties ?? {}
  let description = ""
  for (const key of DESCRIPTION_KEYS) {
    if (Object.hasOwn(properties, key)) {
      description += `**${key}**: ${formatValue(properties[key])}. `
    }
  }
  return description
}
