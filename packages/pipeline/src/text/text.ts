/**
 * Text helpers for source snippets and generated summaries.
 */

const LINE_OR_BLOCK_COMMENT = /(\/\/.*?$)|(\/\*[\s\S]*?\*\/)/gm

const SENTENCE_ENDINGS = new Set([".", "?", "!", "…", "~", "–", "—"])

/**
 * Strip `//` and `/* *\/` comments from Java source, then trim.
 * Comment markers inside string literals are not recognized.
 */
export function removeJavaComments(source: string): string {
  return source.replace(LINE_OR_BLOCK_COMMENT, "").trim()
}

/**
 * Trim, capitalize the first character and end with a period unless the
 * text already ends with sentence punctuation.
 */
export function sentence(text: string): string {
  const trimmed = text.trim()
  if (trimmed.length === 0) return trimmed

  const capitalized = trimmed.charAt(0).toUpperCase() + trimmed.slice(1)
  return SENTENCE_ENDINGS.has(trimmed.charAt(trimmed.length - 1)) ? capitalized : `${capitalized}.`
}

export function lowerFirst(text: string): string {
  if (!text) return text
  return text.charAt(0).toLowerCase() + text.slice(1)
}
