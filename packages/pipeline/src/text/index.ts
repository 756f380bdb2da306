/**
 * Text Module
 */

export { removeJavaComments, sentence, lowerFirst } from "./text"
export { describeNode, DESCRIPTION_KEYS } from "./describe"
export type { DescriptionKey } from "./describe"
