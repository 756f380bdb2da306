/**
 * IO Module
 */

export { parseJson, prettifyJson, readJsonFile, writeJsonFile } from "./json"
export { GraphDocumentSchema, parseGraphDocument, loadGraphDocument } from "./graph-document"
