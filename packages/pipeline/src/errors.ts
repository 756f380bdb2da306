/**
 * Pipeline Errors
 */

import { GraphRelationsError } from "@kgsum/relations"

/**
 * Configuration error.
 * Thrown when the project configuration is missing or invalid.
 */
export class ConfigurationError extends GraphRelationsError {
  constructor(
    message: string,
    public readonly section?: string,
    public readonly key?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "ConfigurationError"
  }
}

/**
 * Graph document error.
 * Thrown when a graph file does not have the exported document shape.
 */
export class GraphDocumentError extends GraphRelationsError {
  constructor(
    message: string,
    public readonly filePath?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "GraphDocumentError"
  }
}
