/**
 * Custom Error Classes
 */

import type { NodeId } from "../types"

/**
 * Base error for all graph relation errors.
 */
export class GraphRelationsError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphRelationsError"
    this.cause = cause

    // Stack starts at the subclass constructor's caller
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Missing edge label error.
 * Thrown when an edge has neither `label` nor `labels`.
 */
export class MissingEdgeLabelError extends GraphRelationsError {
  constructor(
    public readonly source: NodeId,
    public readonly target: NodeId,
  ) {
    super(`Edge ${String(source)} -> ${String(target)} has neither "label" nor "labels"`)
    this.name = "MissingEdgeLabelError"
  }
}

/**
 * Node not found error.
 * Thrown when an edge endpoint is absent from the node map.
 */
export class NodeNotFoundError extends GraphRelationsError {
  constructor(public readonly nodeId: NodeId) {
    super(`Node not found: ${String(nodeId)}`)
    this.name = "NodeNotFoundError"
  }
}

/**
 * Missing labels error.
 * Thrown when label filtering meets an object without `labels`.
 */
export class MissingLabelsError extends GraphRelationsError {
  constructor(public readonly key: unknown) {
    super(`Object ${String(key)} has no "labels"`)
    this.name = "MissingLabelsError"
  }
}

/**
 * Invalid weight error.
 * Thrown when `properties.weight` is present but not a finite number.
 */
export class InvalidWeightError extends GraphRelationsError {
  constructor(public readonly received: unknown) {
    super(`Edge weight must be a finite number, got ${typeof received === "string" ? JSON.stringify(received) : String(received)}`)
    this.name = "InvalidWeightError"
  }
}

/**
 * Relation not found error.
 * Thrown when a label is missing from an edge label index.
 */
export class RelationNotFoundError extends GraphRelationsError {
  constructor(
    public readonly label: string,
    public readonly availableLabels: string[] = [],
  ) {
    const available = availableLabels.length > 0 ? ` (available: ${availableLabels.join(", ")})` : ""
    super(`Relation not found: ${label}${available}`)
    this.name = "RelationNotFoundError"
  }
}
