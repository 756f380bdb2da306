/**
 * Project Hierarchy
 *
 * Derives the package -> class -> method tree that drives documentation
 * generation, from the `contains` and `hasScript` relations.
 */

import {
  compareNodeIds,
  findPaths,
  requireNode,
  requireRelation,
  TupleSet,
  type EdgeLabelIndex,
  type NodeId,
  type NodeMap,
} from "@kgsum/relations"
import { createLogger, type Logger } from "../logging"

export const CONTAINS_RELATION = "contains"
export const HAS_SCRIPT_RELATION = "hasScript"

/** package id -> class id -> method ids */
export type ProjectHierarchy = Map<NodeId, Map<NodeId, NodeId[]>>

export interface PrepareOptions {
  logger?: Logger
}

export interface PreparedElements {
  hierarchy: ProjectHierarchy
  nodes: NodeMap
}

type ClassEntry = readonly [NodeId, NodeId]

/**
 * Set `properties.description` to `null` unless it already holds a value.
 */
function ensureDescriptionSlot(nodes: NodeMap, id: NodeId): void {
  const node = requireNode(nodes, id)
  const properties = node.properties ?? {}
  node.properties = properties
  if (properties.description === undefined || properties.description === null) {
    properties.description = null
  }
}

/**
 * Build the project hierarchy and reserve a `description` slot on every
 * package, class and method node. `nodes` is updated in place and returned.
 *
 * Packages, classes and methods are each visited in sorted id order.
 *
 * @throws RelationNotFoundError if `contains` or `hasScript` is missing
 * @throws NodeNotFoundError if a path references an unknown node
 */
export function prepareElements(
  nodes: NodeMap,
  edges: EdgeLabelIndex,
  options: PrepareOptions = {},
): PreparedElements {
  const logger = options.logger ?? createLogger("hierarchy")

  const methods = findPaths(
    requireRelation(edges, CONTAINS_RELATION),
    requireRelation(edges, HAS_SCRIPT_RELATION),
  ).sorted()
  logger.info(`Methods count: ${methods.length}`)

  const classes = new TupleSet<ClassEntry>(methods.map(([pkg, cls]): ClassEntry => [pkg, cls])).sorted()
  logger.info(`Classes count: ${classes.length}`)

  const packages = Array.from(new Set(classes.map(([pkg]) => pkg))).sort(compareNodeIds)
  logger.info(`Packages count: ${packages.length}`)

  for (const [, , method] of methods) ensureDescriptionSlot(nodes, method)
  for (const [, cls] of classes) ensureDescriptionSlot(nodes, cls)
  for (const pkg of packages) ensureDescriptionSlot(nodes, pkg)

  // A class keeps its methods under every package it appears in
  const methodsByClass = new Map<NodeId, NodeId[]>()
  for (const [, cls, method] of methods) {
    const list = methodsByClass.get(cls)
    if (list) {
      list.push(method)
    } else {
      methodsByClass.set(cls, [method])
    }
  }

  const hierarchy: ProjectHierarchy = new Map()
  for (const pkg of packages) {
    hierarchy.set(pkg, new Map())
  }
  for (const [pkg, cls] of classes) {
    hierarchy.get(pkg)?.set(cls, [...(methodsByClass.get(cls) ?? [])])
  }
  logger.info(`Project hierarchy count: ${hierarchy.size}`)

  return { hierarchy, nodes }
}

/**
 * Convert a hierarchy to plain objects for JSON output.
 */
export function hierarchyToObject(hierarchy: ProjectHierarchy): Record<string, Record<string, NodeId[]>> {
  const result: Record<string, Record<string, NodeId[]>> = {}
  for (const [pkg, classes] of hierarchy) {
    const entry: Record<string, NodeId[]> = {}
    for (const [cls, methods] of classes) {
      entry[String(cls)] = methods
    }
    result[String(pkg)] = entry
  }
  return result
}
