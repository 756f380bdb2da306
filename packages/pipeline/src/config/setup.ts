/**
 * Project setup: configuration, graph loading and client arguments in one call.
 */

import { resolve } from "node:path"
import { transformGraph, type EdgeLabelIndex, type NodeMap, type RawGraphDocument } from "@kgsum/relations"
import { loadGraphDocument } from "../io"
import { createLogger, type Logger } from "../logging"
import { buildClientArgs, loadProjectConfig, resolveModel, type ClientArgs } from "./project"

export interface SetupOptions {
  logger?: Logger
}

export interface SetupResult {
  projectName: string
  projectDesc: string
  graph: RawGraphDocument
  nodes: NodeMap
  edges: EdgeLabelIndex
  clientArgs: ClientArgs
  model: string
}

/**
 * Load the configuration at `configPath`, then the graph it names
 * (`project.ifile`, resolved from the working directory).
 */
export async function setup(configPath: string, options: SetupOptions = {}): Promise<SetupResult> {
  const logger = options.logger ?? createLogger("setup")

  const config = await loadProjectConfig(configPath)
  const graphPath = resolve(config.project.ifile)
  const graph = await loadGraphDocument(graphPath)
  const { nodes, edges } = transformGraph(graph)

  logger.debug(`Loaded graph ${graphPath}`, { nodes: nodes.size, relations: edges.size })

  return {
    projectName: config.project.name,
    projectDesc: config.project.desc,
    graph,
    nodes,
    edges,
    clientArgs: buildClientArgs(config),
    model: resolveModel(config),
  }
}
