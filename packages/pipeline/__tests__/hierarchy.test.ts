import { fileURLToPath } from "node:url"
import { describe, it, expect, beforeEach, vi } from "vitest"
import {
  transformGraph,
  NodeNotFoundError,
  RelationNotFoundError,
  type EdgeLabelIndex,
  type NodeMap,
} from "@kgsum/relations"
import { prepareElements, hierarchyToObject, loadGraphDocument, Logger } from "../src"

const fixturePath = fileURLToPath(new URL("./fixtures/graph.json", import.meta.url))

const silent = new Logger({ silent: true })

describe("prepareElements", () => {
  let nodes: NodeMap
  let edges: EdgeLabelIndex

  beforeEach(async () => {
    ;({ nodes, edges } = transformGraph(await loadGraphDocument(fixturePath)))
  })

  it("should group methods under classes under packages", () => {
    const { hierarchy } = prepareElements(nodes, edges, { logger: silent })

    expect(hierarchyToObject(hierarchy)).toEqual({
      "com.shop": {
        "com.shop.Cart": ["com.shop.Cart.add", "com.shop.Cart.total"],
        "com.shop.Order": ["com.shop.Order.place"],
      },
      "com.util": {
        "com.util.Money": ["com.util.Money.add"],
      },
    })
  })

  it("should order packages and classes by id", () => {
    const { hierarchy } = prepareElements(nodes, edges, { logger: silent })

    expect(Array.from(hierarchy.keys())).toEqual(["com.shop", "com.util"])
    expect(Array.from(hierarchy.get("com.shop")?.keys() ?? [])).toEqual(["com.shop.Cart", "com.shop.Order"])
  })

  it("should reserve a description slot without overwriting existing ones", () => {
    const result = prepareElements(nodes, edges, { logger: silent })

    expect(result.nodes).toBe(nodes)
    expect(nodes.get("com.shop.Cart.add")?.properties).toEqual({ simpleName: "add", description: null })
    expect(nodes.get("com.util")?.properties).toEqual({ description: null })
    expect(nodes.get("com.shop.Order")?.properties?.description).toBe("Customer order")
  })

  it("should log the counts", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    try {
      prepareElements(nodes, edges, { logger: new Logger({ level: "info", context: "hierarchy" }) })

      expect(log.mock.calls.map(([line]) => line)).toEqual([
        "[info] (hierarchy) Methods count: 4",
        "[info] (hierarchy) Classes count: 3",
        "[info] (hierarchy) Packages count: 2",
        "[info] (hierarchy) Project hierarchy count: 2",
      ])
    } finally {
      log.mockRestore()
    }
  })

  it("should throw when a relation is missing", () => {
    edges.delete("hasScript")

    expect(() => prepareElements(nodes, edges, { logger: silent })).toThrow(RelationNotFoundError)
  })

  it("should throw when a path references an unknown node", () => {
    nodes.delete("com.util")

    expect(() => prepareElements(nodes, edges, { logger: silent })).toThrow(NodeNotFoundError)
  })

  it("should return an empty hierarchy when nothing connects", () => {
    const graph = transformGraph({
      elements: {
        nodes: [],
        edges: [
          { data: { source: "p", target: "c", label: "contains" } },
          { data: { source: "x", target: "m", label: "hasScript" } },
        ],
      },
    })

    expect(prepareElements(graph.nodes, graph.edges, { logger: silent }).hierarchy.size).toBe(0)
  })
})
