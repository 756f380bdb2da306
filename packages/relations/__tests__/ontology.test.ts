import { describe, it, expect } from "vitest"
import {
  getAllLabels,
  getEdgeNodeLabels,
  getSourceAndTargetLabels,
  getOntology,
  filterObjectsByLabels,
  getEdgesWithLabels,
  extractEdges,
  transformGraph,
  MissingLabelsError,
  NodeNotFoundError,
  type GraphEdge,
  type GraphNode,
  type NodeId,
  type NodeMap,
} from "../src"

// =============================================================================
// FIXTURES
// =============================================================================

function nodeMap(...nodes: GraphNode[]): NodeMap {
  return new Map<NodeId, GraphNode>(nodes.map((node) => [node.id, node]))
}

const nodes = nodeMap(
  { id: "pkg", labels: ["Container"] },
  { id: "Foo", labels: ["Type", "Public"] },
  { id: "Bar", labels: ["Type"] },
  { id: "Foo.run", labels: ["Script"] },
  { id: "orphan" },
)

// =============================================================================
// TESTS
// =============================================================================

describe("getAllLabels", () => {
  it("should union the labels of all objects", () => {
    const objects = new Map([
      ["n1", { labels: ["Class"] }],
      ["n2", { labels: ["Method", "Public"] }],
    ])

    expect(getAllLabels(objects)).toEqual(new Set(["Class", "Method", "Public"]))
  })

  it("should skip objects without a labels array", () => {
    const objects = new Map<string, { labels?: unknown }>([
      ["n1", { labels: ["Class"] }],
      ["n2", {}],
      ["n3", { labels: "Method" }],
    ])

    expect(Array.from(getAllLabels(objects))).toEqual(["Class"])
  })

  it("should work on a node map", () => {
    expect(Array.from(getAllLabels(nodes))).toEqual(["Container", "Type", "Public", "Script"])
  })
})

describe("getEdgeNodeLabels", () => {
  it("should return the cartesian product of endpoint labels", () => {
    expect(getEdgeNodeLabels({ source: "Foo", target: "pkg" }, nodes)).toEqual([
      ["Type", "Container"],
      ["Public", "Container"],
    ])
  })

  it("should return nothing when an endpoint has no labels", () => {
    expect(getEdgeNodeLabels({ source: "Foo", target: "orphan" }, nodes)).toEqual([])
  })

  it("should throw when an endpoint is missing", () => {
    expect(() => getEdgeNodeLabels({ source: "Foo", target: "ghost" }, nodes)).toThrow(NodeNotFoundError)
    expect(() => getEdgeNodeLabels({ source: "Foo", target: "ghost" }, nodes)).toThrow("Node not found: ghost")
  })
})

describe("getSourceAndTargetLabels", () => {
  it("should collapse duplicate pairs", () => {
    const edges: GraphEdge[] = [
      { source: "Foo", target: "Bar" },
      { source: "Bar", target: "Foo" },
    ]

    const pairs = getSourceAndTargetLabels(edges, nodes)

    expect(pairs.sorted()).toEqual([
      ["Public", "Type"],
      ["Type", "Public"],
      ["Type", "Type"],
    ])
  })
})

describe("getOntology", () => {
  it("should map each relation to the label pairs it connects", () => {
    const { nodes: graphNodes, edges } = transformGraph({
      elements: {
        nodes: [
          { data: { id: "pkg", labels: ["Container"] } },
          { data: { id: "Foo", labels: ["Type"] } },
          { data: { id: "Foo.run", labels: ["Script"] } },
        ],
        edges: [
          { data: { source: "pkg", target: "Foo", label: "contains" } },
          { data: { source: "Foo", target: "Foo.run", label: "hasScript" } },
        ],
      },
    })

    const ontology = getOntology(edges, graphNodes)

    expect(Array.from(ontology.keys())).toEqual(["contains", "hasScript"])
    expect(ontology.get("contains")?.toArray()).toEqual([["Container", "Type"]])
    expect(ontology.get("hasScript")?.has(["Type", "Script"])).toBe(true)
  })
})

describe("filterObjectsByLabels", () => {
  it("should keep objects carrying any of the labels", () => {
    const labelled = new Map(Array.from(nodes).filter(([id]) => id !== "orphan"))

    const filtered = filterObjectsByLabels(labelled, ["Script", "Container"])

    expect(Array.from(filtered.keys())).toEqual(["pkg", "Foo.run"])
  })

  it("should return an empty map for an empty label list", () => {
    const labelled = new Map([["a", { labels: ["Type"] }]])

    expect(filterObjectsByLabels(labelled, []).size).toBe(0)
  })

  it("should throw for an object without labels", () => {
    expect(() => filterObjectsByLabels(nodes, ["Type"])).toThrow(MissingLabelsError)
  })
})

describe("getEdgesWithLabels", () => {
  it("should keep edges whose endpoints both carry the label", () => {
    const edges: GraphEdge[] = [
      { source: "Foo", target: "Bar", label: "extends" },
      { source: "Foo", target: "pkg", label: "in" },
      { source: "Bar", target: "Bar", label: "self" },
    ]

    expect(getEdgesWithLabels(nodes, edges, "Type").map((edge) => edge.label)).toEqual(["extends", "self"])
  })

  it("should throw when an endpoint is missing", () => {
    expect(() => getEdgesWithLabels(nodes, [{ source: "ghost", target: "Foo" }], "Type")).toThrow(
      NodeNotFoundError,
    )
  })
})

describe("extractEdges", () => {
  it("should keep edges inside the selected nodes", () => {
    const edges: GraphEdge[] = [
      { source: 1, target: 2 },
      { source: 2, target: 3 },
      { source: 3, target: 1 },
    ]

    expect(extractEdges(edges, [1, 2])).toEqual([{ source: 1, target: 2 }])
    expect(extractEdges(edges, new Set([1, 2, 3]))).toHaveLength(3)
  })
})
