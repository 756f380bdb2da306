/**
 * Path discovery between two edge lists.
 */

import { TupleSet } from "../utils"
import type { GraphEdge, NodeId, Path } from "../types"

/**
 * Find `[origin, via, destination]` paths where an edge of `edgeList1` ends
 * at `via` and an edge of `edgeList2` leaves `via`.
 *
 * Each `via` remembers only the source of the last `edgeList1` edge reaching it.
 * Duplicate paths collapse.
 */
export function findPaths(
  edgeList1: readonly GraphEdge[],
  edgeList2: readonly GraphEdge[],
): TupleSet<Path> {
  const origins = new Map<NodeId, NodeId>()
  for (const edge of edgeList1) {
    origins.set(edge.target, edge.source)
  }

  const paths = new TupleSet<Path>()
  for (const edge of edgeList2) {
    const origin = origins.get(edge.source)
    if (origin !== undefined) {
      paths.add([origin, edge.source, edge.target])
    }
  }
  return paths
}
