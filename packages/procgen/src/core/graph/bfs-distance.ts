/**
 * BFS Distance Calculation
 *
 * Distances from a source node over any graph given as a neighbor function.
 */

/**
 * Result of BFS distance calculation.
 */
export interface BFSDistanceResult<TNodeId> {
  /** Map from node ID to distance from source */
  readonly distances: Map<TNodeId, number>;
  /** Maximum distance from source */
  readonly maxDistance: number;
}

/**
 * Calculate distances from a source node using BFS.
 *
 * @param getNeighbors - Function that returns neighbors for a given node
 *
 * @example
 * ```typescript
 * // Cell ids of an open maze
 * const { distances } = calculateBFSDistances(0, (id) => openNeighborIds(id));
 * distances.size; // reachable cells
 * ```
 */
export function calculateBFSDistances<TNodeId>(
  sourceId: TNodeId,
  getNeighbors: (nodeId: TNodeId) => readonly TNodeId[],
): BFSDistanceResult<TNodeId> {
  const distances = new Map<TNodeId, number>([[sourceId, 0]]);
  const queue: TNodeId[] = [sourceId];
  let queueHead = 0;
  let maxDistance = 0;

  while (queueHead < queue.length) {
    const current = queue[queueHead++];
    if (current === undefined) break;
    const currentDist = distances.get(current) ?? 0;

    for (const neighbor of getNeighbors(current)) {
      if (!distances.has(neighbor)) {
        const nextDistance = currentDist + 1;
        distances.set(neighbor, nextDistance);
        if (nextDistance > maxDistance) {
          maxDistance = nextDistance;
        }
        queue.push(neighbor);
      }
    }
  }

  return { distances, maxDistance };
}
