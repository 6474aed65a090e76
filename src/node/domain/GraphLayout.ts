/**
 * Graph Layout
 *
 * Assigns every row of the revision graph to a lane and records which lanes
 * are live on each side of it, so the renderer can draw nodes and edges
 * without knowing anything about the DAG.
 *
 * Rows arrive children-first. A lane is reserved for a commit when its first
 * child is laid out and released when the commit itself is reached.
 */

import type { CommitId, GraphRow } from '@shared/types'

type Lanes = (CommitId | null)[]

/**
 * Writes `row.visual` for every row, in order. Pure apart from the rows it is
 * given: the same input always yields the same geometry.
 */
export function calculateGraphLayout(rows: GraphRow[]): void {
  const lanes: Lanes = []
  const laneOf = new Map<CommitId, number>()

  for (const row of rows) {
    const column = laneOf.get(row.commitId) ?? claimLane(lanes, row.commitId)
    const activeLanes = occupancy(lanes)

    lanes[column] = null
    laneOf.delete(row.commitId)

    const parentColumns: number[] = []
    for (const parent of row.parents) {
      const existing = laneOf.get(parent)
      if (existing !== undefined) {
        parentColumns.push(existing)
        continue
      }

      // The first new parent continues straight down the row's own lane.
      const lane = lanes[column] === null ? column : claimLane(lanes, parent)
      lanes[lane] = parent
      laneOf.set(parent, lane)
      parentColumns.push(lane)
    }

    row.visual = {
      column,
      activeLanes,
      connectorLanes: occupancy(lanes),
      parentColumns,
      parentMin: Math.min(column, ...parentColumns),
      parentMax: Math.max(column, ...parentColumns)
    }
  }
}

/** Places `owner` in the leftmost free lane, opening a new one if none is free. */
function claimLane(lanes: Lanes, owner: CommitId): number {
  const free = lanes.indexOf(null)
  if (free !== -1) {
    lanes[free] = owner
    return free
  }
  lanes.push(owner)
  return lanes.length - 1
}

function occupancy(lanes: Lanes): boolean[] {
  return lanes.map((lane) => lane !== null)
}

/** Number of lanes the widest row needs. */
export function graphWidth(rows: GraphRow[]): number {
  let width = 0
  for (const row of rows) {
    width = Math.max(
      width,
      row.visual.activeLanes.length,
      row.visual.connectorLanes.length,
      row.visual.column + 1
    )
  }
  return width
}
