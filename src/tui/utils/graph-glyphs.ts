import type { GraphRow, GraphRowVisual } from '@shared/types'

/** Node glyph for a revision. */
export function nodeGlyph(row: GraphRow, marked: boolean): string {
  if (row.isWorkingCopy) return '@'
  if (row.hasConflict) return '×'
  if (marked) return '●'
  if (row.isImmutable) return '◆'
  return '○'
}

/**
 * Lane prefix of the line holding the node: the node in its own column and a
 * vertical edge in every other lane active as the row is entered. Two
 * characters per lane.
 */
export function renderNodeLanes(visual: GraphRowVisual, width: number, node: string): string {
  let line = ''
  for (let lane = 0; lane < width; lane++) {
    const glyph = lane === visual.column ? node : visual.activeLanes[lane] ? '│' : ' '
    line += glyph + ' '
  }
  return line
}

/**
 * Lane prefix of the line below the node: the edges from the row to its
 * parents, joined horizontally between the outermost lanes they touch.
 */
export function renderConnectorLanes(visual: GraphRowVisual, width: number): string {
  const spreads = visual.parentMax > visual.parentMin
  const inSpan = (lane: number): boolean =>
    spreads && lane >= visual.parentMin && lane <= visual.parentMax

  let line = ''
  for (let lane = 0; lane < width; lane++) {
    line += connectorGlyph(visual, lane, inSpan(lane))
    line += inSpan(lane) && inSpan(lane + 1) ? '─' : ' '
  }
  return line
}

function connectorGlyph(visual: GraphRowVisual, lane: number, inSpan: boolean): string {
  const continues = visual.connectorLanes[lane] === true
  if (!inSpan) return continues ? '│' : ' '

  const isMin = lane === visual.parentMin
  const isMax = lane === visual.parentMax

  if (lane === visual.column) {
    if (isMin) return continues ? '├' : '╰'
    if (isMax) return continues ? '┤' : '╯'
    return continues ? '┼' : '┴'
  }

  if (visual.parentColumns.includes(lane)) {
    // A lane that already ran past this row is joined from the side.
    const wasActive = visual.activeLanes[lane] === true
    if (isMin) return wasActive ? '├' : '╭'
    if (isMax) return wasActive ? '┤' : '╮'
    return wasActive ? '┼' : '┬'
  }

  return continues ? '┼' : '─'
}

/** Color index of a lane, cycling through the theme's lane colors. */
export function laneColor(lanes: string[], lane: number): string | undefined {
  return lanes.length > 0 ? lanes[lane % lanes.length] : undefined
}
