/**
 * Placement of freshly generated idea nodes around an anchor point.
 *
 * Offsets use integer division (`Math.floor(count / 2)` etc.) so existing maps keep
 * the coordinates they were laid out with: three horizontal ideas at anchor (0, 0)
 * land on x = -250, 0, 250.
 */
import type { Position } from "@/lib/graph/types"

export type LayoutStrategy = "radial" | "horizontal" | "vertical" | "grid"

export const RADIAL_RADIUS = 200
export const HORIZONTAL_SPACING = 250
export const VERTICAL_SPACING = 150

const STRATEGIES: readonly LayoutStrategy[] = ["radial", "horizontal", "vertical", "grid"]

export function parseLayoutStrategy(value: string | null | undefined): LayoutStrategy {
  return STRATEGIES.find((strategy) => strategy === value) ?? "grid"
}

export function computePositions(anchor: Position, count: number, strategy: LayoutStrategy): Position[] {
  if (count <= 0) return []

  const positions: Position[] = []
  const half = Math.floor(count / 2)

  switch (strategy) {
    case "radial": {
      // A single idea sits on the circle at angle 0, not on the anchor.
      const angleStep = (2 * Math.PI) / count
      for (let i = 0; i < count; i++) {
        const angle = i * angleStep
        positions.push({
          x: anchor.x + RADIAL_RADIUS * Math.cos(angle),
          y: anchor.y + RADIAL_RADIUS * Math.sin(angle),
        })
      }
      break
    }
    case "horizontal":
      for (let i = 0; i < count; i++) {
        positions.push({ x: anchor.x + (i - half) * HORIZONTAL_SPACING, y: anchor.y })
      }
      break
    case "vertical":
      for (let i = 0; i < count; i++) {
        positions.push({ x: anchor.x, y: anchor.y + (i - half) * VERTICAL_SPACING })
      }
      break
    default: {
      const columns = Math.ceil(Math.sqrt(count))
      const columnOffset = Math.floor(columns / 2)
      const rowOffset = Math.floor(count / (2 * columns))
      for (let i = 0; i < count; i++) {
        const row = Math.floor(i / columns)
        const col = i % columns
        positions.push({
          x: anchor.x + (col - columnOffset) * HORIZONTAL_SPACING,
          y: anchor.y + (row - rowOffset) * VERTICAL_SPACING,
        })
      }
    }
  }

  return positions
}
