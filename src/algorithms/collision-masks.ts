import { type BehaviorGrid, type TileGrid, type CollisionMaskSet } from '../types/layout.js';
import { type RectShape, rectShape } from '../types/shape.js';
import * as errors from '../errors.js';

/**
 * Derives an on/off behavior grid from raw tile indices.
 * Every non-zero tile becomes behavior `1`.
 */
export function binarizeTiles(tiles: TileGrid): BehaviorGrid {
  return tiles.map(row => row.map(tile => (tile === 0 ? 0 : 1)));
}

/**
 * Throws if the grid has rows of different lengths, or a cell that is not a
 * non-negative integer.
 */
export function validateGrid(grid: BehaviorGrid): void {
  if (grid.length === 0) return;

  const width = grid[0].length;
  for (let row = 0; row < grid.length; row++) {
    if (grid[row].length !== width) {
      throw new Error(errors.messageOf(errors.malformedGrid(
        `row ${String(row)} has ${String(grid[row].length)} cell(s), expected ${String(width)}.`,
      )));
    }
    for (let col = 0; col < width; col++) {
      const value = grid[row][col];
      if (!Number.isInteger(value) || value < 0) {
        throw new Error(errors.messageOf(errors.malformedGrid(
          `cell (${String(col)}, ${String(row)}) is ${String(value)}, expected a non-negative integer.`,
        )));
      }
    }
  }
}

/**
 * Compiles a behavior grid into rectangular collision masks.
 *
 * Greedy scan in row-major order. Each unconsumed non-zero cell anchors a
 * rectangle that first extends right through contiguous cells of the same
 * code, then down while the whole column span still matches. Consumed cells
 * are zeroed in a working copy so no cell is covered twice. The result is
 * deterministic but not the minimum rectangle cover.
 *
 * @param grid Behavior codes, row-major. Not modified.
 * @param cellWidth Pixel width of one grid cell.
 * @param cellHeight Pixel height of one grid cell.
 * @returns Rectangles per behavior code, in pixel units.
 */
export function compileCollisionMasks(
  grid: BehaviorGrid,
  cellWidth: number,
  cellHeight: number,
): CollisionMaskSet {
  if (!(cellWidth > 0) || !(cellHeight > 0)) {
    throw new Error(errors.messageOf(errors.invalidArgument(
      `cell size must be positive, got ${String(cellWidth)}×${String(cellHeight)}.`,
    )));
  }
  validateGrid(grid);

  const work = grid.map(row => [...row]);
  const rows = work.length;
  const cols = rows > 0 ? work[0].length : 0;

  // Cell-unit rectangles, scaled once the scan is done
  const cellMasks = new Map<number, Array<{ col: number; row: number; w: number; h: number }>>();

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const code = work[row][col];
      if (code === 0) continue;

      // Extend right
      let endCol = col;
      while (endCol + 1 < cols && work[row][endCol + 1] === code) {
        endCol++;
      }

      // Extend down while the whole span matches
      let endRow = row;
      while (endRow + 1 < rows && spanMatches(work[endRow + 1], col, endCol, code)) {
        endRow++;
      }

      for (let r = row; r <= endRow; r++) {
        for (let c = col; c <= endCol; c++) {
          work[r][c] = 0;
        }
      }

      let list = cellMasks.get(code);
      if (list === undefined) {
        list = [];
        cellMasks.set(code, list);
      }
      list.push({ col, row, w: endCol - col + 1, h: endRow - row + 1 });
    }
  }

  const masks: CollisionMaskSet = new Map();
  for (const [code, list] of cellMasks) {
    masks.set(code, list.map((m): RectShape => rectShape(
      m.col * cellWidth,
      m.row * cellHeight,
      m.w * cellWidth,
      m.h * cellHeight,
    )));
  }
  return masks;
}

function spanMatches(row: number[], startCol: number, endCol: number, code: number): boolean {
  for (let c = startCol; c <= endCol; c++) {
    if (row[c] !== code) return false;
  }
  return true;
}

/**
 * Returns the behavior codes present in a mask set, ascending.
 */
export function behaviorCodes(masks: CollisionMaskSet): number[] {
  return [...masks.keys()].sort((a, b) => a - b);
}
