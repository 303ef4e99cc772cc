/**
 * Core types for tilemap layouts and their compiled collision masks.
 */

import { type RectShape } from './shape.js';

/**
 * A 2D grid of behavior codes, row-major. `0` means no collider.
 * Every other value names a behavior class (e.g. 1 = solid, 2 = platform).
 */
export type BehaviorGrid = number[][];

/**
 * A 2D grid of raw tile indices, row-major. `0` means no tile.
 */
export type TileGrid = number[][];

/**
 * Compiled masks per behavior code, in pixel coordinates.
 * Codes iterate in the order their first rectangle was found.
 */
export type CollisionMaskSet = Map<number, RectShape[]>;

/**
 * Edges of a mask rectangle that an actor overlapped.
 */
export interface MapCollision {
  leftEdgeX: number;
  rightEdgeX: number;
  topEdgeY: number;
  bottomEdgeY: number;
}

/**
 * The structure of a layout file on disk.
 */
export interface LayoutData {
  /** Raw tile indices */
  tiles: TileGrid;
  /** Optional behavior codes; binarized from `tiles` when absent */
  behaviors?: BehaviorGrid;
}
