/**
 * Collision query facade.
 *
 * Wraps the pure tests in algorithms/intersection.ts with the per-frame flag
 * protocol: `resetFrame()` clears every flag once per frame, then any number
 * of queries set `colliding` / `mouseOver` as they find overlaps.
 *
 * The mask set is always passed in by its owner (the room); nothing here holds state.
 */

import { type ColliderShape } from '../types/shape.js';
import { type CollisionMaskSet, type MapCollision } from '../types/layout.js';
import { type ColliderClass } from '../classes/collider.js';
import { shapesOverlap, shapeContainsPoint } from '../algorithms/intersection.js';
import * as errors from '../errors.js';

/**
 * Tests two shapes and marks both as colliding when they overlap.
 * `none` shapes are never touched.
 */
export function intersects(a: ColliderShape, b: ColliderShape): boolean {
  const hit = shapesOverlap(a, b);
  if (hit) {
    a.colliding = true;
    b.colliding = true;
  }
  return hit;
}

/**
 * Tests a point against a shape and records the result in `mouseOver`.
 * `none` shapes return false and are not touched.
 */
export function containsPoint(shape: ColliderShape, px: number, py: number): boolean {
  if (shape.kind === 'none') return false;
  const over = shapeContainsPoint(shape, px, py);
  shape.mouseOver = over;
  return over;
}

/**
 * Clears the frame flags on every collider and every mask rectangle.
 * Must run once per frame before any query.
 */
export function resetFrame(colliders: Iterable<ColliderClass>, maskSet: CollisionMaskSet | null): void {
  for (const collider of colliders) {
    collider.shape.colliding = false;
    collider.shape.mouseOver = false;
  }
  if (maskSet === null) return;
  for (const masks of maskSet.values()) {
    for (const mask of masks) {
      mask.colliding = false;
      mask.mouseOver = false;
    }
  }
}

export function testEntities(a: ColliderClass, b: ColliderClass): boolean {
  return intersects(a.shape, b.shape);
}

/**
 * Tests a collider against every mask of one behavior code.
 *
 * @returns The edges of each overlapped mask, in mask order. Empty when no
 * mask overlaps, and also when no tilemap is active (`maskSet` is null).
 * @throws When `code` has no masks in an active mask set.
 */
export function testAgainstBehavior(
  collider: ColliderClass,
  code: number,
  maskSet: CollisionMaskSet | null,
): MapCollision[] {
  if (maskSet === null) return [];

  const masks = maskSet.get(code);
  if (masks === undefined) {
    throw new Error(errors.messageOf(errors.unknownBehaviorCode(code)));
  }

  const collisions: MapCollision[] = [];
  for (const mask of masks) {
    if (intersects(collider.shape, mask)) {
      collisions.push({
        leftEdgeX: mask.x,
        rightEdgeX: mask.x + mask.width,
        topEdgeY: mask.y,
        bottomEdgeY: mask.y + mask.height,
      });
    }
  }
  return collisions;
}

export function testPoint(collider: ColliderClass, px: number, py: number): boolean {
  return containsPoint(collider.shape, px, py);
}
