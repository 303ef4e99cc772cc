import { type ColliderShape, type RectShape, type CircleShape } from '../types/shape.js';

/**
 * Open-interval AABB overlap. Rectangles that only share an edge do not overlap.
 */
export function rectsOverlap(a: RectShape, b: RectShape): boolean {
  return (
    a.x < b.x + b.width &&
    a.x + a.width > b.x &&
    a.y < b.y + b.height &&
    a.y + a.height > b.y
  );
}

/**
 * Circles overlap when their centres are strictly closer than the sum of the radii.
 */
export function circlesOverlap(a: CircleShape, b: CircleShape): boolean {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy) < a.radius + b.radius;
}

/**
 * Clamps the circle centre to the rectangle bounds and compares the distance
 * to that nearest point against the radius.
 *
 * Unlike the rect/rect and circle/circle tests, a distance exactly equal to
 * the radius counts as overlap.
 */
export function rectCircleOverlap(rect: RectShape, circle: CircleShape): boolean {
  let testX = circle.x;
  let testY = circle.y;

  if (circle.x < rect.x) {
    testX = rect.x;
  } else if (circle.x > rect.x + rect.width) {
    testX = rect.x + rect.width;
  }

  if (circle.y < rect.y) {
    testY = rect.y;
  } else if (circle.y > rect.y + rect.height) {
    testY = rect.y + rect.height;
  }

  const distX = circle.x - testX;
  const distY = circle.y - testY;
  return Math.sqrt(distX * distX + distY * distY) <= circle.radius;
}

/**
 * Tests two shapes for overlap without touching their flags.
 * A shape of kind `none` never overlaps anything.
 */
export function shapesOverlap(a: ColliderShape, b: ColliderShape): boolean {
  if (a.kind === 'none' || b.kind === 'none') {
    return false;
  }
  if (a.kind === 'rect') {
    return b.kind === 'rect' ? rectsOverlap(a, b) : rectCircleOverlap(a, b);
  }
  return b.kind === 'rect' ? rectCircleOverlap(b, a) : circlesOverlap(a, b);
}

/**
 * Point-in-shape test. Rectangles use half-open bounds (right and bottom
 * edges excluded); circles include their boundary.
 */
export function shapeContainsPoint(shape: ColliderShape, px: number, py: number): boolean {
  switch (shape.kind) {
    case 'none':
      return false;
    case 'rect':
      return (
        px >= shape.x &&
        py >= shape.y &&
        px < shape.x + shape.width &&
        py < shape.y + shape.height
      );
    case 'circle': {
      const dx = px - shape.x;
      const dy = py - shape.y;
      return Math.sqrt(dx * dx + dy * dy) <= shape.radius;
    }
  }
}
