/**
 * Core types for collider geometry.
 *
 * Shapes are shared by actor colliders and compiled tilemap masks.
 * Geometry is read-only once built; only the per-frame flags change.
 */

/**
 * Per-frame collision state carried by every shape.
 */
export interface ShapeFlags {
  /** Set when this shape overlapped any other tested shape during the current frame */
  colliding: boolean;
  /** Result of the last point test against this shape */
  mouseOver: boolean;
}

/**
 * Placeholder for an actor that has no collider. Never collides.
 */
export interface NoShape extends ShapeFlags {
  readonly kind: 'none';
  readonly x: number;
  readonly y: number;
}

/**
 * An axis-aligned bounding box.
 */
export interface RectShape extends ShapeFlags {
  readonly kind: 'rect';
  /** X coordinate of the top-left corner */
  readonly x: number;
  /** Y coordinate of the top-left corner */
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * A circle positioned by its centre.
 */
export interface CircleShape extends ShapeFlags {
  readonly kind: 'circle';
  readonly x: number;
  readonly y: number;
  readonly radius: number;
}

/**
 * A ColliderShape is a discriminated union of supported geometry types.
 */
export type ColliderShape = NoShape | RectShape | CircleShape;

export type ShapeKind = ColliderShape['kind'];

export function noShape(x: number, y: number): NoShape {
  return { kind: 'none', x, y, colliding: false, mouseOver: false };
}

export function rectShape(x: number, y: number, width: number, height: number): RectShape {
  return { kind: 'rect', x, y, width, height, colliding: false, mouseOver: false };
}

export function circleShape(x: number, y: number, radius: number): CircleShape {
  return { kind: 'circle', x, y, radius, colliding: false, mouseOver: false };
}
