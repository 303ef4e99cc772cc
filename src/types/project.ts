/**
 * Core types for the collidermcp.json project configuration file.
 *
 * Declares the tilemaps (tile size and named layout files) and the
 * collider of each actor type.
 */

/**
 * Collider of an actor type. A rectangle needs both `width` and `height`;
 * a circle needs `radius`. The two are mutually exclusive.
 */
export interface ColliderDefinition {
  /** Offset [x, y] from the actor's origin to the collider's origin */
  offset: [number, number];
  width?: number;
  height?: number;
  radius?: number;
}

/**
 * A tilemap: one tile size shared by several layouts.
 */
export interface TilemapEntry {
  tile_width: number;
  tile_height: number;
  /** Layout name → layout file path, relative to collidermcp.json */
  layouts: Record<string, string>;
}

/**
 * An actor type. Actors without a collider never collide.
 */
export interface ActorEntry {
  collider?: ColliderDefinition;
}

/**
 * The complete structure of the collidermcp.json file.
 */
export interface ProjectConfig {
  /** Schema version, e.g., "1.0" */
  collidermcp_version: string;
  /** Display name of the project */
  name: string;
  /** ISO 8601 creation timestamp */
  created?: string;

  tilemaps: Record<string, TilemapEntry>;
  actors: Record<string, ActorEntry>;
}
