import { type ColliderShape, type ShapeKind, noShape, rectShape, circleShape } from '../types/shape.js';
import { type ColliderDefinition } from '../types/project.js';
import * as errors from '../errors.js';

/**
 * Returns why a collider definition cannot be built, or null if it can.
 */
export function colliderProblem(def: ColliderDefinition): string | null {
    const width = def.width ?? 0;
    const height = def.height ?? 0;
    const radius = def.radius ?? 0;

    if (width < 0 || height < 0 || radius < 0) {
        return 'Dimensions cannot be negative.';
    }
    if (width === 0 && height === 0 && radius === 0) {
        return 'Non-zero dimensions must be provided.';
    }
    if (radius !== 0 && (width !== 0 || height !== 0)) {
        return 'Width/height cannot be specified along with radius. They are mutually exclusive.';
    }
    if (width !== 0 && height === 0) {
        return 'Width was non-zero, but height was not.';
    }
    if (width === 0 && height !== 0) {
        return 'Height was non-zero, but width was not.';
    }
    return null;
}

/**
 * Throws `invalidCollider` if the definition cannot be built.
 */
export function validateColliderDefinition(def: ColliderDefinition): void {
    const problem = colliderProblem(def);
    if (problem !== null) {
        throw new Error(errors.messageOf(errors.invalidCollider(problem)));
    }
}

/**
 * The live collision shape of one actor.
 *
 * The shape's position is always derived from the owner's origin plus a
 * fixed offset; `follow()` is the only way to move it.
 */
export class ColliderClass {
    private _shape: ColliderShape;
    private readonly _offsetX: number;
    private readonly _offsetY: number;

    private constructor(shape: ColliderShape, offsetX: number, offsetY: number) {
        this._shape = shape;
        this._offsetX = offsetX;
        this._offsetY = offsetY;
    }

    /**
     * Builds a collider at the given origin. Without a definition the actor
     * gets a `none` shape that never collides.
     */
    static fromDefinition(def: ColliderDefinition | undefined, originX: number, originY: number): ColliderClass {
        if (def === undefined) {
            return new ColliderClass(noShape(originX, originY), 0, 0);
        }
        validateColliderDefinition(def);

        const [offsetX, offsetY] = def.offset;
        const x = originX + offsetX;
        const y = originY + offsetY;
        const radius = def.radius ?? 0;
        const shape = radius !== 0
            ? circleShape(x, y, radius)
            : rectShape(x, y, def.width ?? 0, def.height ?? 0);
        return new ColliderClass(shape, offsetX, offsetY);
    }

    /**
     * The shape tested by the collision queries. Flags are written by the
     * query facade only.
     */
    get shape(): ColliderShape {
        return this._shape;
    }

    get kind(): ShapeKind {
        return this._shape.kind;
    }

    get offset(): [number, number] {
        return [this._offsetX, this._offsetY];
    }

    get colliding(): boolean {
        return this._shape.colliding;
    }

    get mouseOver(): boolean {
        return this._shape.mouseOver;
    }

    /**
     * Re-derives the shape position from the owner's origin. Flags are kept.
     */
    follow(originX: number, originY: number): void {
        this._shape = { ...this._shape, x: originX + this._offsetX, y: originY + this._offsetY };
    }

    // ------------------------------------------------------------------------
    // Geometry (0 where the shape kind has no such dimension)
    // ------------------------------------------------------------------------

    get width(): number {
        return this._shape.kind === 'rect' ? this._shape.width : 0;
    }

    get height(): number {
        return this._shape.kind === 'rect' ? this._shape.height : 0;
    }

    get radius(): number {
        return this._shape.kind === 'circle' ? this._shape.radius : 0;
    }

    get leftEdgeX(): number {
        return this._shape.x;
    }

    get rightEdgeX(): number {
        return this._shape.x + this.width;
    }

    get topEdgeY(): number {
        return this._shape.y;
    }

    get bottomEdgeY(): number {
        return this._shape.y + this.height;
    }
}
