import { type ColliderDefinition } from '../types/project.js';
import { ColliderClass } from './collider.js';

/**
 * A positioned actor with an optional collider.
 * Every position change is forwarded to the collider.
 */
export class ActorClass {
    public readonly id: number;
    public readonly name: string;
    public readonly collider: ColliderClass;

    private _x: number;
    private _y: number;

    constructor(id: number, name: string, x: number, y: number, collider?: ColliderDefinition) {
        this.id = id;
        this.name = name;
        this._x = x;
        this._y = y;
        this.collider = ColliderClass.fromDefinition(collider, x, y);
    }

    get x(): number {
        return this._x;
    }

    get y(): number {
        return this._y;
    }

    setX(x: number): void {
        this._x = x;
        this.collider.follow(this._x, this._y);
    }

    setY(y: number): void {
        this._y = y;
        this.collider.follow(this._x, this._y);
    }

    setPosition(x: number, y: number): void {
        this._x = x;
        this._y = y;
        this.collider.follow(this._x, this._y);
    }

    moveX(dx: number): void {
        this.setX(this._x + dx);
    }

    moveY(dy: number): void {
        this.setY(this._y + dy);
    }

    /**
     * Returns a summary for the `room` tool.
     */
    info() {
        const shape = this.collider.shape;
        return {
            id: this.id,
            name: this.name,
            x: this._x,
            y: this._y,
            collider: shape.kind === 'none'
                ? { kind: shape.kind }
                : shape.kind === 'rect'
                    ? { kind: shape.kind, x: shape.x, y: shape.y, width: shape.width, height: shape.height }
                    : { kind: shape.kind, x: shape.x, y: shape.y, radius: shape.radius },
        };
    }
}
