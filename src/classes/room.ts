import { type CollisionMaskSet, type MapCollision } from '../types/layout.js';
import { type ColliderDefinition } from '../types/project.js';
import { behaviorCodes } from '../algorithms/collision-masks.js';
import * as query from '../collision/query.js';
import { ActorClass } from './actor.js';
import { type TilemapLayoutClass } from './tilemap-layout.js';
import * as errors from '../errors.js';

/**
 * The collision state of one active level: its actors and the compiled
 * masks of its tilemap layout.
 *
 * Owned by whoever runs the level; several rooms can coexist.
 */
export class RoomClass {
    /** Actors keyed by id, in spawn order. */
    public readonly actors: Map<number, ActorClass> = new Map();

    private _layout: TilemapLayoutClass | null = null;
    private _masks: CollisionMaskSet | null = null;
    private _nextId = 1;
    private _frame = 0;

    // ------------------------------------------------------------------------
    // Layout lifecycle
    // ------------------------------------------------------------------------

    get layout(): TilemapLayoutClass | null {
        return this._layout;
    }

    /** Compiled masks of the active layout, or null if none is active. */
    get masks(): CollisionMaskSet | null {
        return this._masks;
    }

    /**
     * Activates a layout. The previous mask set is discarded and a new one compiled.
     */
    activateLayout(layout: TilemapLayoutClass): void {
        const masks = layout.compileMasks();
        this._layout = layout;
        this._masks = masks;
    }

    deactivateLayout(): void {
        this._layout = null;
        this._masks = null;
    }

    // ------------------------------------------------------------------------
    // Actors
    // ------------------------------------------------------------------------

    spawnActor(name: string, x: number, y: number, collider?: ColliderDefinition): ActorClass {
        const actor = new ActorClass(this._nextId, name, x, y, collider);
        this._nextId++;
        this.actors.set(actor.id, actor);
        return actor;
    }

    /**
     * Returns an actor by id. Throws if it does not exist.
     */
    getActor(id: number): ActorClass {
        const actor = this.actors.get(id);
        if (actor === undefined) {
            throw new Error(errors.messageOf(errors.actorNotFound(id)));
        }
        return actor;
    }

    removeActor(id: number): void {
        if (!this.actors.delete(id)) {
            throw new Error(errors.messageOf(errors.actorNotFound(id)));
        }
    }

    // ------------------------------------------------------------------------
    // Frame & queries
    // ------------------------------------------------------------------------

    get frame(): number {
        return this._frame;
    }

    /**
     * Starts a new frame: clears all collision flags.
     */
    resetFrame(): void {
        query.resetFrame([...this.actors.values()].map(actor => actor.collider), this._masks);
        this._frame++;
    }

    testActorCollision(a: ActorClass, b: ActorClass): boolean {
        return query.testEntities(a.collider, b.collider);
    }

    /**
     * Returns the masks of `code` the actor overlaps. Empty when no layout is active.
     */
    testMapCollision(actor: ActorClass, code: number): MapCollision[] {
        return query.testAgainstBehavior(actor.collider, code, this._masks);
    }

    mouseOverActor(actor: ActorClass, px: number, py: number): boolean {
        return query.testPoint(actor.collider, px, py);
    }

    /** Behavior codes of the active layout, ascending. */
    behaviorCodes(): number[] {
        return this._masks === null ? [] : behaviorCodes(this._masks);
    }

    /**
     * Geometry and flags of everything collidable, for debug overlays.
     */
    debugState() {
        const masks: Array<{ behavior: number; x: number; y: number; width: number; height: number; colliding: boolean }> = [];
        if (this._masks !== null) {
            for (const [behavior, list] of this._masks) {
                for (const m of list) {
                    masks.push({ behavior, x: m.x, y: m.y, width: m.width, height: m.height, colliding: m.colliding });
                }
            }
        }
        return {
            frame: this._frame,
            actors: [...this.actors.values()].map(actor => ({
                ...actor.info(),
                colliding: actor.collider.colliding,
                mouseOver: actor.collider.mouseOver,
            })),
            masks,
        };
    }

    info() {
        return {
            frame: this._frame,
            layout: this._layout ? this._layout.info() : null,
            behaviors: this.behaviorCodes(),
            actors: [...this.actors.values()].map(actor => actor.info()),
        };
    }
}
