import { type BehaviorGrid, type CollisionMaskSet, type LayoutData, type TileGrid } from '../types/layout.js';
import { binarizeTiles, compileCollisionMasks, validateGrid } from '../algorithms/collision-masks.js';
import * as errors from '../errors.js';

/**
 * One layout of a tilemap: its tile grid, its behavior grid and the tile size.
 */
export class TilemapLayoutClass {
    public readonly tilemap: string;
    public readonly layout: string;
    public readonly tileWidth: number;
    public readonly tileHeight: number;

    private readonly _tiles: TileGrid;
    private readonly _behaviors: BehaviorGrid;
    private readonly _explicitBehaviors: boolean;

    /**
     * Validates both grids. Without a behavior grid, one is binarized from the tiles.
     */
    constructor(tilemap: string, layout: string, tileWidth: number, tileHeight: number, data: LayoutData) {
        validateGrid(data.tiles);
        if (data.behaviors !== undefined) {
            validateGrid(data.behaviors);
            const tw = data.tiles.length > 0 ? data.tiles[0].length : 0;
            const bw = data.behaviors.length > 0 ? data.behaviors[0].length : 0;
            if (tw !== bw || data.tiles.length !== data.behaviors.length) {
                throw new Error(errors.messageOf(
                    errors.gridSizeMismatch(tw, data.tiles.length, bw, data.behaviors.length),
                ));
            }
        }

        this.tilemap = tilemap;
        this.layout = layout;
        this.tileWidth = tileWidth;
        this.tileHeight = tileHeight;
        this._tiles = data.tiles.map(row => [...row]);
        this._explicitBehaviors = data.behaviors !== undefined;
        this._behaviors = data.behaviors !== undefined
            ? data.behaviors.map(row => [...row])
            : binarizeTiles(this._tiles);
    }

    get columns(): number {
        return this._tiles.length > 0 ? this._tiles[0].length : 0;
    }

    get rows(): number {
        return this._tiles.length;
    }

    /** Copy of the behavior grid used for compilation. */
    get behaviors(): BehaviorGrid {
        return this._behaviors.map(row => [...row]);
    }

    /**
     * Compiles a fresh mask set. Callers replace their previous set with it.
     */
    compileMasks(): CollisionMaskSet {
        return compileCollisionMasks(this._behaviors, this.tileWidth, this.tileHeight);
    }

    info() {
        return {
            tilemap: this.tilemap,
            layout: this.layout,
            columns: this.columns,
            rows: this.rows,
            tile_width: this.tileWidth,
            tile_height: this.tileHeight,
            behaviors: this._explicitBehaviors ? 'explicit' : 'binarized',
        };
    }
}
