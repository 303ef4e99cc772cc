import { type ProjectConfig, type TilemapEntry, type ActorEntry } from '../types/project.js';
import { validateColliderDefinition } from './collider.js';
import * as errors from '../errors.js';
import * as path from 'node:path';

/**
 * Stateful wrapper for a loaded collidermcp.json project configuration.
 * Manages the tilemap and actor registries and layout path resolution.
 */
export class ProjectClass {
    /** Tracks whether the project configuration has unsaved changes */
    public isDirty: boolean = false;

    /** The raw JSON-serializable config data */
    private _data: ProjectConfig;

    /** The absolute path to the collidermcp.json file */
    private _path: string;

    /**
     * Internal constructor. Use static create() or fromJSON().
     */
    private constructor(filePath: string, data: ProjectConfig) {
        this._path = filePath;
        // Deep copy incoming data
        this._data = structuredClone(data);
    }

    // ------------------------------------------------------------------------
    // Getters & Meta
    // ------------------------------------------------------------------------

    get path(): string {
        return this._path;
    }

    get name(): string {
        return this._data.name;
    }

    get collidermcp_version(): string {
        return this._data.collidermcp_version;
    }

    get created(): string | undefined {
        return this._data.created;
    }

    get tilemaps(): Record<string, TilemapEntry> {
        return structuredClone(this._data.tilemaps);
    }

    get actors(): Record<string, ActorEntry> {
        return structuredClone(this._data.actors);
    }

    /**
     * Returns a summary of the project state for the `project info` tool.
     */
    info() {
        return {
            path: this._path,
            name: this._data.name,
            collidermcp_version: this._data.collidermcp_version,
            created: this._data.created,
            tilemaps: this._data.tilemaps,
            actors: this._data.actors,
        };
    }

    // ------------------------------------------------------------------------
    // Registry Management
    // ------------------------------------------------------------------------

    /**
     * Defines a tilemap or updates its tile size. Existing layouts are kept.
     */
    defineTilemap(name: string, tileWidth: number, tileHeight: number): void {
        if (!(tileWidth > 0) || !(tileHeight > 0)) {
            throw new Error(errors.messageOf(errors.invalidArgument(
                `tile size must be positive, got ${String(tileWidth)}×${String(tileHeight)}.`,
            )));
        }
        const existing: TilemapEntry | undefined = this._data.tilemaps[name];
        this._data.tilemaps[name] = {
            tile_width: tileWidth,
            tile_height: tileHeight,
            layouts: existing ? existing.layouts : {},
        };
        this.markDirty();
    }

    /**
     * Registers a layout file for a tilemap. The path is stored relative to the project file.
     */
    addLayout(tilemap: string, layout: string, layoutPath: string): void {
        const entry = this.getTilemap(tilemap);
        entry.layouts[layout] = layoutPath;
        this._data.tilemaps[tilemap] = entry;
        this.markDirty();
    }

    /**
     * Defines an actor type. The collider is validated before it is stored.
     */
    defineActor(name: string, entry: ActorEntry): void {
        if (entry.collider !== undefined) {
            validateColliderDefinition(entry.collider);
        }
        this._data.actors[name] = structuredClone(entry);
        this.markDirty();
    }

    /**
     * Returns a copy of a tilemap entry. Throws if not defined.
     */
    getTilemap(name: string): TilemapEntry {
        const entry: TilemapEntry | undefined = this._data.tilemaps[name];
        if (entry === undefined) {
            throw new Error(errors.messageOf(errors.tilemapNotDefined(name)));
        }
        return structuredClone(entry);
    }

    /**
     * Returns a copy of an actor entry. Throws if not defined.
     */
    getActor(name: string): ActorEntry {
        const entry: ActorEntry | undefined = this._data.actors[name];
        if (entry === undefined) {
            throw new Error(errors.messageOf(errors.actorNotDefined(name)));
        }
        return structuredClone(entry);
    }

    /**
     * Resolves the absolute filepath of a registered layout.
     */
    resolveLayoutPath(tilemap: string, layout: string): string {
        const entry = this.getTilemap(tilemap);
        if (!(layout in entry.layouts)) {
            throw new Error(errors.messageOf(errors.layoutNotDefined(tilemap, layout)));
        }
        return path.resolve(path.dirname(this._path), entry.layouts[layout]);
    }

    // ------------------------------------------------------------------------
    // Serialization
    // ------------------------------------------------------------------------

    /**
     * Returns the raw config data suitable for JSON serialization.
     */
    toJSON(): ProjectConfig {
        return structuredClone(this._data);
    }

    /**
     * Creates a new, blank project representation in memory.
     * @param filePath The absolute path where the collidermcp.json will be saved.
     * @param name The display name of the project.
     */
    static create(filePath: string, name: string): ProjectClass {
        const data: ProjectConfig = {
            collidermcp_version: '1.0',
            name,
            created: new Date().toISOString(),
            tilemaps: {},
            actors: {},
        };
        const proj = new ProjectClass(filePath, data);
        proj.markDirty(); // newly created, needs saving
        return proj;
    }

    /**
     * Instantiates a ProjectClass from loaded JSON data.
     */
    static fromJSON(filePath: string, data: ProjectConfig): ProjectClass {
        return new ProjectClass(filePath, data);
    }

    private markDirty(): void {
        this.isDirty = true;
    }
}
