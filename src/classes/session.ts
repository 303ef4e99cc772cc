import { ProjectClass } from './project.js';
import { RoomClass } from './room.js';
import { TilemapLayoutClass } from './tilemap-layout.js';
import { loadLayoutFile } from '../io/index.js';
import * as errors from '../errors.js';

/**
 * In-memory server session: the open project and the room being simulated.
 * Created once by the server entry point and handed to every tool.
 * Not persisted to disk.
 */
export class SessionClass {
    /** The active project configuration, or null if no project is loaded. */
    public project: ProjectClass | null = null;

    /** The room whose actors and masks the collision tools operate on. */
    public room: RoomClass = new RoomClass();

    /**
     * Sets the active project. The room is replaced, since its layout and
     * actors came from the previous project.
     */
    setProject(project: ProjectClass): void {
        this.project = project;
        this.room = new RoomClass();
    }

    /**
     * Returns the active project. Throws if none is loaded.
     */
    requireProject(): ProjectClass {
        if (!this.project) {
            throw new Error(errors.messageOf(errors.noProjectLoaded()));
        }
        return this.project;
    }

    /**
     * Loads a layout file from the project and activates it in the room.
     */
    async enterLayout(tilemap: string, layout: string): Promise<TilemapLayoutClass> {
        const project = this.requireProject();
        const entry = project.getTilemap(tilemap);
        const filePath = project.resolveLayoutPath(tilemap, layout);
        const data = await loadLayoutFile(filePath);

        const layoutClass = new TilemapLayoutClass(tilemap, layout, entry.tile_width, entry.tile_height, data);
        this.room.activateLayout(layoutClass);
        return layoutClass;
    }

    /**
     * Returns a summary of the current session state.
     */
    info() {
        return {
            project: this.project
                ? { name: this.project.name, path: this.project.path }
                : null,
            room: this.room.info(),
        };
    }
}
