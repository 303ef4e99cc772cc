import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SessionClass } from './session.js';
import { ProjectClass } from './project.js';
import * as path from 'node:path';

vi.mock('../io/index.js', () => ({
  loadLayoutFile: vi.fn(),
}));

import { loadLayoutFile } from '../io/index.js';

const projectPath = path.resolve('/mock/game/collidermcp.json');

function makeProject(): ProjectClass {
  const project = ProjectClass.create(projectPath, 'Game');
  project.defineTilemap('cave', 16, 16);
  project.addLayout('cave', 'level1', 'maps/level1.json');
  return project;
}

describe('SessionClass', () => {
  beforeEach(() => {
    vi.mocked(loadLayoutFile).mockReset();
  });

  it('starts with no project and an empty room', () => {
    const session = new SessionClass();
    expect(session.project).toBeNull();
    expect(session.room.actors.size).toBe(0);
    expect(() => session.requireProject()).toThrow(
      'No project loaded. Call project init or project open first.',
    );
  });

  it('replaces the room when a project is set', () => {
    const session = new SessionClass();
    session.room.spawnActor('player', 0, 0);
    const before = session.room;

    session.setProject(makeProject());

    expect(session.room).not.toBe(before);
    expect(session.room.actors.size).toBe(0);
    expect(session.requireProject().name).toBe('Game');
  });

  it('loads and activates a layout relative to the project file', async () => {
    vi.mocked(loadLayoutFile).mockResolvedValue({ tiles: [[0, 0], [1, 1]] });
    const session = new SessionClass();
    session.setProject(makeProject());

    const layout = await session.enterLayout('cave', 'level1');

    expect(loadLayoutFile).toHaveBeenCalledWith(path.resolve('/mock/game', 'maps/level1.json'));
    expect(layout.tileWidth).toBe(16);
    expect(session.room.layout).toBe(layout);
    expect(session.room.behaviorCodes()).toEqual([1]);
  });

  it('rejects unknown tilemaps and layouts without loading anything', async () => {
    const session = new SessionClass();
    session.setProject(makeProject());

    await expect(session.enterLayout('forest', 'level1')).rejects.toThrow(
      "Tilemap 'forest' is not defined in the project.",
    );
    await expect(session.enterLayout('cave', 'level9')).rejects.toThrow(
      "Layout 'level9' is not defined for tilemap 'cave'.",
    );
    expect(loadLayoutFile).not.toHaveBeenCalled();
  });

  it('keeps the previous layout when loading fails', async () => {
    vi.mocked(loadLayoutFile).mockResolvedValueOnce({ tiles: [[1]] });
    const session = new SessionClass();
    session.setProject(makeProject());
    const first = await session.enterLayout('cave', 'level1');

    vi.mocked(loadLayoutFile).mockRejectedValueOnce(new Error('Layout file not found: x'));
    await expect(session.enterLayout('cave', 'level1')).rejects.toThrow('Layout file not found: x');
    expect(session.room.layout).toBe(first);
  });

  it('summarizes the session', () => {
    const session = new SessionClass();
    expect(session.info()).toEqual({
      project: null,
      room: { frame: 0, layout: null, behaviors: [], actors: [] },
    });

    session.setProject(makeProject());
    expect(session.info().project).toEqual({ name: 'Game', path: projectPath });
  });
});
