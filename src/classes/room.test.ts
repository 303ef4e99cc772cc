import { describe, it, expect } from 'vitest';
import { RoomClass } from './room.js';
import { TilemapLayoutClass } from './tilemap-layout.js';
import { type ColliderDefinition } from '../types/project.js';

const box: ColliderDefinition = { offset: [0, 0], width: 16, height: 16 };

function floorLayout(): TilemapLayoutClass {
  return new TilemapLayoutClass('cave', 'level1', 16, 16, {
    tiles: [
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [1, 1, 1, 1],
    ],
  });
}

describe('RoomClass', () => {
  describe('actors', () => {
    it('assigns increasing ids in spawn order', () => {
      const room = new RoomClass();
      const a = room.spawnActor('player', 0, 0, box);
      const b = room.spawnActor('enemy', 10, 0, box);

      expect(a.id).toBe(1);
      expect(b.id).toBe(2);
      expect([...room.actors.keys()]).toEqual([1, 2]);
    });

    it('does not reuse ids after removal', () => {
      const room = new RoomClass();
      room.spawnActor('player', 0, 0);
      room.removeActor(1);
      expect(room.spawnActor('player', 0, 0).id).toBe(2);
    });

    it('throws for unknown actors', () => {
      const room = new RoomClass();
      expect(() => room.getActor(5)).toThrow('Actor 5 does not exist in the room.');
      expect(() => room.removeActor(5)).toThrow('Actor 5 does not exist in the room.');
    });
  });

  describe('layout', () => {
    it('starts without a layout', () => {
      const room = new RoomClass();
      expect(room.layout).toBeNull();
      expect(room.masks).toBeNull();
      expect(room.behaviorCodes()).toEqual([]);
    });

    it('compiles masks on activation and drops them on deactivation', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());

      expect(room.behaviorCodes()).toEqual([1]);
      expect(room.masks?.get(1)?.length).toBe(1);

      room.deactivateLayout();
      expect(room.layout).toBeNull();
      expect(room.masks).toBeNull();
    });

    it('replaces the previous mask set', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      const first = room.masks;

      room.activateLayout(new TilemapLayoutClass('cave', 'level2', 16, 16, { tiles: [[0], [0]], behaviors: [[2], [3]] }));
      expect(room.masks).not.toBe(first);
      expect(room.behaviorCodes()).toEqual([2, 3]);
    });
  });

  describe('queries', () => {
    it('reports the floor mask the player stands in', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      const player = room.spawnActor('player', 8, 20, box);

      expect(room.testMapCollision(player, 1)).toEqual([
        { leftEdgeX: 0, rightEdgeX: 64, topEdgeY: 32, bottomEdgeY: 48 },
      ]);
    });

    it('does not report a floor the player only touches', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      const player = room.spawnActor('player', 8, 16, box);

      expect(room.testMapCollision(player, 1)).toEqual([]);
    });

    it('returns an empty list without a layout', () => {
      const room = new RoomClass();
      const player = room.spawnActor('player', 8, 20, box);
      expect(room.testMapCollision(player, 1)).toEqual([]);
    });

    it('tests actors against each other and against the cursor', () => {
      const room = new RoomClass();
      const a = room.spawnActor('player', 0, 0, box);
      const b = room.spawnActor('enemy', 8, 8, box);
      const c = room.spawnActor('enemy', 100, 0, box);

      expect(room.testActorCollision(a, b)).toBe(true);
      expect(room.testActorCollision(a, c)).toBe(false);
      expect(room.mouseOverActor(c, 105, 5)).toBe(true);
    });
  });

  describe('frames', () => {
    it('clears flags and counts frames', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      const a = room.spawnActor('player', 8, 20, box);
      const b = room.spawnActor('enemy', 10, 20, box);

      room.testActorCollision(a, b);
      room.testMapCollision(a, 1);
      room.mouseOverActor(a, 9, 21);
      expect(room.frame).toBe(0);

      room.resetFrame();

      expect(room.frame).toBe(1);
      expect(a.collider.colliding).toBe(false);
      expect(a.collider.mouseOver).toBe(false);
      expect(b.collider.colliding).toBe(false);
      expect(room.masks?.get(1)?.[0].colliding).toBe(false);
    });

    it('accumulates flags within a frame', () => {
      const room = new RoomClass();
      const a = room.spawnActor('player', 0, 0, box);
      const b = room.spawnActor('enemy', 8, 8, box);
      const c = room.spawnActor('enemy', 100, 0, box);

      room.testActorCollision(a, b);
      room.testActorCollision(a, c);
      expect(a.collider.colliding).toBe(true);
      expect(c.collider.colliding).toBe(false);
    });
  });

  describe('debugState', () => {
    it('lists actors and masks with their flags', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      const player = room.spawnActor('player', 8, 20, box);
      room.testMapCollision(player, 1);

      expect(room.debugState()).toEqual({
        frame: 0,
        actors: [
          {
            id: 1,
            name: 'player',
            x: 8,
            y: 20,
            collider: { kind: 'rect', x: 8, y: 20, width: 16, height: 16 },
            colliding: true,
            mouseOver: false,
          },
        ],
        masks: [{ behavior: 1, x: 0, y: 32, width: 64, height: 16, colliding: true }],
      });
    });
  });

  describe('info', () => {
    it('summarizes the room', () => {
      const room = new RoomClass();
      room.activateLayout(floorLayout());
      room.spawnActor('marker', 1, 2);

      expect(room.info()).toEqual({
        frame: 0,
        layout: {
          tilemap: 'cave',
          layout: 'level1',
          columns: 4,
          rows: 3,
          tile_width: 16,
          tile_height: 16,
          behaviors: 'binarized',
        },
        behaviors: [1],
        actors: [{ id: 1, name: 'marker', x: 1, y: 2, collider: { kind: 'none' } }],
      });
    });
  });
});
