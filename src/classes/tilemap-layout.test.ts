import { describe, it, expect } from 'vitest';
import { TilemapLayoutClass } from './tilemap-layout.js';
import { rectShape } from '../types/shape.js';

describe('TilemapLayoutClass', () => {
  it('binarizes the tiles when no behavior grid is given', () => {
    const layout = new TilemapLayoutClass('cave', 'level1', 16, 16, { tiles: [[0, 4], [9, 0]] });

    expect(layout.behaviors).toEqual([[0, 1], [1, 0]]);
    expect(layout.columns).toBe(2);
    expect(layout.rows).toBe(2);
    expect(layout.info()).toEqual({
      tilemap: 'cave',
      layout: 'level1',
      columns: 2,
      rows: 2,
      tile_width: 16,
      tile_height: 16,
      behaviors: 'binarized',
    });
  });

  it('uses an explicit behavior grid as given', () => {
    const layout = new TilemapLayoutClass('cave', 'level1', 8, 8, {
      tiles: [[3, 3], [3, 3]],
      behaviors: [[0, 2], [1, 1]],
    });

    expect(layout.behaviors).toEqual([[0, 2], [1, 1]]);
    expect(layout.info().behaviors).toBe('explicit');
  });

  it('rejects a behavior grid of a different size', () => {
    expect(() => new TilemapLayoutClass('cave', 'level1', 16, 16, {
      tiles: [[1, 1]],
      behaviors: [[1, 1, 1]],
    })).toThrow('Behavior grid (3×1) does not match tile grid (2×1).');
  });

  it('rejects ragged grids', () => {
    expect(() => new TilemapLayoutClass('cave', 'level1', 16, 16, { tiles: [[1, 1], [1]] })).toThrow(
      'Malformed grid: row 1 has 1 cell(s), expected 2.',
    );
  });

  it('does not share grids with the caller', () => {
    const behaviors = [[1, 0]];
    const layout = new TilemapLayoutClass('cave', 'level1', 16, 16, { tiles: [[1, 0]], behaviors });

    behaviors[0][1] = 1;
    expect(layout.behaviors).toEqual([[1, 0]]);

    const copy = layout.behaviors;
    copy[0][0] = 5;
    expect(layout.behaviors).toEqual([[1, 0]]);
  });

  it('compiles masks with the tile size', () => {
    const layout = new TilemapLayoutClass('cave', 'level1', 16, 8, { tiles: [[0, 0], [1, 1]] });
    const masks = layout.compileMasks();

    expect(masks.get(1)).toEqual([rectShape(0, 8, 32, 8)]);
  });

  it('compiles a fresh mask set each time', () => {
    const layout = new TilemapLayoutClass('cave', 'level1', 16, 16, { tiles: [[1]] });
    expect(layout.compileMasks()).not.toBe(layout.compileMasks());
  });

  it('handles an empty layout', () => {
    const layout = new TilemapLayoutClass('cave', 'empty', 16, 16, { tiles: [] });
    expect(layout.columns).toBe(0);
    expect(layout.rows).toBe(0);
    expect(layout.compileMasks().size).toBe(0);
  });
});
