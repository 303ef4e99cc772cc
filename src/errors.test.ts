import { describe, it, expect } from 'vitest';
import * as errors from './errors.js';

describe('Shared Error Factory (src/errors.ts)', () => {
  it('domainError helper constructs the correct shape', () => {
    const err = errors.domainError('Test message');
    expect(err).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Test message' }],
    });
  });

  it('invalidArgument prefixes the message', () => {
    expect(errors.invalidArgument('x must be set.').content[0].text).toBe('Invalid argument: x must be set.');
  });

  it('messageOf returns the response text', () => {
    expect(errors.messageOf(errors.actorNotFound(3))).toBe('Actor 3 does not exist in the room.');
  });

  describe('project errors', () => {
    it('noProjectLoaded', () => {
      expect(errors.noProjectLoaded().content[0].text).toBe(
        'No project loaded. Call project init or project open first.',
      );
    });

    it('projectFileNotFound', () => {
      expect(errors.projectFileNotFound('path/to/missing.json').content[0].text).toBe(
        'Project file not found: path/to/missing.json',
      );
    });

    it('invalidProjectFile', () => {
      expect(errors.invalidProjectFile('a.json', 'name: Required').content[0].text).toBe(
        'Invalid project file: a.json. name: Required',
      );
    });

    it('tilemapNotDefined', () => {
      expect(errors.tilemapNotDefined('cave').content[0].text).toBe(
        "Tilemap 'cave' is not defined in the project.",
      );
    });

    it('layoutNotDefined', () => {
      expect(errors.layoutNotDefined('cave', 'level1').content[0].text).toBe(
        "Layout 'level1' is not defined for tilemap 'cave'.",
      );
    });

    it('actorNotDefined', () => {
      expect(errors.actorNotDefined('player').content[0].text).toBe(
        "Actor 'player' is not defined in the project.",
      );
    });
  });

  describe('layout errors', () => {
    it('layoutFileNotFound', () => {
      expect(errors.layoutFileNotFound('maps/l1.json').content[0].text).toBe('Layout file not found: maps/l1.json');
    });

    it('invalidLayoutFile', () => {
      expect(errors.invalidLayoutFile('l1.json', 'tiles: Required').content[0].text).toBe(
        'Invalid layout file: l1.json. tiles: Required',
      );
    });

    it('malformedGrid', () => {
      expect(errors.malformedGrid('row 2 is short.').content[0].text).toBe('Malformed grid: row 2 is short.');
    });

    it('gridSizeMismatch', () => {
      expect(errors.gridSizeMismatch(2, 1, 3, 1).content[0].text).toBe(
        'Behavior grid (3×1) does not match tile grid (2×1).',
      );
    });
  });

  describe('collider and room errors', () => {
    it('invalidCollider', () => {
      expect(errors.invalidCollider('Dimensions cannot be negative.').content[0].text).toBe(
        'Invalid collider: Dimensions cannot be negative.',
      );
    });

    it('noLayoutActive', () => {
      expect(errors.noLayoutActive().content[0].text).toBe(
        'No tilemap layout is active. Call room enter first.',
      );
    });

    it('unknownBehaviorCode', () => {
      expect(errors.unknownBehaviorCode(7).content[0].text).toBe(
        'Behavior code 7 has no collision masks in the active layout.',
      );
    });
  });

  it('every factory sets isError', () => {
    expect(errors.noLayoutActive().isError).toBe(true);
    expect(errors.invalidCollider('x').isError).toBe(true);
  });
});
