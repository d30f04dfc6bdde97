import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadLandmarkRegistry } from '../../navigation/landmark-registry';
import { silentLogger } from '../../logging/logger';

describe('loadLandmarkRegistry', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'landmarks-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads maps and counts their landmarks', () => {
    const path = join(dir, 'landmarks.json');
    writeFileSync(
      path,
      JSON.stringify({
        '1': { name: 'Town', landmarks: { center: { x: 1, y: 2, label: 'Center' }, exit: { x: 0, y: 9 } } },
        '2': { name: 'Route' }
      }),
      'utf-8'
    );
    const info = jest.fn();

    const registry = loadLandmarkRegistry(path, { ...silentLogger, info });

    expect(registry['1']!.landmarks.exit).toEqual({ x: 0, y: 9 });
    expect(registry['2']!.landmarks).toEqual({});
    expect(info).toHaveBeenCalledWith('Navigator: loaded 2 landmarks across 2 maps');
  });

  it('falls back to an empty registry when the file is missing or invalid', () => {
    const warn = jest.fn();
    const logger = { ...silentLogger, warn };
    const path = join(dir, 'landmarks.json');

    expect(loadLandmarkRegistry(path, logger)).toEqual({});
    expect(warn).toHaveBeenLastCalledWith(`landmark registry file not found: ${path}`);

    writeFileSync(path, JSON.stringify({ '1': { name: 'Town', landmarks: { center: { x: 'one', y: 2 } } } }), 'utf-8');
    expect(loadLandmarkRegistry(path, logger)).toEqual({});
    expect(warn).toHaveBeenLastCalledWith(
      `Invalid landmark registry in ${path}: 1.landmarks.center.x: Expected number, received string`
    );
  });

  it('loads the bundled landmark data', () => {
    const registry = loadLandmarkRegistry(join(__dirname, '..', '..', 'data', 'landmarks.json'), silentLogger);

    expect(registry['5']!.landmarks.gym).toEqual({ x: 15, y: 17, label: 'Rock gym' });
  });
});
