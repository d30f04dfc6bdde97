import { detourLength, Navigator } from '../../navigation/navigator';
import type { Direction, LandmarkRegistry } from '../../navigation/types';
import { silentLogger } from '../../logging/logger';

const registry: LandmarkRegistry = {
  '5': {
    name: 'Stone City',
    landmarks: {
      gym: { x: 10, y: 10, label: 'Rock gym' },
      center: { x: 2, y: 0 }
    }
  },
  '6': { name: 'Empty Route', landmarks: {} }
};

function buildNavigator() {
  return new Navigator({ registry, logger: silentLogger });
}

describe('detourLength', () => {
  it('grows by two per stuck event and caps at twelve', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(detourLength)).toEqual([3, 5, 7, 9, 11, 12, 12]);
  });
});

describe('Navigator', () => {
  it('rejects unknown maps and landmarks', () => {
    const navigator = buildNavigator();

    expect(navigator.setTarget(99, 'gym')).toBe(false);
    expect(navigator.setTarget(5, 'mart')).toBe(false);
    expect(navigator.isActive).toBe(false);
    expect(navigator.getNextDirection(0, 0, 5)).toBeNull();
  });

  it('walks along the larger axis first', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    expect(navigator.getNextDirection(0, 8, 5)).toBe('RIGHT');
    expect(navigator.getNextDirection(9, 3, 5)).toBe('DOWN');
    expect(navigator.getNextDirection(14, 17, 5)).toBe('UP');
    expect(navigator.getNextDirection(15, 11, 5)).toBe('LEFT');
  });

  it('prefers the vertical axis when distances tie', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    expect(navigator.getNextDirection(7, 7, 5)).toBe('DOWN');
  });

  it('arrives within one tile and stops issuing directions', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    expect(navigator.getNextDirection(9, 11, 5)).toBeNull();
    expect(navigator.isActive).toBe(false);
    expect(navigator.getNextDirection(0, 0, 5)).toBeNull();
    expect(navigator.snapshot().target!.key).toBe('gym');
  });

  it('cancels when the map changes', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    expect(navigator.getNextDirection(0, 0, 6)).toBeNull();
    expect(navigator.isActive).toBe(false);
    expect(navigator.snapshot().target).toBeNull();
  });

  it('detours perpendicular after three unmoved ticks', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    const directions: Array<Direction | null> = [];
    for (let i = 0; i < 4; i += 1) {
      directions.push(navigator.getNextDirection(0, 10, 5));
    }

    expect(directions).toEqual(['RIGHT', 'RIGHT', 'RIGHT', 'UP']);
    expect(navigator.snapshot().totalStuck).toBe(1);
    expect(navigator.snapshot().detour).toEqual({ direction: 'UP', ticksLeft: 5 });
  });

  it('keeps the detour direction while the player moves, then resumes', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');
    for (let i = 0; i < 4; i += 1) {
      navigator.getNextDirection(0, 10, 5);
    }

    const directions: Array<Direction | null> = [];
    for (let y = 9; y >= 5; y -= 1) {
      directions.push(navigator.getNextDirection(0, y, 5));
    }

    expect(directions).toEqual(['UP', 'UP', 'UP', 'UP', 'RIGHT']);
    expect(navigator.snapshot().detour).toBeNull();
  });

  it('switches to the other perpendicular when the detour is blocked', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');
    for (let i = 0; i < 4; i += 1) {
      navigator.getNextDirection(0, 10, 5);
    }

    expect(navigator.getNextDirection(0, 10, 5)).toBe('DOWN');
    expect(navigator.snapshot().totalStuck).toBe(2);
    expect(navigator.snapshot().detour).toEqual({ direction: 'DOWN', ticksLeft: 7 });
    expect(navigator.getNextDirection(0, 10, 5)).toBe('UP');
    expect(navigator.snapshot().detour).toEqual({ direction: 'UP', ticksLeft: 9 });
  });

  it('uses left and right detours when the vertical axis dominates', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    const directions: Array<Direction | null> = [];
    for (let i = 0; i < 4; i += 1) {
      directions.push(navigator.getNextDirection(10, 0, 5));
    }

    expect(directions).toEqual(['DOWN', 'DOWN', 'DOWN', 'LEFT']);
  });

  it('gives up after fifteen stuck events', () => {
    const navigator = buildNavigator();
    navigator.setTarget(5, 'gym');

    let result: Direction | null = 'RIGHT';
    let calls = 0;
    while (navigator.isActive && calls < 500) {
      result = navigator.getNextDirection(0, 10, 5);
      calls += 1;
    }

    // Call 4 is the first stuck event; each blocked detour after it is another, and the 15th cancels.
    expect(calls).toBe(18);
    expect(result).toBeNull();
    expect(navigator.isActive).toBe(false);
    expect(navigator.snapshot().target).toBeNull();
  });

  it('reports the remaining Manhattan distance', () => {
    const navigator = buildNavigator();
    expect(navigator.distanceRemaining(3, 4)).toBe(0);

    navigator.setTarget(5, 'gym');
    expect(navigator.distanceRemaining(3, 4)).toBe(13);
  });

  it('lists landmarks as GOTO commands', () => {
    const navigator = buildNavigator();

    expect(navigator.targetsText(5)).toBe('  GOTO_GYM = walk to Rock gym\n  GOTO_CENTER = walk to center');
    expect(navigator.targetsText(6)).toBe('');
    expect(navigator.targetsText(99)).toBe('');
    expect(navigator.availableTargets(5)).toEqual(['gym', 'center']);
  });

  it('treats landmark keys inherited from Object.prototype as unknown', () => {
    const navigator = buildNavigator();

    expect(navigator.setTarget(5, 'constructor')).toBe(false);
    expect(navigator.setTarget(5, 'toString')).toBe(false);
    expect(navigator.setTarget(6, 'hasOwnProperty')).toBe(false);
    expect(navigator.isActive).toBe(false);
    expect(navigator.snapshot().target).toBeNull();
    expect(navigator.distanceRemaining(3, 4)).toBe(0);
    expect(navigator.getNextDirection(3, 4, 5)).toBeNull();
    expect(navigator.parseGotoCommand('GOTO_CONSTRUCTOR', 5)).toBeNull();
  });

  it('parses GOTO commands back to landmark keys', () => {
    const navigator = buildNavigator();

    expect(navigator.parseGotoCommand('GOTO_GYM', 5)).toBe('gym');
    expect(navigator.parseGotoCommand(' goto_center ', 5)).toBe('center');
    expect(navigator.parseGotoCommand('GOTO_MART', 5)).toBeNull();
    expect(navigator.parseGotoCommand('A', 5)).toBeNull();
  });
});
