import { join } from 'path';
import { loadMoveTypes, loadSpeciesTypes, loadTypeChart, typeEffectiveness } from '../../battle/type-chart';
import type { TypeChart } from '../../battle/types';
import { silentLogger } from '../../logging/logger';

const dataDir = join(__dirname, '..', '..', 'data');

describe('typeEffectiveness', () => {
  const chart: TypeChart = {
    Water: { Fire: 2.0, Flying: 1.0, Grass: 0.5 },
    Electric: { Ground: 0, Water: 2.0, Flying: 2.0 }
  };

  it('multiplies the factors of both defending types', () => {
    expect(typeEffectiveness(chart, 'Water', ['Fire', 'Flying'])).toBe(2.0);
    expect(typeEffectiveness(chart, 'Electric', ['Water', 'Flying'])).toBe(4.0);
    expect(typeEffectiveness(chart, 'Water', ['Fire', 'Grass'])).toBe(1.0);
  });

  it('treats missing entries as neutral', () => {
    expect(typeEffectiveness(chart, 'Water', ['Normal'])).toBe(1.0);
    expect(typeEffectiveness(chart, 'Dragon', ['Fire'])).toBe(1.0);
    expect(typeEffectiveness(chart, '', ['Fire'])).toBe(1.0);
  });

  it('returns zero for immunities', () => {
    expect(typeEffectiveness(chart, 'Electric', ['Ground', 'Water'])).toBe(0);
  });

  it('ignores type names inherited from Object.prototype', () => {
    expect(typeEffectiveness(chart, 'Water', ['constructor'])).toBe(1.0);
    expect(typeEffectiveness(chart, 'Water', ['Fire', 'toString'])).toBe(2.0);
    expect(typeEffectiveness(chart, 'constructor', ['Fire'])).toBe(1.0);
    expect(typeEffectiveness(chart, '__proto__', ['Fire'])).toBe(1.0);
  });
});

describe('bundled battle data', () => {
  it('loads the type chart, species and moves', () => {
    const chart = loadTypeChart(join(dataDir, 'type-chart.json'), silentLogger);
    const species = loadSpeciesTypes(join(dataDir, 'species-types.json'), silentLogger);
    const moves = loadMoveTypes(join(dataDir, 'move-types.json'), silentLogger);

    expect(typeEffectiveness(chart, 'Ground', ['Flying'])).toBe(0);
    expect(typeEffectiveness(chart, 'Ice', species.Dragonite!)).toBe(4);
    expect(species.Charizard).toEqual(['Fire', 'Flying']);
    expect(moves.Surf).toBe('Water');
  });

  it('falls back to empty tables when files are missing', () => {
    expect(loadTypeChart(join(dataDir, 'missing.json'), silentLogger)).toEqual({});
    expect(loadSpeciesTypes(join(dataDir, 'missing.json'), silentLogger)).toEqual({});
    expect(loadMoveTypes(join(dataDir, 'missing.json'), silentLogger)).toEqual({});
  });
});
