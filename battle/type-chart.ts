import { z } from 'zod';
import { ownValue, readJsonFile } from '../config/data-files';
import type { MoveTypes, SpeciesTypes, TypeChart } from './types';
import { consoleLogger, type Logger } from '../logging/logger';

const typeChartSchema = z.record(z.record(z.number().min(0)));
const speciesTypesSchema = z.record(z.array(z.string().min(1)).min(1).max(2));
const moveTypesSchema = z.record(z.string().min(1));

export function loadTypeChart(path: string, logger: Logger = consoleLogger): TypeChart {
  return readJsonFile(path, typeChartSchema, {}, 'type chart', logger);
}

export function loadSpeciesTypes(path: string, logger: Logger = consoleLogger): SpeciesTypes {
  return readJsonFile(path, speciesTypesSchema, {}, 'species types', logger);
}

export function loadMoveTypes(path: string, logger: Logger = consoleLogger): MoveTypes {
  return readJsonFile(path, moveTypesSchema, {}, 'move types', logger);
}

/**
 * Multiplier for an attack of `attackType` against a defender with
 * `defendTypes`. Pairs absent from the chart count as neutral; dual types
 * multiply.
 */
export function typeEffectiveness(chart: TypeChart, attackType: string, defendTypes: readonly string[]): number {
  const matchups = attackType ? ownValue(chart, attackType) : undefined;
  if (!matchups) {
    return 1.0;
  }

  let multiplier = 1.0;
  for (const defendType of defendTypes) {
    const factor = ownValue(matchups, defendType);
    if (factor !== undefined) {
      multiplier *= factor;
    }
  }
  return multiplier;
}
