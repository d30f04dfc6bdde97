import { z } from 'zod';
import { readJsonFile } from '../config/data-files';
import type { LandmarkRegistry } from './types';
import { consoleLogger, type Logger } from '../logging/logger';

const landmarkSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  label: z.string().optional()
});

const registrySchema = z.record(
  z.object({
    name: z.string(),
    landmarks: z.record(landmarkSchema).default({})
  })
);

export function loadLandmarkRegistry(path: string, logger: Logger = consoleLogger): LandmarkRegistry {
  const registry: LandmarkRegistry = readJsonFile(path, registrySchema, {}, 'landmark registry', logger);
  const maps = Object.values(registry);
  const total = maps.reduce((sum, map) => sum + Object.keys(map.landmarks).length, 0);
  logger.info(`Navigator: loaded ${total} landmarks across ${maps.length} maps`);
  return registry;
}
