import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';

const intervalSchema = z.coerce.number().int().min(1);

const envSchema = z.object({
  ADVISOR_DATA_DIR: z.string().min(1).default('data'),
  GOALS_FILE: z.string().min(1).optional(),
  LANDMARKS_FILE: z.string().min(1).optional(),
  TYPE_CHART_FILE: z.string().min(1).optional(),
  SPECIES_TYPES_FILE: z.string().min(1).optional(),
  MOVE_TYPES_FILE: z.string().min(1).optional(),
  PROGRESSION_FILE: z.string().min(1).optional(),
  WORLD_SNAPSHOT_FILE: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  PLANNING_REVIEW_INTERVAL: intervalSchema.default(25),
  SAVE_REMINDER_INTERVAL: intervalSchema.default(50)
});

export interface AdvisorSettings {
  dataDir: string;
  goalsFile: string;
  landmarksFile: string;
  typeChartFile: string;
  speciesTypesFile: string;
  moveTypesFile: string;
  progressionFile: string;
  worldSnapshotFile: string;
  port: number;
  planningReviewInterval: number;
  saveReminderInterval: number;
}

function resolvePath(raw: string): string {
  return resolve(process.cwd(), raw.replace(/^~/, homedir()));
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AdvisorSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  const dataDir = resolvePath(values.ADVISOR_DATA_DIR);
  const fileOrDefault = (raw: string | undefined, fallback: string) =>
    raw ? resolvePath(raw) : join(dataDir, fallback);

  return {
    dataDir,
    goalsFile: fileOrDefault(values.GOALS_FILE, join('state', 'goals.json')),
    landmarksFile: fileOrDefault(values.LANDMARKS_FILE, 'landmarks.json'),
    typeChartFile: fileOrDefault(values.TYPE_CHART_FILE, 'type-chart.json'),
    speciesTypesFile: fileOrDefault(values.SPECIES_TYPES_FILE, 'species-types.json'),
    moveTypesFile: fileOrDefault(values.MOVE_TYPES_FILE, 'move-types.json'),
    progressionFile: fileOrDefault(values.PROGRESSION_FILE, 'progression.json'),
    worldSnapshotFile: fileOrDefault(values.WORLD_SNAPSHOT_FILE, join('state', 'world-snapshot.json')),
    port: values.PORT,
    planningReviewInterval: values.PLANNING_REVIEW_INTERVAL,
    saveReminderInterval: values.SAVE_REMINDER_INTERVAL
  };
}
