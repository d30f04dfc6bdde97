import { z } from 'zod';
import { readJsonFile } from '../config/data-files';
import type { GoalTree } from './goal-tree';
import type { SubgoalSpec } from './types';
import { consoleLogger, type Logger } from '../logging/logger';

const milestoneSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  priority: z.number().int().optional(),
  sequential: z.boolean().optional()
});

const progressionPlanSchema = z.object({
  root: z.object({
    name: z.string().min(1),
    description: z.string().min(1),
    priority: z.number().int().default(1)
  }),
  steps: z.array(milestoneSchema)
});

export type ProgressionPlan = z.infer<typeof progressionPlanSchema>;

export function loadProgressionPlan(path: string, logger: Logger = consoleLogger): ProgressionPlan | null {
  return readJsonFile(path, progressionPlanSchema.nullable(), null, 'progression plan', logger);
}

/** Adds the plan's root milestone and its steps as children; returns the root id. */
export function seedProgression(tree: GoalTree, plan: ProgressionPlan, logger: Logger = consoleLogger): string {
  const rootId = tree.addGoal({
    name: plan.root.name,
    description: plan.root.description,
    priority: plan.root.priority
  });
  const steps: SubgoalSpec[] = plan.steps.map((step) => ({ ...step }));
  tree.addSubgoals(rootId, steps);
  logger.info(`Progression goals initialized (${steps.length} milestones)`);
  return rootId;
}
