/**
 * Persistence for the goal forest. The whole document (id counter plus every
 * goal) is rewritten after each mutation.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { z } from 'zod';
import { GOAL_STATUSES, type GoalDocument } from './types';
import { consoleLogger, describeError, type Logger } from '../logging/logger';

export interface GoalStore {
  load(): GoalDocument | null;
  save(document: GoalDocument): void;
}

const goalSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  status: z.enum(GOAL_STATUSES),
  priority: z.number().finite(),
  parentId: z.string().min(1).optional(),
  childrenIds: z.array(z.string()),
  prerequisites: z.array(z.string()),
  notes: z.array(z.string()),
  attempts: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
  createdAt: z.number(),
  completedAt: z.number().optional()
});

const GOAL_ID_PATTERN = /^goal_(\d+)$/;

const goalDocumentSchema = z
  .object({
    counter: z.number().int().min(0),
    goals: z.record(goalSchema)
  })
  .superRefine(({ counter, goals }, ctx) => {
    const report = (path: Array<string | number>, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });
    const find = (id: string) => (Object.hasOwn(goals, id) ? goals[id] : undefined);

    for (const [key, goal] of Object.entries(goals)) {
      if (goal.id !== key) {
        report(['goals', key, 'id'], `id '${goal.id}' does not match its key`);
      }

      const numbered = GOAL_ID_PATTERN.exec(key);
      if (numbered && Number(numbered[1]) > counter) {
        report(['counter'], `counter ${counter} is below goal id ${key}`);
      }

      if (goal.parentId !== undefined) {
        const parent = find(goal.parentId);
        if (!parent) {
          report(['goals', key, 'parentId'], `parent ${goal.parentId} does not exist`);
        } else if (!parent.childrenIds.includes(key)) {
          report(['goals', key, 'parentId'], `parent ${goal.parentId} does not list it as a child`);
        }
      }

      if (new Set(goal.childrenIds).size !== goal.childrenIds.length) {
        report(['goals', key, 'childrenIds'], 'lists a child more than once');
      }
      for (const childId of goal.childrenIds) {
        const child = find(childId);
        if (!child) {
          report(['goals', key, 'childrenIds'], `child ${childId} does not exist`);
        } else if (child.parentId !== key) {
          report(['goals', key, 'childrenIds'], `child ${childId} names a different parent`);
        }
      }

      // Walk up the parent chain; revisiting any goal means a cycle.
      const seen = new Set<string>([key]);
      for (let up = goal.parentId; up !== undefined; up = find(up)?.parentId) {
        if (seen.has(up)) {
          report(['goals', key, 'parentId'], 'parent chain loops back on itself');
          break;
        }
        seen.add(up);
      }
    }
  });

/**
 * Throws a ZodError when `raw` is not a goal document, or when its parent and
 * child links, ids or counter disagree.
 */
export function parseGoalDocument(raw: unknown): GoalDocument {
  return goalDocumentSchema.parse(raw);
}

export function safeParseGoalDocument(raw: unknown) {
  return goalDocumentSchema.safeParse(raw);
}

function cloneDocument(document: GoalDocument): GoalDocument {
  return structuredClone(document);
}

export class InMemoryGoalStore implements GoalStore {
  private document: GoalDocument | null;

  constructor(initial?: GoalDocument) {
    this.document = initial ? cloneDocument(initial) : null;
  }

  load(): GoalDocument | null {
    return this.document ? cloneDocument(this.document) : null;
  }

  save(document: GoalDocument): void {
    this.document = cloneDocument(document);
  }
}

export class JsonFileGoalStore implements GoalStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  load(): GoalDocument | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      return parseGoalDocument(raw);
    } catch (err) {
      this.logger.warn(`Failed to load goals from ${this.filePath}, starting empty: ${describeError(err)}`);
      return null;
    }
  }

  /** Writes a sibling temp file and renames it over the target. */
  save(document: GoalDocument): void {
    const dir = dirname(this.filePath);
    const tempPath = join(dir, `.${basename(this.filePath)}.${process.pid}.tmp`);
    mkdirSync(dir, { recursive: true });
    writeFileSync(tempPath, JSON.stringify(document, null, 2), 'utf-8');
    renameSync(tempPath, this.filePath);
  }
}
