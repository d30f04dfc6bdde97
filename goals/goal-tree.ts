import { canTransition, STATUS_GLYPHS } from './goal-status';
import { safeParseGoalDocument, type GoalStore } from './goal-store';
import type { Goal, GoalDocument, GoalStatus, GoalSummary, NewGoal, SubgoalSpec } from './types';
import { consoleLogger, type Logger } from '../logging/logger';

const DEFAULT_PRIORITY = 5;
const DEFAULT_MAX_ATTEMPTS = 10;

export interface GoalTreeOptions {
  store?: GoalStore;
  logger?: Logger;
  /** Optional clock for deterministic tests. */
  getTime?: () => number;
}

/**
 * Arena of goals keyed by id. Parent and children are stored as ids only.
 */
export class GoalTree {
  private readonly goals = new Map<string, Goal>();
  private counter = 0;
  private readonly store?: GoalStore;
  private readonly logger: Logger;
  private readonly getTime: () => number;

  constructor(options: GoalTreeOptions = {}) {
    this.store = options.store;
    this.logger = options.logger ?? consoleLogger;
    this.getTime = options.getTime ?? (() => Date.now());
    this.load();
  }

  get size(): number {
    return this.goals.size;
  }

  addGoal(input: NewGoal): string {
    this.counter += 1;
    const id = `goal_${this.counter}`;

    let parentId = input.parentId;
    if (parentId && !this.goals.has(parentId)) {
      this.logger.warn(`Parent ${parentId} not found for goal "${input.name}", adding it as a root goal`);
      parentId = undefined;
    }

    const goal: Goal = {
      id,
      name: input.name,
      description: input.description,
      status: 'pending',
      priority: input.priority ?? DEFAULT_PRIORITY,
      parentId,
      childrenIds: [],
      prerequisites: [...(input.prerequisites ?? [])],
      notes: [],
      attempts: 0,
      maxAttempts: input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      createdAt: this.getTime()
    };
    this.goals.set(id, goal);

    if (parentId) {
      this.goals.get(parentId)?.childrenIds.push(id);
    }

    this.persist();
    return id;
  }

  /** Adds `steps` under `parentId` in order; sequential steps depend on the step before them. */
  addSubgoals(parentId: string, steps: SubgoalSpec[]): string[] {
    const ids: string[] = [];
    let previousId: string | undefined;

    for (const step of steps) {
      const prerequisites = [...(step.prerequisites ?? [])];
      if (step.sequential && previousId) {
        prerequisites.push(previousId);
      }
      const id = this.addGoal({
        name: step.name,
        description: step.description,
        priority: step.priority,
        parentId,
        prerequisites
      });
      ids.push(id);
      previousId = id;
    }

    return ids;
  }

  /**
   * Completes the goal, then walks up the parent chain completing every
   * ancestor whose children are now all completed.
   */
  completeGoal(goalId: string, note?: string): boolean {
    const goal = this.goals.get(goalId);
    if (!goal || !this.checkTransition(goal, 'completed')) {
      return false;
    }

    this.markCompleted(goal, note ? `Completed: ${note}` : undefined);

    let parentId = goal.parentId;
    while (parentId) {
      const parent = this.goals.get(parentId);
      if (!parent || !canTransition(parent.status, 'completed')) {
        break;
      }
      const allChildrenDone = parent.childrenIds
        .map((childId) => this.goals.get(childId))
        .every((child) => !child || child.status === 'completed');
      if (!allChildrenDone) {
        break;
      }
      this.markCompleted(parent, 'All sub-goals completed');
      parentId = parent.parentId;
    }

    this.persist();
    return true;
  }

  /** Counts a failed attempt; the goal returns to pending until attempts are exhausted. */
  failGoal(goalId: string, reason: string): boolean {
    const goal = this.goals.get(goalId);
    if (!goal || !this.checkTransition(goal, 'failed')) {
      return false;
    }

    goal.attempts += 1;
    if (goal.attempts >= goal.maxAttempts) {
      goal.status = 'failed';
      goal.notes.push(`Failed permanently: ${reason}`);
      this.logger.warn(`Goal permanently failed: ${goal.name}`);
    } else {
      goal.status = 'pending';
      goal.notes.push(`Attempt ${goal.attempts} failed: ${reason}`);
      this.logger.info(`Goal attempt failed, will retry: ${goal.name}`);
    }

    this.persist();
    return true;
  }

  blockGoal(goalId: string, reason: string): boolean {
    return this.transition(goalId, 'blocked', `Blocked: ${reason}`);
  }

  unblockGoal(goalId: string, note?: string): boolean {
    const goal = this.goals.get(goalId);
    if (!goal || goal.status !== 'blocked') {
      if (goal) {
        this.logger.warn(`Goal ${goalId} is ${goal.status}, not blocked`);
      }
      return false;
    }
    return this.transition(goalId, 'pending', note ? `Unblocked: ${note}` : 'Unblocked');
  }

  /** Appends a progress note; an active goal moves to in_progress. */
  recordProgress(goalId: string, note: string): boolean {
    const goal = this.goals.get(goalId);
    if (!goal) {
      return false;
    }
    if (goal.status === 'active') {
      goal.status = 'in_progress';
    }
    goal.notes.push(note);
    this.persist();
    return true;
  }

  /** pending -> active, only when every prerequisite is completed. */
  activate(goalId: string): Goal | null {
    const goal = this.goals.get(goalId);
    if (!goal || goal.status !== 'pending' || !this.prerequisitesMet(goal)) {
      return null;
    }
    goal.status = 'active';
    this.persist();
    return copyGoal(goal);
  }

  prerequisitesMet(goal: Goal): boolean {
    return goal.prerequisites.every((prereqId) => this.goals.get(prereqId)?.status === 'completed');
  }

  get(goalId: string): Goal | undefined {
    const goal = this.goals.get(goalId);
    return goal ? copyGoal(goal) : undefined;
  }

  /** All goals in insertion order. */
  listGoals(): Goal[] {
    return [...this.goals.values()].map(copyGoal);
  }

  /** Root goals ordered by priority; equal priorities keep insertion order. */
  roots(): Goal[] {
    return this.listGoals()
      .filter((goal) => !goal.parentId)
      .sort((a, b) => a.priority - b.priority);
  }

  summaries(): GoalSummary[] {
    return [...this.goals.values()].map((goal) => ({
      id: goal.id,
      name: goal.name,
      status: goal.status,
      parentId: goal.parentId
    }));
  }

  render(): string {
    const lines: string[] = [];
    const visited = new Set<string>();
    const stack: Array<{ id: string; depth: number }> = this.roots()
      .reverse()
      .map((goal) => ({ id: goal.id, depth: 0 }));

    while (stack.length > 0) {
      const next = stack.pop();
      const goal = next ? this.goals.get(next.id) : undefined;
      if (!next || !goal || visited.has(goal.id)) {
        continue;
      }
      visited.add(goal.id);
      lines.push(`${'  '.repeat(next.depth)}${STATUS_GLYPHS[goal.status]} ${goal.name} (${goal.status})`);
      for (let i = goal.childrenIds.length - 1; i >= 0; i -= 1) {
        const childId = goal.childrenIds[i];
        if (childId !== undefined) {
          stack.push({ id: childId, depth: next.depth + 1 });
        }
      }
    }

    return lines.length ? lines.join('\n') : 'No goals set.';
  }

  toDocument(): GoalDocument {
    const goals: Record<string, Goal> = {};
    for (const [id, goal] of this.goals) {
      goals[id] = copyGoal(goal);
    }
    return { counter: this.counter, goals };
  }

  private transition(goalId: string, to: GoalStatus, note: string): boolean {
    const goal = this.goals.get(goalId);
    if (!goal || !this.checkTransition(goal, to)) {
      return false;
    }
    goal.status = to;
    goal.notes.push(note);
    this.persist();
    return true;
  }

  private checkTransition(goal: Goal, to: GoalStatus): boolean {
    if (canTransition(goal.status, to)) {
      return true;
    }
    this.logger.warn(`Rejected goal transition ${goal.status} -> ${to} for ${goal.id} (${goal.name})`);
    return false;
  }

  private markCompleted(goal: Goal, note?: string): void {
    goal.status = 'completed';
    goal.completedAt = this.getTime();
    if (note) {
      goal.notes.push(note);
    }
    this.logger.info(`Completed goal: ${goal.name}`);
  }

  private load(): void {
    const stored = this.store?.load();
    if (!stored) {
      return;
    }
    const parsed = safeParseGoalDocument(stored);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      this.logger.warn(`Ignoring invalid goal document, starting empty: ${issues}`);
      return;
    }
    const document = parsed.data;
    this.counter = document.counter;
    for (const [id, goal] of Object.entries(document.goals)) {
      this.goals.set(id, copyGoal(goal));
    }
    this.logger.info(`Loaded ${this.goals.size} goals`);
  }

  private persist(): void {
    if (!this.store) {
      return;
    }
    try {
      this.store.save(this.toDocument());
    } catch (err) {
      this.logger.error('Failed to persist goals', err);
    }
  }
}

function copyGoal(goal: Goal): Goal {
  return {
    ...goal,
    childrenIds: [...goal.childrenIds],
    prerequisites: [...goal.prerequisites],
    notes: [...goal.notes]
  };
}
