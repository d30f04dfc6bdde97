import { isActionable } from './goal-status';
import type { GoalTree } from './goal-tree';
import type { Goal } from './types';

export type GoalUpdateOutcome = 'completed' | 'failed' | 'progress' | 'ignored';

/**
 * Picks the one goal the caller should pursue right now. Selection promotes
 * the chosen pending goal to active, so the tree is persisted as a side effect.
 */
export class GoalSelector {
  constructor(private readonly tree: GoalTree) {}

  getCurrentGoal(): Goal | null {
    for (const goal of this.tree.listGoals()) {
      if (!isActionable(goal.status)) {
        continue;
      }
      return this.descend(goal);
    }
    return this.selectRootGoal();
  }

  describeCurrentGoal(): string {
    const current = this.getCurrentGoal();
    if (!current) {
      return 'No active goal. All goals completed or none set.';
    }

    const parts = [
      `Current goal: ${current.name}`,
      `Description: ${current.description}`,
      `Status: ${current.status}`,
      `Attempts: ${current.attempts}/${current.maxAttempts}`
    ];

    if (current.notes.length) {
      parts.push(`Notes: ${current.notes.slice(-3).join('; ')}`);
    }

    const chain: string[] = [];
    const seen = new Set<string>([current.id]);
    let parentId = current.parentId;
    while (parentId && !seen.has(parentId)) {
      seen.add(parentId);
      const parent = this.tree.get(parentId);
      if (!parent) {
        break;
      }
      chain.push(parent.name);
      parentId = parent.parentId;
    }
    if (chain.length) {
      parts.push(`Part of: ${chain.reverse().join(' > ')}`);
    }

    return parts.join('\n');
  }

  /**
   * Applies a free-text update from the decision-maker to the current goal.
   * "complete" wins over "fail", which wins over "progress".
   */
  applyGoalUpdate(update: string | null | undefined): { outcome: GoalUpdateOutcome; goalId?: string } {
    const text = update?.trim();
    if (!text || text.toLowerCase() === 'null') {
      return { outcome: 'ignored' };
    }

    const current = this.getCurrentGoal();
    if (!current) {
      return { outcome: 'ignored' };
    }

    const lower = text.toLowerCase();
    if (lower.includes('complete')) {
      return this.tree.completeGoal(current.id, text)
        ? { outcome: 'completed', goalId: current.id }
        : { outcome: 'ignored', goalId: current.id };
    }
    if (lower.includes('fail')) {
      return this.tree.failGoal(current.id, text)
        ? { outcome: 'failed', goalId: current.id }
        : { outcome: 'ignored', goalId: current.id };
    }
    if (lower.includes('progress')) {
      this.tree.recordProgress(current.id, text);
      return { outcome: 'progress', goalId: current.id };
    }
    return { outcome: 'ignored', goalId: current.id };
  }

  /**
   * Walks down from an actionable goal: an actionable child is followed,
   * otherwise the first pending child with its prerequisites met is activated.
   * Falls back to the goal itself when no child is actionable.
   */
  private descend(start: Goal): Goal {
    let current = start;
    const visited = new Set<string>();

    while (!visited.has(current.id)) {
      visited.add(current.id);
      const next = this.nextChild(current);
      if (!next) {
        return current;
      }
      if (next.activated) {
        return next.goal;
      }
      current = next.goal;
    }

    return current;
  }

  private nextChild(parent: Goal): { goal: Goal; activated: boolean } | null {
    for (const childId of parent.childrenIds) {
      const child = this.tree.get(childId);
      if (!child) {
        continue;
      }
      if (isActionable(child.status)) {
        return { goal: child, activated: false };
      }
      if (child.status === 'pending' && this.tree.prerequisitesMet(child)) {
        const activated = this.tree.activate(child.id);
        if (activated) {
          return { goal: activated, activated: true };
        }
      }
    }
    return null;
  }

  private selectRootGoal(): Goal | null {
    const candidate = this.tree
      .roots()
      .find((goal) => goal.status === 'pending' && this.tree.prerequisitesMet(goal));
    if (!candidate) {
      return null;
    }
    return this.tree.activate(candidate.id);
  }
}
