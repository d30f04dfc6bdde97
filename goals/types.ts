export const GOAL_STATUSES = ['pending', 'active', 'in_progress', 'completed', 'failed', 'blocked'] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

export interface Goal {
  id: string;
  name: string;
  description: string;
  status: GoalStatus;
  /** Lower is more urgent. */
  priority: number;
  parentId?: string;
  /** Insertion order is the intended sequence. */
  childrenIds: string[];
  prerequisites: string[];
  notes: string[];
  attempts: number;
  maxAttempts: number;
  createdAt: number;
  completedAt?: number;
}

export interface NewGoal {
  name: string;
  description: string;
  priority?: number;
  parentId?: string;
  prerequisites?: string[];
  maxAttempts?: number;
}

export interface SubgoalSpec {
  name: string;
  description: string;
  priority?: number;
  prerequisites?: string[];
  /** Chains this step after the previous one under the same parent. */
  sequential?: boolean;
}

export interface GoalDocument {
  counter: number;
  goals: Record<string, Goal>;
}

export interface GoalSummary {
  id: string;
  name: string;
  status: GoalStatus;
  parentId?: string;
}
