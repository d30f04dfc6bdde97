import type { GoalStatus } from './types';

const TRANSITIONS: Record<GoalStatus, readonly GoalStatus[]> = {
  pending: ['pending', 'active', 'in_progress', 'completed', 'failed', 'blocked'],
  active: ['pending', 'in_progress', 'completed', 'failed', 'blocked'],
  in_progress: ['pending', 'completed', 'failed', 'blocked'],
  blocked: ['pending', 'completed', 'failed'],
  completed: [],
  failed: []
};

export const STATUS_GLYPHS: Record<GoalStatus, string> = {
  pending: '[ ]',
  active: '[>]',
  in_progress: '[~]',
  completed: '[x]',
  failed: '[!]',
  blocked: '[-]'
};

export function canTransition(from: GoalStatus, to: GoalStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: GoalStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isActionable(status: GoalStatus): boolean {
  return status === 'active' || status === 'in_progress';
}
