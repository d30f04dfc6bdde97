export { TickAdvisor } from './tick-advisor';
export type { Advisory, DecisionReport, DecisionResult, TickAdvisorOptions } from './tick-advisor';
export { buildAdvisor } from './build-advisor';
export type { AdvisorContext, BuildAdvisorOptions } from './build-advisor';

export { GoalTree } from '../goals/goal-tree';
export { GoalSelector } from '../goals/goal-selector';
export { InMemoryGoalStore, JsonFileGoalStore } from '../goals/goal-store';
export type { GoalStore } from '../goals/goal-store';
export { seedProgression, loadProgressionPlan } from '../goals/progression';
export type { Goal, GoalStatus, NewGoal, SubgoalSpec } from '../goals/types';

export { Navigator, detourLength } from '../navigation/navigator';
export { loadLandmarkRegistry } from '../navigation/landmark-registry';
export type { Direction, LandmarkRegistry } from '../navigation/types';

export { BattleTracker } from '../battle/battle-tracker';
export { typeEffectiveness } from '../battle/type-chart';
export type { BattleEvents, BattleKind, MoveSuggestion } from '../battle/types';

export { parseWorldSnapshot, readWorldSnapshot } from '../world/snapshot-reader';
export { PlayerStats } from '../world/player-stats';
export type { WorldSnapshot, PartyMember } from '../world/types';

export { loadSettings } from '../config/settings';
export type { AdvisorSettings } from '../config/settings';
export { consoleLogger, silentLogger } from '../logging/logger';
export type { Logger } from '../logging/logger';
