import { loadMoveTypes, loadSpeciesTypes, loadTypeChart } from '../battle/type-chart';
import { BattleTracker } from '../battle/battle-tracker';
import type { AdvisorSettings } from '../config/settings';
import { GoalSelector } from '../goals/goal-selector';
import { JsonFileGoalStore, type GoalStore } from '../goals/goal-store';
import { GoalTree } from '../goals/goal-tree';
import { loadProgressionPlan, seedProgression } from '../goals/progression';
import { InMemoryAuditLogger, type AuditLogger } from '../logging/audit-logger';
import { consoleLogger, type Logger } from '../logging/logger';
import { loadLandmarkRegistry } from '../navigation/landmark-registry';
import { Navigator } from '../navigation/navigator';
import { PlayerStats } from '../world/player-stats';
import { TickAdvisor } from './tick-advisor';

export interface AdvisorContext {
  advisor: TickAdvisor;
  goalTree: GoalTree;
  goalSelector: GoalSelector;
  navigator: Navigator;
  battleTracker: BattleTracker;
  playerStats: PlayerStats;
  auditLogger: AuditLogger;
}

export interface BuildAdvisorOptions {
  logger?: Logger;
  /** Replaces the JSON goal file, e.g. with an InMemoryGoalStore in tests. */
  goalStore?: GoalStore;
  auditLogger?: AuditLogger;
  /** Seed the progression plan when the goal forest starts empty. Default: true. */
  seedGoals?: boolean;
  getTime?: () => number;
}

/** Loads the data files named in `settings` and wires the subsystems together. */
export function buildAdvisor(settings: AdvisorSettings, options: BuildAdvisorOptions = {}): AdvisorContext {
  const logger = options.logger ?? consoleLogger;
  const auditLogger = options.auditLogger ?? new InMemoryAuditLogger();

  const goalTree = new GoalTree({
    store: options.goalStore ?? new JsonFileGoalStore(settings.goalsFile, logger),
    logger,
    getTime: options.getTime
  });

  if (goalTree.size === 0 && (options.seedGoals ?? true)) {
    const plan = loadProgressionPlan(settings.progressionFile, logger);
    if (plan) {
      seedProgression(goalTree, plan, logger);
    }
  }

  const goalSelector = new GoalSelector(goalTree);
  const navigator = new Navigator({
    registry: loadLandmarkRegistry(settings.landmarksFile, logger),
    logger
  });
  const battleTracker = new BattleTracker({
    typeChart: loadTypeChart(settings.typeChartFile, logger),
    speciesTypes: loadSpeciesTypes(settings.speciesTypesFile, logger),
    moveTypes: loadMoveTypes(settings.moveTypesFile, logger),
    logger
  });
  const playerStats = new PlayerStats(logger);

  const advisor = new TickAdvisor({
    goalTree,
    goalSelector,
    navigator,
    battleTracker,
    playerStats,
    auditLogger,
    logger,
    planningReviewInterval: settings.planningReviewInterval,
    saveReminderInterval: settings.saveReminderInterval,
    getTime: options.getTime
  });

  return { advisor, goalTree, goalSelector, navigator, battleTracker, playerStats, auditLogger };
}
