/**
 * TickAdvisor runs the rule-based subsystems once per sampling tick and
 * collects their output for the external decision-maker. It never picks the
 * final action itself.
 */

import type { BattleTracker } from '../battle/battle-tracker';
import type { BattleEvents, MoveSuggestion } from '../battle/types';
import type { GoalSelector, GoalUpdateOutcome } from '../goals/goal-selector';
import type { GoalTree } from '../goals/goal-tree';
import type { AuditEventType, AuditLogger } from '../logging/audit-logger';
import { consoleLogger, type Logger } from '../logging/logger';
import type { Navigator } from '../navigation/navigator';
import type { Direction } from '../navigation/types';
import { leadHealthyMember, partyHealthWarnings } from '../world/party-health';
import type { PlayerStats } from '../world/player-stats';
import type { WorldSnapshot } from '../world/types';

export interface TickAdvisorOptions {
  goalTree: GoalTree;
  goalSelector: GoalSelector;
  navigator: Navigator;
  battleTracker: BattleTracker;
  playerStats: PlayerStats;
  auditLogger?: AuditLogger;
  logger?: Logger;
  /** Include the full goal tree every N ticks. Default: 25. */
  planningReviewInterval?: number;
  /** Remind the decision-maker to save every N ticks. Default: 50. */
  saveReminderInterval?: number;
  getTime?: () => number;
}

export interface Advisory {
  tick: number;
  battleEvents: BattleEvents;
  direction: Direction | null;
  distanceRemaining: number;
  goalContext: string;
  battleContext: string;
  moveSuggestion: MoveSuggestion | null;
  warnings: string[];
  navigationTargets: string;
  goalTree: string | null;
  saveReminder: boolean;
}

export interface DecisionReport {
  action: string;
  observation?: string;
  goalUpdate?: string | null;
  /** Set when the decision-maker ran from the battle successfully. */
  fled?: boolean;
  mapId?: number;
}

export interface DecisionResult {
  goalUpdate: GoalUpdateOutcome;
  navigationTarget: string | null;
}

export class TickAdvisor {
  private readonly options: Required<
    Pick<TickAdvisorOptions, 'logger' | 'planningReviewInterval' | 'saveReminderInterval' | 'getTime'>
  > &
    TickAdvisorOptions;
  private tickCount = 0;
  private lastSnapshot: WorldSnapshot | null = null;

  constructor(options: TickAdvisorOptions) {
    this.options = {
      ...options,
      logger: options.logger ?? consoleLogger,
      planningReviewInterval: options.planningReviewInterval ?? 25,
      saveReminderInterval: options.saveReminderInterval ?? 50,
      getTime: options.getTime ?? (() => Date.now())
    };
  }

  get ticks(): number {
    return this.tickCount;
  }

  /** Snapshots must arrive in order, once per tick. */
  tick(snapshot: WorldSnapshot): Advisory {
    const { battleTracker, navigator, playerStats, goalSelector, goalTree } = this.options;
    this.tickCount += 1;
    this.lastSnapshot = snapshot;

    playerStats.update(snapshot);

    const battleEvents = battleTracker.update(snapshot);
    if (battleEvents.battleEnd === 'won') {
      playerStats.recordBattleWon();
    }
    if (battleEvents.battleStart || battleEvents.battleEnd) {
      this.audit('battle_event', { ...battleEvents, mapId: snapshot.mapId });
    }

    let direction: Direction | null = null;
    if (!battleTracker.inBattle) {
      const wasActive = navigator.isActive;
      const target = navigator.snapshot().target;
      direction = navigator.getNextDirection(snapshot.playerX, snapshot.playerY, snapshot.mapId);
      if (wasActive && !navigator.isActive) {
        this.audit('navigation_event', {
          event: navigator.snapshot().target ? 'arrived' : 'cancelled',
          target: target?.key,
          x: snapshot.playerX,
          y: snapshot.playerY,
          mapId: snapshot.mapId
        });
      }
    }

    const lead = leadHealthyMember(snapshot);
    const moveSuggestion =
      battleTracker.inBattle && lead && snapshot.opponentSpecies
        ? battleTracker.recommendMove(lead.moves, snapshot.opponentSpecies)
        : null;

    const { planningReviewInterval, saveReminderInterval } = this.options;

    return {
      tick: this.tickCount,
      battleEvents,
      direction,
      distanceRemaining: navigator.distanceRemaining(snapshot.playerX, snapshot.playerY),
      goalContext: goalSelector.describeCurrentGoal(),
      battleContext: battleTracker.battleContext(snapshot),
      moveSuggestion,
      warnings: partyHealthWarnings(snapshot, battleTracker.inBattle),
      navigationTargets: battleTracker.inBattle ? '' : navigator.targetsText(snapshot.mapId),
      goalTree: this.tickCount % planningReviewInterval === 0 ? goalTree.render() : null,
      saveReminder: this.tickCount % saveReminderInterval === 0
    };
  }

  /** Feeds the decision-maker's chosen action back into stats, goals and navigation. */
  recordDecision(report: DecisionReport): DecisionResult {
    const { playerStats, goalSelector, navigator, battleTracker } = this.options;
    playerStats.recordAction(this.tickCount, report.action, report.observation);

    if (report.fled) {
      battleTracker.recordFlee();
      this.audit('battle_event', { event: 'fled' });
    }

    const update = goalSelector.applyGoalUpdate(report.goalUpdate);
    if (update.outcome !== 'ignored') {
      this.audit('goal_transition', { outcome: update.outcome, goalId: update.goalId, update: report.goalUpdate });
    }

    let navigationTarget: string | null = null;
    const mapId = report.mapId ?? this.lastSnapshot?.mapId;
    if (mapId !== undefined) {
      const key = navigator.parseGotoCommand(report.action, mapId);
      if (key && navigator.setTarget(mapId, key)) {
        navigationTarget = key;
        this.audit('navigation_event', { event: 'target_set', target: key, mapId });
      }
    }

    return { goalUpdate: update.outcome, navigationTarget };
  }

  /** Joins an advisory into the text block handed to the decision-maker. */
  formatAdvisory(advisory: Advisory): string {
    const parts: string[] = [`Goal:\n${advisory.goalContext}`];

    if (advisory.battleContext) {
      parts.push(advisory.battleContext);
    }
    if (advisory.moveSuggestion) {
      parts.push(`TIP: ${advisory.moveSuggestion.message}`);
    }
    parts.push(...advisory.warnings);
    if (advisory.direction) {
      parts.push(`NAVIGATION: walk ${advisory.direction} (${advisory.distanceRemaining} tiles to go)`);
    }
    if (advisory.navigationTargets) {
      parts.push(`Available targets:\n${advisory.navigationTargets}`);
    }
    if (advisory.saveReminder) {
      parts.push('REMINDER: Save the game.');
    }
    if (advisory.goalTree) {
      parts.push(`Goal Tree:\n${advisory.goalTree}`);
    }

    return parts.join('\n\n');
  }

  private audit(eventType: AuditEventType, data: Record<string, unknown>): void {
    const { auditLogger, logger, getTime } = this.options;
    if (!auditLogger) {
      return;
    }
    try {
      const result = auditLogger.log({ timestamp: getTime(), tick: this.tickCount, eventType, data });
      if (result instanceof Promise) {
        void result.catch((err: unknown) => logger.error('Failed to write audit entry', err));
      }
    } catch (err) {
      logger.error('Failed to write audit entry', err);
    }
  }
}
