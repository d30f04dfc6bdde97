import type { WorldSnapshot } from './types';
import { consoleLogger, type Logger } from '../logging/logger';

const MAX_ACTION_HISTORY = 30;
const MAX_OBSERVATION_LENGTH = 120;

export interface ActionRecord {
  tick: number;
  action: string;
  observation: string;
}

export interface PlayerStatsSnapshot {
  stepsTaken: number;
  speciesCaught: number;
  highestLevel: number;
  badgesEarned: number;
  battlesWon: number;
  totalTicks: number;
  actionHistory: ActionRecord[];
}

/** Cumulative counters derived by comparing consecutive snapshots. */
export class PlayerStats {
  private stepsTaken = 0;
  private caught = 0;
  private highestLevel = 0;
  private badgesEarned = 0;
  private battlesWon = 0;
  private totalTicks = 0;
  private actionHistory: ActionRecord[] = [];
  private previous: WorldSnapshot | null = null;

  constructor(private readonly logger: Logger = consoleLogger) {}

  update(snapshot: WorldSnapshot): void {
    this.totalTicks += 1;
    const previous = this.previous;

    if (previous && (previous.playerX !== snapshot.playerX || previous.playerY !== snapshot.playerY)) {
      this.stepsTaken += 1;
    }

    if (previous && snapshot.speciesCaught > previous.speciesCaught) {
      const newCatches = snapshot.speciesCaught - previous.speciesCaught;
      this.caught += newCatches;
      this.logger.info(`Caught ${newCatches} new species (total: ${this.caught})`);
    }

    for (const member of snapshot.party) {
      if (member.level > this.highestLevel) {
        this.highestLevel = member.level;
        this.logger.info(`New highest level: ${member.level}`);
      }
    }

    if (snapshot.badgeCount > this.badgesEarned) {
      this.logger.info(`Earned ${snapshot.badgeCount - this.badgesEarned} new badge(s) (total: ${snapshot.badgeCount})`);
      this.badgesEarned = snapshot.badgeCount;
    }

    this.previous = snapshot;
  }

  recordBattleWon(): void {
    this.battlesWon += 1;
  }

  recordAction(tick: number, action: string, observation: string = ''): void {
    this.actionHistory.push({ tick, action, observation: observation.slice(0, MAX_OBSERVATION_LENGTH) });
    if (this.actionHistory.length > MAX_ACTION_HISTORY) {
      this.actionHistory = this.actionHistory.slice(-MAX_ACTION_HISTORY);
    }
  }

  snapshot(): PlayerStatsSnapshot {
    return {
      stepsTaken: this.stepsTaken,
      speciesCaught: this.caught,
      highestLevel: this.highestLevel,
      badgesEarned: this.badgesEarned,
      battlesWon: this.battlesWon,
      totalTicks: this.totalTicks,
      actionHistory: this.actionHistory.map((record) => ({ ...record }))
    };
  }
}
