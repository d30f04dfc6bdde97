import { typeEffectiveness } from './type-chart';
import { ownValue } from '../config/data-files';
import {
  battleKindFromCode,
  type BattleBaseline,
  type BattleEvents,
  type BattleKind,
  type BattleStats,
  type MoveSuggestion,
  type MoveTypes,
  type SpeciesTypes,
  type TypeChart
} from './types';
import type { WorldSnapshot } from '../world/types';
import { consoleLogger, type Logger } from '../logging/logger';

const DRAG_ON_TURNS = 25;
const EMPTY_MOVE_SLOT = '---';

export interface BattleTrackerOptions {
  typeChart?: TypeChart;
  speciesTypes?: SpeciesTypes;
  moveTypes?: MoveTypes;
  logger?: Logger;
}

/**
 * Follows battle start/end across snapshots and scores moves against the
 * opponent with the type chart.
 */
export class BattleTracker {
  private readonly typeChart: TypeChart;
  private readonly speciesTypes: SpeciesTypes;
  private readonly moveTypes: MoveTypes;
  private readonly logger: Logger;

  private kind: BattleKind = 'none';
  private turns = 0;
  private won = 0;
  private fled = 0;
  private whiteouts = 0;
  private baseline: BattleBaseline = { partyHp: [], money: 0 };

  constructor(options: BattleTrackerOptions = {}) {
    this.typeChart = options.typeChart ?? {};
    this.speciesTypes = options.speciesTypes ?? {};
    this.moveTypes = options.moveTypes ?? {};
    this.logger = options.logger ?? consoleLogger;
  }

  get inBattle(): boolean {
    return this.kind !== 'none';
  }

  update(snapshot: WorldSnapshot): BattleEvents {
    const next = battleKindFromCode(snapshot.battleKind);
    const events: BattleEvents = {};

    if (!this.inBattle && next !== 'none') {
      this.kind = next;
      this.turns = 0;
      this.baseline = {
        partyHp: snapshot.party.map((member) => ({ current: member.hpCurrent, max: member.hpMax })),
        money: snapshot.money
      };
      events.battleStart = next;
      this.logger.info(`Battle started: ${next}`);
    } else if (this.inBattle && next === 'none') {
      const partyFainted = snapshot.party.length > 0 && snapshot.party.every((member) => member.hpCurrent === 0);
      // Any money drop during the battle is read as a whiteout penalty.
      if (partyFainted || snapshot.money < this.baseline.money) {
        this.whiteouts += 1;
        events.battleEnd = 'whiteout';
        this.logger.info(`Battle ended: whiteout (total: ${this.whiteouts})`);
      } else {
        this.won += 1;
        events.battleEnd = 'won';
        this.logger.info(`Battle ended: won (total: ${this.won})`);
      }
      this.kind = 'none';
    } else if (this.inBattle) {
      this.turns += 1;
    }

    return events;
  }

  recordFlee(): void {
    this.fled += 1;
  }

  battleContext(snapshot: WorldSnapshot): string {
    if (!this.inBattle) {
      return '';
    }

    const parts = [`IN BATTLE (${this.kind.toUpperCase()}) - Turn ${this.turns}`];

    if (snapshot.party.length) {
      parts.push('\nYour team:');
      snapshot.party.forEach((member, index) => {
        const percent = member.hpMax > 0 ? Math.trunc((100 * member.hpCurrent) / member.hpMax) : 0;
        parts.push(
          `  ${index + 1}. ${member.speciesName} HP:${member.hpCurrent}/${member.hpMax} (${percent}%) Moves: ${member.moves.join(', ')}`
        );
      });
    }

    if (this.turns > DRAG_ON_TURNS) {
      parts.push('\nWARNING: This battle is dragging on. Consider using stronger moves or running.');
    }

    return parts.join('\n');
  }

  typeEffectiveness(attackType: string, defendTypes: readonly string[]): number {
    return typeEffectiveness(this.typeChart, attackType, defendTypes);
  }

  /** Best super-effective move against the opponent, or null when nothing beats neutral. */
  recommendMove(moves: readonly string[], opponentSpecies: string): MoveSuggestion | null {
    const opponentTypes = ownValue(this.speciesTypes, opponentSpecies);
    if (!opponentTypes || opponentTypes.length === 0) {
      return null;
    }

    let best: { move: string; moveType: string; multiplier: number } | null = null;
    for (const move of moves) {
      if (!move || move === EMPTY_MOVE_SLOT) {
        continue;
      }
      const moveType = ownValue(this.moveTypes, move);
      if (!moveType) {
        continue;
      }
      const multiplier = this.typeEffectiveness(moveType, opponentTypes);
      if (!best || multiplier > best.multiplier) {
        best = { move, moveType, multiplier };
      }
    }

    if (!best || best.multiplier <= 1.0) {
      return null;
    }
    return { ...best, message: `Use ${best.move} (super effective x${best.multiplier}!)` };
  }

  stats(): BattleStats {
    return {
      inBattle: this.inBattle,
      battleKind: this.kind,
      turns: this.turns,
      won: this.won,
      fled: this.fled,
      whiteouts: this.whiteouts,
      baseline: this.inBattle
        ? { partyHp: this.baseline.partyHp.map((hp) => ({ ...hp })), money: this.baseline.money }
        : null
    };
  }
}
