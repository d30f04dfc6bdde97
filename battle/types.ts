import type { BattleKindCode } from '../world/types';

export type BattleKind = 'none' | 'wild' | 'trainer';
export type BattleOutcome = 'won' | 'whiteout';

/** attacking type -> defending type -> multiplier */
export type TypeChart = Record<string, Record<string, number>>;

export type SpeciesTypes = Record<string, string[]>;
export type MoveTypes = Record<string, string>;

export interface BattleEvents {
  battleStart?: Exclude<BattleKind, 'none'>;
  battleEnd?: BattleOutcome;
}

/** Party HP and money recorded when the battle started. */
export interface BattleBaseline {
  partyHp: Array<{ current: number; max: number }>;
  money: number;
}

export interface BattleStats {
  inBattle: boolean;
  battleKind: BattleKind;
  turns: number;
  won: number;
  fled: number;
  whiteouts: number;
  baseline: BattleBaseline | null;
}

export interface MoveSuggestion {
  move: string;
  moveType: string;
  multiplier: number;
  message: string;
}

export function battleKindFromCode(code: BattleKindCode): BattleKind {
  switch (code) {
    case 1:
      return 'wild';
    case 2:
      return 'trainer';
    default:
      return 'none';
  }
}
