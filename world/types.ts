/** 0 = none, 1 = wild, 2 = trainer. */
export type BattleKindCode = 0 | 1 | 2;

export interface PartyMember {
  speciesName: string;
  level: number;
  hpCurrent: number;
  hpMax: number;
  moves: string[];
  status: string;
}

/**
 * One tick's view of the game, produced by the memory-reading collaborator.
 * Consumers rely on receiving these in order, exactly once per tick.
 */
export interface WorldSnapshot {
  playerX: number;
  playerY: number;
  mapId: number;
  mapName: string;
  money: number;
  badgeCount: number;
  battleKind: BattleKindCode;
  party: PartyMember[];
  /** Species of the opposing lead, when the reader knows it. */
  opponentSpecies?: string;
  speciesSeen: number;
  speciesCaught: number;
}

export function emptySnapshot(): WorldSnapshot {
  return {
    playerX: 0,
    playerY: 0,
    mapId: 0,
    mapName: 'Unknown',
    money: 0,
    badgeCount: 0,
    battleKind: 0,
    party: [],
    speciesSeen: 0,
    speciesCaught: 0
  };
}
