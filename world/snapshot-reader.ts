/**
 * Turns the JSON written by the emulator-side memory reader into a
 * WorldSnapshot. The reader can be caught mid-write, so a failed read hands
 * back the caller's previous snapshot instead of throwing.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { emptySnapshot, type BattleKindCode, type WorldSnapshot } from './types';
import { consoleLogger, describeError, type Logger } from '../logging/logger';

const EMPTY_MOVE_SLOT = '---';

const rawPartyMemberSchema = z.object({
  species_name: z.string().default('Unknown'),
  level: z.number().int().min(0).default(0),
  hp_current: z.number().int().min(0).default(0),
  hp_max: z.number().int().min(0).default(0),
  moves: z.array(z.string()).default([]),
  status: z.string().default('OK')
});

const rawSnapshotSchema = z.object({
  player_x: z.number().int().default(0),
  player_y: z.number().int().default(0),
  map_id: z.number().int().default(0),
  map_name: z.string().optional(),
  money: z.number().min(0).default(0),
  badge_count: z.number().int().min(0).default(0),
  in_battle: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
  opponent_species: z.string().min(1).optional(),
  party: z.array(rawPartyMemberSchema).default([]),
  species_seen: z.number().int().min(0).default(0),
  species_caught: z.number().int().min(0).default(0)
});

export type RawWorldSnapshot = z.input<typeof rawSnapshotSchema>;

/** Throws a ZodError when `raw` does not look like a snapshot. */
export function parseWorldSnapshot(raw: unknown): WorldSnapshot {
  const data = rawSnapshotSchema.parse(raw);
  const battleKind: BattleKindCode = data.in_battle;

  return {
    playerX: data.player_x,
    playerY: data.player_y,
    mapId: data.map_id,
    mapName: data.map_name ?? `Map ${data.map_id}`,
    money: data.money,
    badgeCount: data.badge_count,
    battleKind,
    opponentSpecies: data.opponent_species,
    party: data.party.map((member) => ({
      speciesName: member.species_name,
      level: member.level,
      hpCurrent: member.hp_current,
      hpMax: member.hp_max,
      moves: member.moves.filter((move) => move.length > 0 && move !== EMPTY_MOVE_SLOT),
      status: member.status
    })),
    speciesSeen: data.species_seen,
    speciesCaught: data.species_caught
  };
}

export function readWorldSnapshot(
  path: string,
  previous: WorldSnapshot | null,
  logger: Logger = consoleLogger
): WorldSnapshot {
  if (!existsSync(path)) {
    logger.warn(`World snapshot file not found: ${path}`);
    return previous ?? emptySnapshot();
  }

  try {
    return parseWorldSnapshot(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (err) {
    logger.warn(`World snapshot unreadable, reusing previous: ${describeError(err)}`);
    return previous ?? emptySnapshot();
  }
}
