/**
 * Greedy grid walker. The decision-maker picks WHERE to go; the navigator
 * hands back one direction per tick and routes around obstacles by detouring
 * perpendicular to the blocked axis. There is no path search.
 */

import type { Direction, LandmarkRegistry, MapLandmarks, NavigationSnapshot, NavigationTarget } from './types';
import { ownValue } from '../config/data-files';
import { consoleLogger, type Logger } from '../logging/logger';

const STUCK_TICKS_BEFORE_DETOUR = 3;
const GIVE_UP_AFTER_STUCK_EVENTS = 15;
const BASE_DETOUR_TICKS = 3;
const DETOUR_TICKS_PER_STUCK = 2;
const MAX_DETOUR_TICKS = 12;

const GOTO_PREFIX = 'GOTO_';

export interface NavigatorOptions {
  registry?: LandmarkRegistry;
  logger?: Logger;
}

export function detourLength(totalStuck: number): number {
  return Math.min(BASE_DETOUR_TICKS + totalStuck * DETOUR_TICKS_PER_STUCK, MAX_DETOUR_TICKS);
}

export class Navigator {
  private readonly registry: LandmarkRegistry;
  private readonly logger: Logger;

  private target: NavigationTarget | null = null;
  private active = false;
  private lastPosition: { x: number; y: number } | null = null;
  private stuckTicks = 0;
  private totalStuck = 0;
  private detourDirection: Direction | null = null;
  private detourTicks = 0;
  private detourIndex = 0;

  constructor(options: NavigatorOptions = {}) {
    this.registry = options.registry ?? {};
    this.logger = options.logger ?? consoleLogger;
  }

  get isActive(): boolean {
    return this.active;
  }

  setTarget(mapId: number, landmarkKey: string): boolean {
    const map = this.mapLandmarks(mapId);
    if (!map) {
      this.logger.warn(`No landmark data for map ${mapId}`);
      return false;
    }

    const landmark = ownValue(map.landmarks, landmarkKey);
    if (!landmark) {
      this.logger.warn(`No landmark '${landmarkKey}' on map ${mapId} (${map.name})`);
      return false;
    }

    this.target = {
      x: landmark.x,
      y: landmark.y,
      mapId,
      key: landmarkKey,
      label: landmark.label ?? landmarkKey
    };
    this.active = true;
    this.lastPosition = null;
    this.stuckTicks = 0;
    this.totalStuck = 0;
    this.detourDirection = null;
    this.detourTicks = 0;
    this.detourIndex = 0;

    this.logger.info(`Navigator: target set to ${this.target.label} at (${landmark.x}, ${landmark.y}) on map ${mapId}`);
    return true;
  }

  /** Must be called exactly once per tick, in order; the stuck and detour counters count calls. */
  getNextDirection(x: number, y: number, mapId: number): Direction | null {
    const target = this.target;
    if (!this.active || !target) {
      return null;
    }

    if (mapId !== target.mapId) {
      this.logger.info(`Navigator: map changed (${target.mapId} -> ${mapId}), cancelling navigation`);
      this.cancel();
      return null;
    }

    const dx = target.x - x;
    const dy = target.y - y;

    if (Math.abs(dx) <= 1 && Math.abs(dy) <= 1) {
      this.logger.info(`Navigator: arrived at ${target.label}`);
      this.active = false;
      this.totalStuck = 0;
      return null;
    }

    const unmoved = this.lastPosition !== null && this.lastPosition.x === x && this.lastPosition.y === y;

    if (this.detourTicks > 0) {
      this.lastPosition = { x, y };
      if (unmoved) {
        // The detour direction is blocked too; switch to the other perpendicular.
        // This counts as a stuck event, so the replacement detour is longer.
        this.detourTicks = 0;
        this.detourIndex += 1;
        return this.registerStuck(target, dx, dy);
      }
      this.detourTicks -= 1;
      if (this.detourTicks > 0 && this.detourDirection) {
        return this.detourDirection;
      }
    }

    this.stuckTicks = unmoved ? this.stuckTicks + 1 : 0;
    this.lastPosition = { x, y };

    if (this.stuckTicks >= STUCK_TICKS_BEFORE_DETOUR) {
      return this.registerStuck(target, dx, dy);
    }

    if (Math.abs(dx) > Math.abs(dy)) {
      return dx > 0 ? 'RIGHT' : 'LEFT';
    }
    if (dy !== 0) {
      return dy > 0 ? 'DOWN' : 'UP';
    }
    return dx > 0 ? 'RIGHT' : 'LEFT';
  }

  cancel(): void {
    if (this.active && this.target) {
      this.logger.info(`Navigator: cancelled (was heading to ${this.target.label})`);
    }
    this.active = false;
    this.target = null;
    this.lastPosition = null;
    this.stuckTicks = 0;
    this.totalStuck = 0;
    this.detourDirection = null;
    this.detourTicks = 0;
    this.detourIndex = 0;
  }

  /** Manhattan distance to the target, 0 when there is none. */
  distanceRemaining(x: number, y: number): number {
    if (!this.target) {
      return 0;
    }
    return Math.abs(this.target.x - x) + Math.abs(this.target.y - y);
  }

  availableTargets(mapId: number): string[] {
    const map = this.mapLandmarks(mapId);
    return map ? Object.keys(map.landmarks) : [];
  }

  targetsText(mapId: number): string {
    const map = this.mapLandmarks(mapId);
    if (!map) {
      return '';
    }
    return Object.entries(map.landmarks)
      .map(([key, landmark]) => `  ${GOTO_PREFIX}${key.toUpperCase()} = walk to ${landmark.label ?? key}`)
      .join('\n');
  }

  /** Resolves a `GOTO_<KEY>` action back to a landmark key on `mapId`. */
  parseGotoCommand(action: string, mapId: number): string | null {
    const trimmed = action.trim();
    if (!trimmed.toUpperCase().startsWith(GOTO_PREFIX)) {
      return null;
    }
    const wanted = trimmed.slice(GOTO_PREFIX.length).toLowerCase();
    return this.availableTargets(mapId).find((key) => key.toLowerCase() === wanted) ?? null;
  }

  snapshot(): NavigationSnapshot {
    return {
      active: this.active,
      target: this.target ? { ...this.target } : null,
      lastPosition: this.lastPosition ? { ...this.lastPosition } : null,
      stuckTicks: this.stuckTicks,
      totalStuck: this.totalStuck,
      detour:
        this.detourTicks > 0 && this.detourDirection
          ? { direction: this.detourDirection, ticksLeft: this.detourTicks }
          : null
    };
  }

  /**
   * Counts a stuck event. The 15th cancels navigation on the spot rather than
   * starting one more detour.
   */
  private registerStuck(target: NavigationTarget, dx: number, dy: number): Direction | null {
    this.totalStuck += 1;
    if (this.totalStuck >= GIVE_UP_AFTER_STUCK_EVENTS) {
      this.logger.info(
        `Navigator: giving up after ${this.totalStuck} stuck events, cancelling navigation to ${target.label}`
      );
      this.cancel();
      return null;
    }
    return this.startDetour(dx, dy);
  }

  private mapLandmarks(mapId: number): MapLandmarks | undefined {
    return ownValue(this.registry, String(mapId));
  }

  private startDetour(dx: number, dy: number): Direction {
    const ticks = detourLength(this.totalStuck);
    const options: readonly [Direction, Direction] = Math.abs(dx) >= Math.abs(dy) ? ['UP', 'DOWN'] : ['LEFT', 'RIGHT'];
    const direction = options[this.detourIndex % 2 === 0 ? 0 : 1];

    this.detourDirection = direction;
    this.detourTicks = ticks;
    this.stuckTicks = 0;

    this.logger.info(`Navigator: stuck, detouring ${direction} for ${ticks} ticks (stuck count: ${this.totalStuck})`);
    return direction;
  }
}
