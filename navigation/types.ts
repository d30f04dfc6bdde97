export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

export interface Landmark {
  x: number;
  y: number;
  label?: string;
}

export interface MapLandmarks {
  name: string;
  landmarks: Record<string, Landmark>;
}

/** Keyed by map id (as a string, the way the data file stores it). */
export type LandmarkRegistry = Record<string, MapLandmarks>;

export interface NavigationTarget {
  x: number;
  y: number;
  mapId: number;
  key: string;
  label: string;
}

export interface NavigationSnapshot {
  active: boolean;
  target: NavigationTarget | null;
  lastPosition: { x: number; y: number } | null;
  stuckTicks: number;
  totalStuck: number;
  detour: { direction: Direction; ticksLeft: number } | null;
}
