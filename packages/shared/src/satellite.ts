// ============================================================================
// Geomancer Satellite Types
// ============================================================================

export type Direction = 'North' | 'East' | 'South' | 'West';

export const DIRECTIONS: readonly Direction[] = ['North', 'East', 'South', 'West'];

/** Ideal bearing of each direction, degrees */
export const DIRECTION_BEARINGS: Record<Direction, number> = {
  North: 0,
  East: 90,
  South: 180,
  West: 270,
};

export interface SatelliteRecord {
  prn: number;
  elevation: number;  // degrees, 0-90
  azimuth: number;    // degrees, 0-359
  snr: number;        // dB-Hz, 0 when not tracked
}

export interface SatelliteTable {
  satellites: ReadonlyMap<number, SatelliteRecord>;
  recovered: number;  // records built
  skipped: number;    // malformed chunks dropped
}

export interface ClassifiedSatellite extends SatelliteRecord {
  direction: Direction | null;  // null on the 45/135/225/315 boundaries
  deviation: number | null;     // degrees from the direction's ideal bearing
}

export type ChosenFour = Partial<Record<Direction, ClassifiedSatellite>>;
