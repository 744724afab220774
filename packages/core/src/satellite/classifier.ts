import { DIRECTION_BEARINGS } from '@geomancer/shared';
import type { ClassifiedSatellite, Direction, SatelliteTable } from '@geomancer/shared';

export interface Bearing {
  direction: Direction;
  deviation: number;
}

function bearing(direction: Direction, azimuth: number): Bearing {
  return { direction, deviation: Math.abs(azimuth - DIRECTION_BEARINGS[direction]) };
}

/**
 * Compass bucket of an azimuth and its distance from the bucket's ideal
 * bearing (N=0, E=90, S=180, W=270). Intervals are open, so azimuths of
 * exactly 45, 135, 225 and 315 belong to no direction.
 */
export function classifyAzimuth(azimuth: number): Bearing | null {
  if (azimuth > 315 || azimuth < 45) {
    return { direction: 'North', deviation: azimuth > 180 ? 360 - azimuth : azimuth };
  }
  if (azimuth > 45 && azimuth < 135) return bearing('East', azimuth);
  if (azimuth > 135 && azimuth < 225) return bearing('South', azimuth);
  if (azimuth > 225 && azimuth < 315) return bearing('West', azimuth);
  return null;
}

export function classifySatellites(table: SatelliteTable): ClassifiedSatellite[] {
  return Array.from(table.satellites.values(), (sat) => {
    const found = classifyAzimuth(sat.azimuth);
    return {
      ...sat,
      direction: found?.direction ?? null,
      deviation: found?.deviation ?? null,
    };
  });
}
