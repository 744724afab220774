import { DIRECTIONS } from '@geomancer/shared';
import type { ChosenFour, ClassifiedSatellite, Direction } from '@geomancer/shared';

// Lower deviation wins, then higher SNR. On a full tie the challenger wins,
// which makes the outcome depend on report order; receivers list satellites
// in no defined order, so that last case carries no meaning.
function beats(challenger: ClassifiedSatellite, best: ClassifiedSatellite, deviation: number): boolean {
  const bestDeviation = best.deviation ?? Infinity;
  if (deviation !== bestDeviation) return deviation < bestDeviation;
  return challenger.snr >= best.snr;
}

/** Best satellite per direction. Directions nobody was classified into stay absent. */
export function selectCandidates(classified: Iterable<ClassifiedSatellite>): ChosenFour {
  const chosen: ChosenFour = {};
  for (const sat of classified) {
    if (sat.direction === null || sat.deviation === null) continue;
    const best = chosen[sat.direction];
    if (!best || beats(sat, best, sat.deviation)) {
      chosen[sat.direction] = sat;
    }
  }
  return chosen;
}

export function missingDirections(chosen: ChosenFour): Direction[] {
  return DIRECTIONS.filter((d) => chosen[d] === undefined);
}
