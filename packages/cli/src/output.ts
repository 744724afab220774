import { DIRECTIONS } from '@geomancer/shared';
import type { ChosenFour, ClassifiedSatellite, DecodeResult, SatelliteGroup } from '@geomancer/shared';

/** `PRN 14  el:35°  az: 55°  15dB  East (35°)` padded for terminal alignment */
export function formatSatellite(sat: ClassifiedSatellite): string {
  const id = 'PRN' + sat.prn.toString().padStart(3, ' ');
  const el = 'el:' + sat.elevation.toString().padStart(2, ' ') + '°';
  const az = 'az:' + sat.azimuth.toString().padStart(3, ' ') + '°';
  const snr = sat.snr.toString().padStart(2, ' ') + 'dB';
  const where = sat.direction === null ? 'on a boundary' : `${sat.direction} (${sat.deviation}°)`;
  return `${id}  ${el}  ${az}  ${snr}  ${where}`;
}

export function formatChosen(chosen: ChosenFour): string[] {
  return DIRECTIONS.map((direction) => {
    const sat = chosen[direction];
    return `${direction.padEnd(5)} ${sat ? formatSatellite(sat) : '—'}`;
  });
}

export function formatReport(group: SatelliteGroup): string {
  const decoded = group.members.filter((m) => m !== null).length;
  return `sentences: ${group.total} (${decoded} decoded)  satellites: ${group.satellitesInView}`;
}

export function formatFrameError(failure: Extract<DecodeResult, { ok: false }>): string {
  return `${failure.error}: ${failure.line}`;
}
