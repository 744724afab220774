// ============================================================================
// Geomancer NMEA Types
// ============================================================================

/** One checksum-validated NMEA line with its `$<talker><type>` header removed. */
export interface RawSentence {
  talker: string;          // GP, GN, GL, GA ...
  type: string;            // GSV, RMC ...
  fields: string[];        // values after the header, empty strings kept
  payload: string;         // text between '$' and '*'
  checksum: string;        // two uppercase hex digits
}

export type DecodeError = 'not a sentence' | 'no checksum marker' | 'checksum mismatch';

export type DecodeResult =
  | { ok: true; sentence: RawSentence }
  | { ok: false; error: DecodeError; line: string };

/** A satellite-view report; a slot is null when that sentence failed to decode. */
export interface SatelliteGroup {
  total: number;
  satellitesInView: number;
  members: (RawSentence | null)[];
}

export type AssembleError = 'malformed header' | 'incomplete report' | 'timeout' | 'cancelled';

export type AssembleResult =
  | { ok: true; group: SatelliteGroup }
  | { ok: false; error: AssembleError };

export const SATELLITE_VIEW_TYPE = 'GSV';
export const FIX_STATUS_TYPE = 'RMC';
export const DEFAULT_TALKER = 'GP';
