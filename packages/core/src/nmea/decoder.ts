import type { DecodeResult } from '@geomancer/shared';

/**
 * XOR of every character code in the payload, as two uppercase hex digits.
 * The payload is the text between '$' and '*'.
 */
export function nmeaChecksum(payload: string): string {
  let sum = 0;
  for (let i = 0; i < payload.length; i++) {
    sum ^= payload.charCodeAt(i);
  }
  return sum.toString(16).toUpperCase().padStart(2, '0');
}

/** `$GPGSV`-style prefix used to pick lines of one sentence family off the wire */
export function sentenceHeader(talker: string, type: string): string {
  return `$${talker}${type}`;
}

/**
 * Validate and split one NMEA line.
 *
 * `$GPGSV,3,1,12,01,80,283,20*79\r\n` becomes talker `GP`, type `GSV` and
 * fields `['3', '1', '12', '01', '80', '283', '20']`. Failures come back as
 * values so a read loop can drop the line and carry on.
 */
export function decodeSentence(line: string): DecodeResult {
  const text = line.replace(/[\r\n]+$/, '');
  if (!text.startsWith('$')) return { ok: false, error: 'not a sentence', line: text };

  const star = text.lastIndexOf('*');
  if (star < 0) return { ok: false, error: 'no checksum marker', line: text };

  const payload = text.slice(1, star);
  const expected = text.slice(star + 1).trim().toUpperCase();
  const checksum = nmeaChecksum(payload);
  if (checksum !== expected) return { ok: false, error: 'checksum mismatch', line: text };

  const [header, ...fields] = payload.split(',');
  return {
    ok: true,
    sentence: {
      talker: header.slice(0, 2),
      type: header.slice(2),
      fields,
      payload,
      checksum,
    },
  };
}
