import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeSentence, nmeaChecksum, sentenceHeader } from '../nmea/decoder.js';
import { SINGLE_VIEW, VIEW_2, VIEW_2_CORRUPT, VIEW_3 } from './helpers.js';

describe('nmeaChecksum', () => {
  it('XORs every character and formats two uppercase hex digits', () => {
    // 'A' ^ 'B' = 0x41 ^ 0x42 = 0x03
    assert.equal(nmeaChecksum('AB'), '03');
    assert.equal(nmeaChecksum('GPGSV,3,3,10,09,08,135,,10,,,'), '4F');
  });

  it('is 00 for an empty payload', () => {
    assert.equal(nmeaChecksum(''), '00');
  });

  it('changes when any single payload character changes', () => {
    const payload = 'GPGSV,1,1,04,01,05,260,25';
    const original = nmeaChecksum(payload);
    for (let i = 0; i < payload.length; i++) {
      const flipped = String.fromCharCode(payload.charCodeAt(i) ^ 0x01);
      const corrupted = payload.slice(0, i) + flipped + payload.slice(i + 1);
      assert.notEqual(nmeaChecksum(corrupted), original, `position ${i}`);
    }
  });
});

describe('decodeSentence', () => {
  it('splits a valid satellite-view sentence', () => {
    const result = decodeSentence(`${VIEW_3}\r\n`);
    assert.ok(result.ok);
    assert.equal(result.sentence.talker, 'GP');
    assert.equal(result.sentence.type, 'GSV');
    assert.deepEqual(result.sentence.fields, ['3', '3', '10', '09', '08', '135', '', '10', '', '', '']);
    assert.equal(result.sentence.checksum, '4F');
  });

  it('reproduces the wire checksum from the decoded payload', () => {
    const result = decodeSentence(SINGLE_VIEW);
    assert.ok(result.ok);
    assert.equal(nmeaChecksum(result.sentence.payload), SINGLE_VIEW.slice(-2));
    assert.equal(`$${result.sentence.payload}*${result.sentence.checksum}`, SINGLE_VIEW);
  });

  it('accepts lowercase checksum digits', () => {
    const result = decodeSentence(VIEW_3.replace('*4F', '*4f'));
    assert.ok(result.ok);
  });

  it('reports a checksum mismatch', () => {
    const result = decodeSentence(VIEW_2_CORRUPT);
    assert.deepEqual(result, { ok: false, error: 'checksum mismatch', line: VIEW_2_CORRUPT });
  });

  it('reports a corrupted payload byte', () => {
    const corrupted = VIEW_2.replace('350', '351');
    const result = decodeSentence(corrupted);
    assert.equal(result.ok, false);
    assert.equal(!result.ok && result.error, 'checksum mismatch');
  });

  it('reports a missing checksum marker', () => {
    const result = decodeSentence('$GPGSV,1,1,00\r\n');
    assert.deepEqual(result, { ok: false, error: 'no checksum marker', line: '$GPGSV,1,1,00' });
  });

  it('rejects text that is not a sentence', () => {
    const result = decodeSentence('garbage*00');
    assert.equal(!result.ok && result.error, 'not a sentence');
  });

  it('tolerates whitespace after the checksum', () => {
    const result = decodeSentence(`${SINGLE_VIEW} \t\r\n`);
    assert.ok(result.ok);
    assert.equal(result.sentence.checksum, '75');
  });

  it('rejects trailing characters after the checksum', () => {
    const result = decodeSentence(`${SINGLE_VIEW}X`);
    assert.equal(!result.ok && result.error, 'checksum mismatch');
  });
});

describe('sentenceHeader', () => {
  it('joins talker and type behind the start delimiter', () => {
    assert.equal(sentenceHeader('GN', 'GSV'), '$GNGSV');
  });
});
