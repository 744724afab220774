import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RawSentence } from '@geomancer/shared';
import { decodeSentence } from '../nmea/decoder.js';
import { assembleReport, parseCount } from '../nmea/assembler.js';
import { ArraySource, GGA, RMC_ACTIVE, VIEW_1, VIEW_2, VIEW_2_CORRUPT, VIEW_3 } from './helpers.js';

function first(line: string): RawSentence {
  const decoded = decodeSentence(line);
  assert.ok(decoded.ok);
  return decoded.sentence;
}

describe('assembleReport', () => {
  it('collects the announced number of sentences', async () => {
    const source = new ArraySource([VIEW_2, VIEW_3]);
    const result = await assembleReport(first(VIEW_1), source);
    assert.ok(result.ok);
    assert.equal(result.group.total, 3);
    assert.equal(result.group.satellitesInView, 10);
    assert.deepEqual(result.group.members.map((m) => m?.fields[1]), ['1', '2', '3']);
  });

  it('skips lines of other sentence families without counting them', async () => {
    const source = new ArraySource([GGA, VIEW_2, RMC_ACTIVE, VIEW_3]);
    const result = await assembleReport(first(VIEW_1), source);
    assert.ok(result.ok);
    assert.equal(result.group.members.length, 3);
    assert.equal(source.reads, 4);
  });

  it('leaves a null slot for a sentence that fails its checksum', async () => {
    const failures: string[] = [];
    const source = new ArraySource([VIEW_2_CORRUPT, VIEW_3]);
    const result = await assembleReport(first(VIEW_1), source, {
      onFrameError: (failure) => failures.push(failure.error),
    });
    assert.ok(result.ok);
    assert.equal(result.group.members[1], null);
    assert.equal(result.group.members[2]?.fields[1], '3');
    assert.deepEqual(failures, ['checksum mismatch']);
  });

  it('leaves a null slot for a member announcing a different total', async () => {
    const stray = '$GPGSV,1,1,04,01,05,260,25,02,10,010,20,03,15,100,15,04,20,190,30*75';
    const result = await assembleReport(first(VIEW_1), new ArraySource([stray, VIEW_3]));
    assert.ok(result.ok);
    assert.equal(result.group.members[1], null);
  });

  it('leaves a null slot for a member announcing a different in-view count', async () => {
    const otherReport = '$GPGSV,3,2,07,05,40,350,22,06,33,080,40,07,12,200,18,08,61,275,28*78';
    const result = await assembleReport(first(VIEW_1), new ArraySource([otherReport, VIEW_3]));
    assert.ok(result.ok);
    assert.equal(result.group.satellitesInView, 10);
    assert.equal(result.group.members[1], null);
    assert.equal(result.group.members[2]?.fields[1], '3');
  });

  it('needs no further reads for a single-sentence report', async () => {
    const source = new ArraySource([VIEW_2]);
    const result = await assembleReport(first('$GPGSV,1,1,03,21,10,010,20,22,20,100,31,23,30,190,40*44'), source);
    assert.ok(result.ok);
    assert.equal(result.group.members.length, 1);
    assert.equal(source.reads, 0);
  });

  it('fails with incomplete report when the source runs dry', async () => {
    const result = await assembleReport(first(VIEW_1), new ArraySource([VIEW_2]));
    assert.deepEqual(result, { ok: false, error: 'incomplete report' });
  });

  it('fails on a read timeout instead of waiting on', async () => {
    const result = await assembleReport(first(VIEW_1), new ArraySource([VIEW_2, null, VIEW_3]));
    assert.deepEqual(result, { ok: false, error: 'timeout' });
  });

  it('reports cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await assembleReport(first(VIEW_1), new ArraySource([VIEW_2, VIEW_3]), { signal: controller.signal });
    assert.deepEqual(result, { ok: false, error: 'cancelled' });
  });

  it('rejects a report whose sentence total is not a number', async () => {
    const sentence: RawSentence = { talker: 'GP', type: 'GSV', fields: ['', '1', '00'], payload: '', checksum: '00' };
    const result = await assembleReport(sentence, new ArraySource([]));
    assert.deepEqual(result, { ok: false, error: 'malformed header' });
  });
});

describe('parseCount', () => {
  it('parses digits and refuses anything else', () => {
    assert.equal(parseCount('03'), 3);
    assert.ok(Number.isNaN(parseCount('')));
    assert.ok(Number.isNaN(parseCount('x1')));
    assert.ok(Number.isNaN(parseCount(undefined)));
  });
});
