import assert from 'node:assert/strict';
import { PassThrough, Writable } from 'node:stream';
import test from 'node:test';

import { parseZoneCount, promptZoneCounts } from '../src/cli/interactiveLayout.js';
import { loadConfigFromJson } from '../src/config/loader.js';

const capture = () => {
  let text = '';
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { output, text: () => text };
};

const answer = async (lines: string) => {
  const input = new PassThrough();
  const { output, text } = capture();
  input.end(lines);
  const counts = await promptZoneCounts(input, output);
  return { counts, text: text() };
};

test('parseZoneCount treats blank as zero and keeps other text for validation', () => {
  assert.equal(parseZoneCount(''), 0);
  assert.equal(parseZoneCount('   '), 0);
  assert.equal(parseZoneCount(' 4 '), 4);
  assert.equal(parseZoneCount('-1'), -1);
  assert.equal(parseZoneCount('2.5'), 2.5);
  assert.equal(parseZoneCount('three'), 'three');
});

test('promptZoneCounts asks for every zone in order', async () => {
  const { counts, text } = await answer('2\n\n3\n1\n0\n4\n');
  assert.deepEqual(counts, { left: 2, right: 0, front: 3, back: 1, top: 0, bottom: 4 });
  assert.equal(
    text,
    'Enter number of lights per zone (blank for 0):\n  left:   right:   front:   back:   top:   bottom: ',
  );
});

test('zones left unanswered when input ends count as zero', async () => {
  const { counts, text } = await answer('5\n');
  assert.deepEqual(counts, { left: 5, right: 0, front: 0, back: 0, top: 0, bottom: 0 });
  assert.equal(text, 'Enter number of lights per zone (blank for 0):\n  left:   right: ');
});

test('answers become layout overrides', async () => {
  const { counts } = await answer('0\n0\n6\n2\n\n\n');
  const result = loadConfigFromJson('{}', null, { layout: counts });
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  assert.deepEqual(result.config.layout.counts, { left: 0, right: 0, front: 6, back: 2, top: 0, bottom: 0 });
});

test('a malformed answer is rejected by layout validation', async () => {
  const { counts } = await answer('1\nmany\n');
  const result = loadConfigFromJson('{}', null, { layout: counts });
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.deepEqual(
    result.issues?.filter((issue) => issue.severity === 'error').map((issue) => [issue.code, issue.message]),
    [['config/layout/count', 'layout.right must be a non-negative integer (got "many")']],
  );
});
