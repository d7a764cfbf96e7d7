import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { ZONES, type Zone } from '../layout/zones.js';

/** Raw per-zone answers, merged into `layout` before validation rejects anything malformed. */
export type ZoneCountAnswers = Record<Zone, number | string>;

const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

/** A blank answer means 0; anything that is not a number is kept as typed. */
export const parseZoneCount = (answer: string): number | string => {
  const trimmed = answer.trim();
  if (trimmed === '') return 0;
  return NUMERIC.test(trimmed) ? Number(trimmed) : trimmed;
};

/**
 * Asks for the light count of every zone in turn. Zones left unanswered when
 * the input ends count as 0.
 */
export const promptZoneCounts = async (input: Readable, output: Writable): Promise<ZoneCountAnswers> => {
  const answers: ZoneCountAnswers = { left: 0, right: 0, front: 0, back: 0, top: 0, bottom: 0 };
  const rl = createInterface({ input, terminal: false });
  // The iterator buffers lines that arrive before their prompt.
  const lines = rl[Symbol.asyncIterator]();
  output.write('Enter number of lights per zone (blank for 0):\n');
  try {
    for (const zone of ZONES) {
      output.write(`  ${zone}: `);
      const next = await lines.next();
      if (next.done) break;
      answers[zone] = parseZoneCount(next.value);
    }
  } finally {
    rl.close();
  }
  return answers;
};
