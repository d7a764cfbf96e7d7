import process from 'node:process';

import { ZonelightClient } from '../../sdk/typescript/src/index.js';

const main = async () => {
  const client = new ZonelightClient({ baseUrl: process.env.ZONELIGHT_URL ?? 'http://127.0.0.1:8787' });
  if (!(await client.health())) {
    console.error('zonelight control endpoint is not reachable (start with "zonelight run --port 8787")');
    process.exit(1);
  }

  const { active, patterns } = await client.patterns();
  console.log(`Active pattern: ${active}`);
  const requested = process.argv[2] ?? patterns[(patterns.findIndex((p) => p.name === active) + 1) % patterns.length].name;
  const { pattern } = await client.switchPattern(requested);
  console.log(`Requested ${pattern}`);

  const status = await client.status();
  console.log(`${status.lights} lights, ${status.ticks} ticks, audio ${status.audio.source}`);
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
