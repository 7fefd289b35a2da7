/**
 * Live test: present then clean up a DNS-01 record on an OVH zone.
 *
 * Usage:
 *   OVH_ENDPOINT=ovh-eu OVH_APPLICATION_KEY=xxx OVH_APPLICATION_SECRET=xxx \
 *   OVH_CONSUMER_KEY=xxx npx tsx examples/solve-challenge.ts example.com
 */

import { existsSync } from 'node:fs';
import { ovhSolver, type ChallengeRequest } from '../src/index.js';

const zone = process.argv[2];

if (!zone) {
  console.error('Usage: npx tsx examples/solve-challenge.ts <zone>');
  process.exit(1);
}

if (!process.env.OVH_APPLICATION_KEY && !existsSync('ovh.conf')) {
  console.error('Missing OVH_* credentials in the environment or ./ovh.conf.');
  console.error('Create them at: https://eu.api.ovh.com/createToken/');
  console.error('Required rights: GET/POST/DELETE on /domain/zone/*');
  process.exit(1);
}

async function main(zone: string) {
  const solver = ovhSolver();
  const request: ChallengeRequest = {
    uid: 'example',
    action: 'Present',
    type: 'dns-01',
    dnsName: zone,
    key: `example-${Date.now()}`,
    resourceNamespace: 'default',
    resolvedFQDN: `_acme-challenge.${zone}.`,
    resolvedZone: `${zone}.`,
    allowAmbientCredentials: true,
  };

  console.log(`\nPresenting TXT ${request.resolvedFQDN} = ${request.key}`);
  await solver.present(request);
  console.log('Record created and zone refreshed.');

  console.log('\nCleaning up...');
  await solver.cleanUp({ ...request, action: 'CleanUp' });
  console.log('Record removed and zone refreshed.');
}

main(zone).catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
