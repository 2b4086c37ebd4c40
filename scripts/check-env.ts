#!/usr/bin/env npx tsx
// scripts/check-env.ts — Report which services a .env file configures
//
// Usage:
//   npx tsx scripts/check-env.ts              # check ./.env
//   npx tsx scripts/check-env.ts path/to/.env # check another file
import { ServiceSettings, SERVICES, SERVICE_IDS, ServiceSettingsError } from '../src/index.js';

function printTable(header: string[], rows: string[][]) {
  const widths = header.map((h, i) =>
    Math.max(h.length, ...rows.map(r => r[i].length))
  );
  const sep = widths.map(w => '─'.repeat(w + 2)).join('┼');
  const pad = (s: string, w: number) => s + ' '.repeat(w - s.length);

  console.log(header.map((h, i) => ` ${pad(h, widths[i])} `).join('│'));
  console.log(sep);
  for (const row of rows) {
    console.log(row.map((c, i) => ` ${pad(c, widths[i])} `).join('│'));
  }
  console.log();
}

function main(): number {
  const settings = new ServiceSettings({ envFile: process.argv[2] });
  console.log(`\n  ${settings.path}\n`);

  // Values are never printed, only which keys are missing
  const rows = SERVICE_IDS.map(id => {
    const missing = settings.check(id);
    return [SERVICES[id].label, missing.length === 0 ? 'ok' : 'missing', missing.join(', ')];
  });
  printTable(['Service', 'Status', 'Missing keys'], rows);

  const configured = settings.configuredServices().length;
  console.log(`  ${configured}/${SERVICE_IDS.length} services configured\n`);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof ServiceSettingsError) {
    console.error(`Error: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
