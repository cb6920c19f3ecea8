#!/usr/bin/env npx tsx
/**
 * Smoke Test: Identification
 *
 * Sends the given terms as recognized text to a running server and prints
 * the ranked results.
 *
 * Usage:
 *   npx tsx scripts/smoke-identify.ts <term> [term...]
 *   npx tsx scripts/smoke-identify.ts <term> --code 00000-111-01
 *   npx tsx scripts/smoke-identify.ts <term> --base-url http://localhost:3001
 *
 * Example:
 *   npx tsx scripts/smoke-identify.ts "Asprin" "81mg" white round
 */

import type { IdentifyResponse } from '../src/modules/identify/schemas.js';

const args = process.argv.slice(2);

if (args.length < 1 || args[0] === '--help') {
  console.log(`
Usage: npx tsx scripts/smoke-identify.ts <term> [term...] [options]

Options:
  --base-url <url>  API base URL (default: http://localhost:3000)
  --code <code>     External code (barcode payload) to send
  --help            Show this help

Example:
  npx tsx scripts/smoke-identify.ts Asprin 81mg
  npx tsx scripts/smoke-identify.ts Advil --base-url http://localhost:3001
`);
  process.exit(args[0] === '--help' ? 0 : 1);
}

function takeOption(name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1 || !args[index + 1]) return undefined;
  const [, value] = args.splice(index, 2);
  return value;
}

const baseUrl = takeOption('--base-url') ?? 'http://localhost:3000';
const externalCode = takeOption('--code');
const terms = args;

async function main() {
  console.log('='.repeat(60));
  console.log('Identification Smoke Test');
  console.log('='.repeat(60));
  console.log('');
  console.log(`Terms:    ${terms.join(', ')}`);
  console.log(`Code:     ${externalCode ?? '(none)'}`);
  console.log(`Base URL: ${baseUrl}`);
  console.log('');

  // Step 1: Readiness
  console.log('[1/2] Checking readiness...');
  try {
    const ready = await fetch(`${baseUrl}/ready`);
    if (!ready.ok) {
      console.error(`  ERROR: HTTP ${ready.status}`);
      process.exit(1);
    }
    const body = await ready.json() as { checks: { records: number } };
    console.log(`  OK (${body.checks.records} records)`);
    console.log('');
  } catch (err) {
    console.error(`  ERROR: ${(err as Error).message}`);
    process.exit(1);
  }

  // Step 2: Identify
  console.log('[2/2] Identifying...');
  let result: IdentifyResponse;
  try {
    const response = await fetch(`${baseUrl}/api/v1/identify`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        signals: {
          recognizedText: terms.map(text => ({ text })),
          externalCode,
        },
      }),
    });
    if (!response.ok) {
      const errorText = await response.text();
      console.error(`  ERROR: HTTP ${response.status}`);
      console.error(`  ${errorText}`);
      process.exit(1);
    }
    result = await response.json() as IdentifyResponse;
  } catch (err) {
    console.error(`  ERROR: ${(err as Error).message}`);
    process.exit(1);
  }

  console.log(`  Query terms: ${result.query_terms.join(', ')}`);
  console.log('');

  if (result.results.length === 0) {
    console.log('No matches.');
    return;
  }

  for (const [i, item] of result.results.entries()) {
    console.log(`  ${i + 1}. ${item.name.padEnd(24)} ${item.score.toFixed(3)}  ${item.matched_by}  ${item.deep_link}`);
  }
}

main().catch((err) => {
  console.error('Unexpected error:', err);
  process.exit(1);
});
