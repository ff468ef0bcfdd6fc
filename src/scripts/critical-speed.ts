#!/usr/bin/env npx tsx
/**
 * Estimate threshold / reserve from a session file and optionally simulate
 * the reserve balance.
 *
 * Usage:
 *   npx tsx src/scripts/critical-speed.ts examples/running-3min.json
 *   npx tsx src/scripts/critical-speed.ts examples/cycling-tte.json --json
 */

import { runCli } from '@/session/cli';

process.exitCode = runCli(process.argv.slice(2));
