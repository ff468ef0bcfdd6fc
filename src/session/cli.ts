/**
 * Command-line entry: critical-speed <session.json> [--json] [--trace]
 */

import { readFileSync } from 'node:fs';
import { sessionSchema, formatIssues } from './schema';
import { runSession } from './run';
import type { SessionReport } from './run';
import { formatSessionReport } from './report';
import { FitError } from '@/calculations';
import type { RandomSource } from '@/types';
import { mathRandom } from '@/balance';

export interface CliIo {
  readFile(path: string): string;
  log(line: string): void;
  error(line: string): void;
}

const nodeIo: CliIo = {
  readFile: (path) => readFileSync(path, 'utf8'),
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export const USAGE = 'Usage: critical-speed <session.json> [--json] [--trace]';

/** JSON view of a report; the per-second arrays only with --trace */
function toJson(report: SessionReport, withTrace: boolean): unknown {
  if (!report.simulation || withTrace) return report;
  const { intensity, balance, ...simulation } = report.simulation;
  return { ...report, simulation: { ...simulation, samples: balance.length || intensity.length } };
}

/**
 * Run the CLI
 * @returns Process exit code
 */
export function runCli(args: string[], io: CliIo = nodeIo, rng: RandomSource = mathRandom): number {
  const jsonOnly = args.includes('--json');
  const withTrace = args.includes('--trace');
  const path = args.find(a => !a.startsWith('--'));

  if (!path) {
    io.error(USAGE);
    return 1;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(io.readFile(path));
  } catch (e) {
    io.error(`Could not read session ${path}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const parsed = sessionSchema.safeParse(raw);
  if (!parsed.success) {
    io.error(`Invalid session ${path}:`);
    for (const line of formatIssues(parsed.error)) io.error(`  ${line}`);
    return 1;
  }

  let report: SessionReport;
  try {
    report = runSession(parsed.data, rng);
  } catch (e) {
    if (e instanceof FitError) {
      io.error(`Fit failed: ${e.message}`);
      return 1;
    }
    if (e instanceof Error) {
      io.error(e.message);
      return 1;
    }
    throw e;
  }

  if (jsonOnly) {
    io.log(JSON.stringify(toJson(report, withTrace), null, 2));
  } else {
    io.log(formatSessionReport(report));
  }
  return 0;
}
