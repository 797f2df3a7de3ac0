#!/usr/bin/env node

/**
 * Decodes and re-encodes every telegram in a file and reports the ones that
 * do not come back unchanged.
 *
 * Usage: npm run roundtrip -- telegrams.txt
 */

import fs from 'fs';
import synopDecoder from '../services/SynopDecoder';
import synopEncoder from '../services/SynopEncoder';
import logger from '../utils/logger';

export interface RoundTripFailure {
  line: number;
  telegram: string;
  reason: string;
}

export interface RoundTripResult {
  checked: number;
  failures: RoundTripFailure[];
}

const normalise = (telegram: string): string => telegram.trim().split(/\s+/).join(' ');

/** Blank lines and lines starting with `#` are skipped */
export function checkTelegrams(lines: string[]): RoundTripResult {
  const result: RoundTripResult = { checked: 0, failures: [] };

  lines.forEach((raw, index) => {
    const telegram = normalise(raw);
    if (telegram.length === 0 || telegram.startsWith('#')) {
      return;
    }
    result.checked += 1;
    try {
      const encoded = synopEncoder.encode(synopDecoder.decode(telegram));
      if (encoded !== telegram) {
        result.failures.push({ line: index + 1, telegram, reason: `re-encoded as ${encoded}` });
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      result.failures.push({ line: index + 1, telegram, reason: err.message });
    }
  });

  return result;
}

function run(file: string | undefined): void {
  if (file === undefined) {
    logger.error('Usage: roundtrip-check <file>');
    process.exitCode = 2;
    return;
  }

  const { checked, failures } = checkTelegrams(fs.readFileSync(file, 'utf8').split(/\r?\n/));
  failures.forEach((failure) => {
    logger.error('Round trip failed', { ...failure });
  });
  logger.info(`Checked ${checked} telegrams, ${failures.length} failed`);
  if (failures.length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  run(process.argv[2]);
}
