/**
 * trackstat: summary statistics for a GPX track log.
 *
 *   trackstat <file.gpx> [--json] [-v|--verbose] [-h|--help]
 *
 * Exit code 0 on success, 1 on any failure. Output goes through an injected
 * writer pair so the command can run in process.
 */

import { parseArgs } from 'node:util';
import { describeError, parseTrackFile, summarizeTrack } from '@trackstat/core';
import { formatSummaryJson, formatSummaryText } from './format.js';

export const USAGE = 'Usage: trackstat <file.gpx> [--json] [-v|--verbose] [-h|--help]';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const CONSOLE_IO: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface CliArgs {
  file: string;
  json: boolean;
  verbose: boolean;
}

type ParsedArgs = { kind: 'run'; args: CliArgs } | { kind: 'help' };

function readArgs(argv: readonly string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      json: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help === true) return { kind: 'help' };

  const [file, ...rest] = positionals;
  if (file === undefined || rest.length > 0) {
    throw new Error(USAGE);
  }
  return {
    kind: 'run',
    args: { file, json: values.json === true, verbose: values.verbose === true },
  };
}

export function run(argv: readonly string[], io: CliIo = CONSOLE_IO): number {
  try {
    const parsed = readArgs(argv);
    if (parsed.kind === 'help') {
      io.out(USAGE);
      return 0;
    }

    const { file, json, verbose } = parsed.args;
    const summary = summarizeTrack(parseTrackFile(file, { verbose }));

    if (json) {
      io.out(formatSummaryJson(file, summary));
    } else {
      for (const line of formatSummaryText(file, summary)) io.out(line);
    }
    return 0;
  } catch (err) {
    io.err(`Error: ${describeError(err)}`);
    return 1;
  }
}
