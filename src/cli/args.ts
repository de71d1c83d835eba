/**
 * Command-line argument parsing
 *
 * @module cli/args
 */

import { REPLAY_STATUSES, type ReplayStatus } from '../models/dead-letter.js';

export type CliCommand =
  | { name: 'poll-once' }
  | { name: 'replay'; target: { status: ReplayStatus } | { id: string } }
  | { name: 'abandon'; id: string }
  | { name: 'monitor' }
  | { name: 'help' };

export type ParseResult = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE = `Usage: doc-intake <command> [options]

Commands:
  poll-once                      List the inbox once and process every new document
  replay --status <status>       Replay dead-letter entries with status PENDING, REPLAYED or ABANDONED
  replay --id <entryId>          Replay one dead-letter entry
  abandon --id <entryId>         Mark a dead-letter entry ABANDONED
  monitor                        Serve the read-only monitoring tools over stdio
  help                           Show this message

Exit codes: 0 success, 1 startup fault, 2 usage error`;

function isReplayStatus(value: string): value is ReplayStatus {
  return REPLAY_STATUSES.some((status) => status === value);
}

/**
 * Read `--name value` and `--name=value` options. Unknown options and
 * missing values are errors.
 */
function parseOptions(args: string[], allowed: readonly string[]): Map<string, string> | string {
  const options = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      return `Unexpected argument: ${arg}`;
    }
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!allowed.includes(name)) {
      return `Unknown option: --${name}`;
    }
    let value: string | undefined;
    if (eq === -1) {
      value = args[i + 1];
      i++;
    } else {
      value = arg.slice(eq + 1);
    }
    if (value === undefined || value === '' || value.startsWith('--')) {
      return `Option --${name} needs a value`;
    }
    if (options.has(name)) {
      return `Option --${name} given twice`;
    }
    options.set(name, value);
  }
  return options;
}

export function parseArgs(argv: readonly string[]): ParseResult {
  const [name, ...rest] = argv;

  switch (name) {
    case undefined:
      return { ok: false, error: 'No command given' };

    case 'help':
    case '--help':
    case '-h':
      return { ok: true, command: { name: 'help' } };

    case 'poll-once':
      if (rest.length > 0) return { ok: false, error: 'poll-once takes no arguments' };
      return { ok: true, command: { name: 'poll-once' } };

    case 'monitor':
      if (rest.length > 0) return { ok: false, error: 'monitor takes no arguments' };
      return { ok: true, command: { name: 'monitor' } };

    case 'replay': {
      const options = parseOptions(rest, ['status', 'id']);
      if (typeof options === 'string') return { ok: false, error: options };
      const status = options.get('status');
      const id = options.get('id');
      if ((status === undefined) === (id === undefined)) {
        return { ok: false, error: 'replay needs exactly one of --status or --id' };
      }
      if (id !== undefined) {
        return { ok: true, command: { name: 'replay', target: { id } } };
      }
      const upper = (status ?? '').toUpperCase();
      if (!isReplayStatus(upper)) {
        return { ok: false, error: `Invalid status "${status}": expected ${REPLAY_STATUSES.join(', ')}` };
      }
      return { ok: true, command: { name: 'replay', target: { status: upper } } };
    }

    case 'abandon': {
      const options = parseOptions(rest, ['id']);
      if (typeof options === 'string') return { ok: false, error: options };
      const id = options.get('id');
      if (id === undefined) return { ok: false, error: 'abandon needs --id' };
      return { ok: true, command: { name: 'abandon', id } };
    }

    default:
      return { ok: false, error: `Unknown command: ${name}` };
  }
}
