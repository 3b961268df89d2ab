import { ConfigurationError } from '../common/errors';
import { isStageName, STAGE_NAMES, StageName, StageRunOptions } from '../pipeline/pipeline.types';

export type CliCommand =
  | { kind: 'run'; stage: StageName; options: Partial<StageRunOptions>; verbose: boolean }
  | { kind: 'verify-marketplace'; sandbox: boolean; verbose: boolean }
  | { kind: 'help' };

export const USAGE = [
  'Usage:',
  `  catalog-pipeline <${STAGE_NAMES.join('|')}> [--force] [--dry-run|--no-dry-run] [--limit N] [--delay SECONDS] [--sandbox] [--verbose]`,
  '  catalog-pipeline verify-marketplace [--sandbox] [--verbose]',
].join('\n');

const VALUE_FLAGS = ['--limit', '--delay'];
const SWITCHES = ['--force', '--dry-run', '--no-dry-run', '--sandbox', '--verbose'];

function parseNumber(flag: string, raw: string | undefined): number {
  const value = raw === undefined || raw.trim() === '' ? NaN : Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${flag} expects a number, got "${raw ?? ''}"`);
  }
  return value;
}

/** Parses arguments after the script name. Unknown commands and flags raise ConfigurationError. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return { kind: 'help' };
  }

  const switches = new Set<string>();
  const values = new Map<string, string>();
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const inline = separator === -1 ? undefined : arg.slice(separator + 1);
    if (VALUE_FLAGS.includes(flag)) {
      const value = inline ?? rest[++i];
      values.set(flag, parseNumber(flag, value).toString());
    } else if (SWITCHES.includes(flag) && inline === undefined) {
      switches.add(flag);
    } else {
      throw new ConfigurationError(`Unknown option ${arg}`);
    }
  }
  const verbose = switches.has('--verbose');

  if (command === 'verify-marketplace') {
    return { kind: 'verify-marketplace', sandbox: switches.has('--sandbox'), verbose };
  }
  if (!isStageName(command)) {
    throw new ConfigurationError(`Unknown command "${command}"`);
  }
  if (switches.has('--dry-run') && switches.has('--no-dry-run')) {
    throw new ConfigurationError('--dry-run and --no-dry-run cannot be combined');
  }

  const options: Partial<StageRunOptions> = {
    force: switches.has('--force'),
    dryRun: switches.has('--dry-run'),
    sandbox: switches.has('--sandbox'),
  };
  const limit = values.get('--limit');
  if (limit !== undefined) options.limit = Number(limit);
  const delay = values.get('--delay');
  if (delay !== undefined) options.delaySeconds = Number(delay);

  return { kind: 'run', stage: command, options, verbose };
}
