import type { BatchConfig } from '@nfse-reader/kernel';
import { NfseReaderError, isLogLevel } from '@nfse-reader/shared';

/**
 * Invalid command-line arguments (exit code 2)
 */
export class UsageError extends NfseReaderError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  /** Files and directories to read, in the order given */
  paths: string[];
  json: boolean;
  help: boolean;
  /** Settings given as flags; they win over environment and defaults */
  overrides: Partial<BatchConfig>;
}

export const USAGE = `Usage: nfse-reader [options] <path...>

Reads NFS-e XML files (or directories of them) and prints the invoices found.

Options:
  --concurrency <n>       files processed at the same time (default: 4)
  --json                  print the batch as JSON
  --no-follow-symlinks    do not follow symbolic links inside directories
  --log-level <level>     debug, info, warn or error (default: warn)
  -h, --help              show this help

Environment:
  NFSE_READER_CONCURRENCY, NFSE_READER_MAX_FILE_BYTES,
  NFSE_READER_LOG_LEVEL, NFSE_READER_FOLLOW_SYMLINKS

Exit codes:
  0 = every file read
  1 = at least one file failed
  2 = usage or configuration error
  130 = interrupted`;

/**
 * Split `--flag=value` into flag and inline value
 */
function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq > 0 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg, undefined];
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws UsageError on unknown flags, missing values or no paths
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const parsed: CliArgs = { paths: [], json: false, help: false, overrides: {} };
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (optionsEnded || !arg.startsWith('-') || arg === '-') {
      parsed.paths.push(arg);
      continue;
    }

    const [flag, inline] = splitFlag(arg);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`Option ${flag} needs a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--':
        optionsEnded = true;
        break;
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      case '--json':
        parsed.json = true;
        break;
      case '--no-follow-symlinks':
        parsed.overrides.followSymlinks = false;
        break;
      case '--concurrency': {
        const value = takeValue();
        if (!/^\d+$/.test(value) || Number(value) < 1) {
          throw new UsageError(`--concurrency must be a positive integer, got "${value}"`);
        }
        parsed.overrides.concurrency = Number(value);
        break;
      }
      case '--log-level': {
        const value = takeValue().toLowerCase();
        if (!isLogLevel(value)) {
          throw new UsageError(`--log-level must be one of debug, info, warn, error, got "${value}"`);
        }
        parsed.overrides.logLevel = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option ${flag}`);
    }
  }

  if (!parsed.help && parsed.paths.length === 0) {
    throw new UsageError('No input paths given');
  }

  return parsed;
}
