import { ConfigError } from './errors/index.js';
import { parsePositiveInt, type DeclinationConfig } from './config/env.js';

export interface CliOptions {
  help: boolean;
  version: boolean;
  infile?: string;
  outfile?: string;
  header: boolean;
  verbose: boolean;
  envFile?: string;
  /** Flag values that override the environment */
  overrides: Partial<DeclinationConfig>;
}

const VALUE_FLAGS = new Set([
  '-i',
  '--infile',
  '-o',
  '--outfile',
  '--env',
  '--endpoint',
  '--timeout',
  '--retries',
]);

export const USAGE = `
magdecl - magnetic declination reports from the NOAA geomagnetic calculator

Usage:
  magdecl [options]

Input lines (whitespace separated, # starts a comment):
  YYYY MM DD LAT_DEG LAT_MIN LON_DEG LON_MIN GRID_OFFSET
  Latitude is taken as North and longitude as West.

Options:
  -i, --infile <file>    Input file (default: stdin)
  -o, --outfile <file>   Output file (default: stdout)
  --no-header            Do not print the column header line
  --fail-fast            Stop at the first failed remote lookup
  --endpoint <url>       Calculator URL (env: MAGDECL_ENDPOINT)
  --timeout <ms>         Request timeout (env: MAGDECL_TIMEOUT_MS)
  --retries <n>          Attempts per request (env: MAGDECL_MAX_ATTEMPTS)
  --env <file>           Path to .env file (default: .env, .env.local)
  --verbose              Log each request to stderr
  --version              Print version
  -h, --help             Show this help message

Environment Variables:
  MAGDECL_API_KEY        Sent as the calculator's 'key' parameter
  MAGDECL_MODEL          Geomagnetic model (e.g. WMM, IGRF)
  MAGDECL_FAILURE_POLICY continue | fail-fast

Examples:
  magdecl -i points.txt -o report.txt
  magdecl --no-header < points.txt
`;

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    version: false,
    header: true,
    verbose: false,
    overrides: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    let value: string | undefined;
    if (VALUE_FLAGS.has(arg)) {
      value = args[i + 1];
      if (value === undefined) {
        throw new ConfigError(arg, `Missing value for ${arg}`);
      }
      i++;
    }

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--version':
        options.version = true;
        break;
      case '--no-header':
        options.header = false;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--fail-fast':
        options.overrides.failurePolicy = 'fail-fast';
        break;
      case '-i':
      case '--infile':
        options.infile = value;
        break;
      case '-o':
      case '--outfile':
        options.outfile = value;
        break;
      case '--env':
        options.envFile = value;
        break;
      case '--endpoint':
        options.overrides.endpoint = value;
        break;
      case '--timeout':
        options.overrides.timeoutMs = parsePositiveInt(arg, value ?? '');
        break;
      case '--retries':
        options.overrides.maxAttempts = parsePositiveInt(arg, value ?? '');
        break;
      default:
        throw new ConfigError(arg, `Unknown option: ${arg}`);
    }
  }

  return options;
}
