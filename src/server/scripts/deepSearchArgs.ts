import { InvalidSearchOptionsError } from '../types/errors.js';

export interface DeepSearchCliOptions {
  query?: string;
  maxResults?: number;
  maxFetch?: number;
  delay?: number;
  save?: string;
  json?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: deep-search <query> [options]

Options:
  --max-results N   Maximum search hits (default 15)
  --max-fetch N     Maximum pages to fetch (default 5)
  --delay S         Minimum seconds between requests to one host (default 1.0)
  --save FILE       Save the JSON result to FILE
  --json            Print the JSON result instead of the text report
  -h, --help        Show this help`;

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    throw new InvalidSearchOptionsError(`${flag} expects an integer, got ${value ?? 'nothing'}`);
  }
  return parseInt(value, 10);
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidSearchOptionsError(`${flag} expects a number, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

/**
 * Parse command line arguments. Positional words are joined into the query.
 *
 * @throws InvalidSearchOptionsError on unknown flags or malformed values
 */
export function parseDeepSearchArgs(args: readonly string[]): DeepSearchCliOptions {
  const options: DeepSearchCliOptions = {};
  const queryParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--max-results') {
      options.maxResults = parseInteger(arg, args[++i]);
    } else if (arg === '--max-fetch') {
      options.maxFetch = parseInteger(arg, args[++i]);
    } else if (arg === '--delay') {
      options.delay = parseNumber(arg, args[++i]);
    } else if (arg === '--save') {
      const file = args[++i];
      if (!file) {
        throw new InvalidSearchOptionsError('--save expects a file path');
      }
      options.save = file;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw new InvalidSearchOptionsError(`Unknown option ${arg}`);
    } else {
      queryParts.push(arg);
    }
  }

  const query = queryParts.join(' ').trim();
  if (query) {
    options.query = query;
  }
  return options;
}
