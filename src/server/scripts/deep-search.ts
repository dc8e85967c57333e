#!/usr/bin/env node
/**
 * DeepSearch CLI
 *
 * Searches the web for a query, analyzes the fetched pages and prints the insights.
 *
 * Usage:
 *   npm run search -- "artificial intelligence ethics"
 *   npm run search -- "artificial intelligence ethics" --max-fetch 3 --save out.json
 *
 * Exit codes: 0 when a Result was produced, 1 on invalid arguments or when the
 * search provider is unavailable.
 */

import { writeFile } from 'fs/promises';
import { createInterface } from 'readline/promises';
import { deepSearch } from '../services/orchestration/deepSearch.js';
import { toResultJson } from '../services/export/ResultSerializer.js';
import { formatTextReport } from '../services/export/TextReport.js';
import { parseDeepSearchArgs, USAGE, type DeepSearchCliOptions } from './deepSearchArgs.js';
import { logger } from '../utils/logger.js';
import { InvalidSearchOptionsError, errorMessage } from '../types/errors.js';

async function promptForQuery(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question('Enter search query: ')).trim();
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  let options: DeepSearchCliOptions;
  try {
    options = parseDeepSearchArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const query = options.query ?? (await promptForQuery());
  if (!query) {
    console.error('No query provided. Exiting.');
    return 0;
  }

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted; finishing in-flight fetches');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await deepSearch(query, {
      maxResults: options.maxResults,
      maxFetch: options.maxFetch,
      delay: options.delay,
      signal: controller.signal,
    });
    const json = toResultJson(result);

    console.log(options.json ? JSON.stringify(json, null, 2) : formatTextReport(result));

    if (options.save) {
      await writeFile(options.save, `${JSON.stringify(json, null, 2)}\n`, 'utf8');
      console.error(`Saved JSON to ${options.save}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof InvalidSearchOptionsError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error({ error: errorMessage(error) }, 'Deep search failed');
      console.error(`Error: ${errorMessage(error)}`);
    }
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Deep search script failed');
    process.exit(1);
  });
