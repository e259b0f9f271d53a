#!/usr/bin/env node

import { createReport } from './index.js';
import { USAGE, parseCliArgs } from './cli-options.js';
import { VERSION } from './config/constants.js';
import { loadEnv, resolveConfig } from './config/env.js';
import { DeclinationError } from './errors/index.js';
import { readInputFile, readStreamLines, writeOutput } from './io/lines.js';
import { createLogger } from './utils/logger.js';

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    process.exit(0);
  }

  if (options.version) {
    console.log(VERSION);
    process.exit(0);
  }

  const logger = createLogger('magdecl', false, options.verbose);

  const envResult = loadEnv({ envFile: options.envFile });
  if (envResult.loaded) {
    logger.debug(`Loaded ${envResult.count} env vars from: ${envResult.files.join(', ')}`);
  }

  // Validate before touching input or the network
  const config = resolveConfig(process.env, options.overrides);
  logger.debug(`Calculator: ${config.endpoint} (policy: ${config.failurePolicy})`);

  const lines = options.infile ? await readInputFile(options.infile) : readStreamLines();

  const document = await createReport(lines, {
    config,
    header: options.header,
    logger,
    callbacks: {
      onRunComplete: (event) => {
        logger.debug(
          `Done in ${event.duration}ms: ${event.completed} ok, ` +
            `${event.failed} failed, ${event.malformed} malformed`
        );
      },
    },
  });

  await writeOutput(document, options.outfile);
}

main().catch((error: unknown) => {
  if (error instanceof DeclinationError) {
    console.error(error.format());
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
});
