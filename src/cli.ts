#!/usr/bin/env node
import { createCLI } from './cli/program.js';
import { createLogger } from './infrastructure/logging/logger.js';
import { AtomicFileSink } from './infrastructure/sinks/AtomicFileSink.js';

const logger = createLogger();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    for (const error of AtomicFileSink.discardAllSync()) {
      logger.warn({ err: error }, 'could not remove temporary file');
    }
    process.exit(signal === 'SIGINT' ? 130 : 143);
  });
}

const program = createCLI(
  { logger, stdout: (text) => process.stdout.write(text) },
  (code) => {
    process.exitCode = code;
  },
);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, 'unexpected failure');
  process.exitCode = 1;
});
