// Environment first: @strata/config reads process.env when it loads.
import './env-loader.js';

import { buildAppConfig } from '@strata/config';
import { describeError, logger } from '@strata/logger';
import { createStrata } from './app.js';
import { GracefulShutdown } from './shutdown.js';

/**
 * `strata <query...>` resolves each argument in its own session, queues the
 * best match and prints the stream it would play.
 */
async function main(queries: string[]): Promise<number> {
  const strata = createStrata(buildAppConfig());
  const shutdown = new GracefulShutdown();
  shutdown.add('strata', () => strata.stop());
  shutdown.install();
  strata.start();

  let failures = 0;
  try {
    for (const [index, query] of queries.entries()) {
      const session = strata.sessions.getOrCreate(`cli-${index + 1}`);
      try {
        const { item } = await session.request(query, 'cli');
        const next = await session.next();
        logger.info(
          { query, title: item.title, url: item.canonicalUrl, source: item.sourceKind, stream: next?.streamUrl ?? null },
          'Resolved',
        );
      } catch (error) {
        failures += 1;
        logger.error({ query, error: describeError(error) }, 'Resolution failed');
      }
    }
  } finally {
    shutdown.uninstall();
    await shutdown.shutdown('done');
  }
  return failures === 0 ? 0 : 1;
}

const queries = process.argv.slice(2);
if (queries.length === 0) {
  logger.error('Usage: strata <query> [query...]');
  process.exitCode = 2;
} else {
  main(queries).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error: describeError(error) }, 'Startup failed');
      process.exitCode = 1;
    },
  );
}
