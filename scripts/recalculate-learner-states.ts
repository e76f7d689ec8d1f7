/**
 * Rebuilds learner states from the submissions log.
 *
 * Usage: npm run recalculate -- <userId> [<userId> ...]
 */

import { buildLearnerStateEngine } from '../src/app/build-learner-state-engine.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'recalculate-learner-states',
    pretty: config.logger.pretty,
  });

  const userIds = process.argv.slice(2).filter((arg) => arg.trim() !== '');
  if (userIds.length === 0) {
    logger.error('Usage: recalculate-learner-states <userId> [<userId> ...]');
    return 1;
  }

  const built = await buildLearnerStateEngine(config, logger);
  if (built.isErr()) {
    return 1;
  }

  const { engine, close } = built.value;
  let failures = 0;

  try {
    for (const userId of userIds) {
      const result = await engine.recalculate(userId);
      if (result.isErr()) {
        failures += 1;
        logger.error({ userId, error: result.error }, 'Recalculation failed');
      }
    }
  } finally {
    await close();
  }

  logger.info({ users: userIds.length, failures }, 'Recalculation finished');
  return failures === 0 ? 0 : 1;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
