/**
 * Package entry point
 */

export * from './modules/learner-state/index.js';

export {
  buildLearnerStateEngine,
  makeLearnerStateEngine,
  type BuiltLearnerStateEngine,
  type LearnerStateEngine,
  type LearnerStateEngineDeps,
} from './app/build-learner-state-engine.js';

export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/index.js';
export { createLogger, createSilentLogger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
