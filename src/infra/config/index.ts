export {
  EnvSchema,
  DEFAULT_TOPIC_TAXONOMY_PATH,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
