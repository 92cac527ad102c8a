export {
  defineConfig,
  isDriverName,
  applyConnectionDefaults,
  validateConnectionConfig,
  validateDatabaseConfig,
} from './database-config';
export { configFromEnv } from './env';
