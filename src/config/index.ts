export * from './constants.js';
export {
  loadEnv,
  resolveConfig,
  parseFailurePolicy,
  parsePositiveInt,
  type DeclinationConfig,
  type Environment,
  type LoadEnvOptions,
  type LoadEnvResult,
} from './env.js';
