export {
  createLoggerOptions,
  developmentTarget,
  productionTarget,
  REDACTED_LOG_PATHS,
} from './options';
