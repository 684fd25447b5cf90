export {
  NormalizerConfigSchema,
  ConfigValidationError,
  loadConfig,
  isLogLevel,
  type NormalizerConfig,
} from './config.js'
