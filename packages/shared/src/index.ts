// Types
export type {
  RelayWatchConfig,
  ControlConfig,
  SmtpConfig,
  EmailConfig,
  RelayConfig,
  ThresholdsConfig,
  RelayReport,
  RouterStatusEntry,
  AccountingInfo,
  ControlEndpoint,
  ControlSession,
  ControlConnector,
} from './types/index.js';

// Constants
export {
  RELAYWATCH_VERSION,
  RELAYWATCH_HOME,
  RELAYWATCH_CONFIG_FILE,
  DEFAULT_CONTROL_HOST,
  DEFAULT_CONTROL_PORT,
  DEFAULT_CONTROL_TIMEOUT,
  DEFAULT_SMTP_PORT,
  DEFAULT_RELAY_NICKNAME,
  DEFAULT_MIN_CONNECTIONS_WARN,
  DEFAULT_MIN_CONNECTIONS_CRIT,
  DEFAULT_ADDRESS,
  DEFAULT_OR_PORT,
  EXPECTED_FLAGS,
  FLAGS_UNAVAILABLE,
  RELAY_SEARCH_URL,
} from './constants.js';

// Schemas
export {
  relaywatchConfigSchema,
  controlConfigSchema,
  smtpConfigSchema,
  emailConfigSchema,
  relayConfigSchema,
  thresholdsSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type { ValidatedRelayWatchConfig } from './schemas/config.schema.js';

// Utilities
export { formatBytes, formatDuration, countLines } from './utils/parser.js';
export { isFingerprintValid } from './utils/fingerprint.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  RelayWatchError,
  ConfigValidationError,
  ControlConnectionError,
  ControlAuthenticationError,
  ControlTimeoutError,
  ControlReplyError,
  MailConfigurationError,
  ReportFieldAlreadySetError,
  errorMessage,
} from './utils/errors.js';
