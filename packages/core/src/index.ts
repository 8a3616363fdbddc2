// Control port
export { ControlClient } from './control/ControlClient.js';
export {
  ReplyParser,
  formatCommand,
  quoteString,
  unquoteString,
  assertOk,
  isAsyncEvent,
  parseInfoValue,
  parseConfValue,
  parseProtocolInfo,
  parseAuthChallenge,
  parseRouterStatus,
  identityToFingerprint,
} from './control/protocol.js';
export type {
  ControlReply,
  ReplyLine,
  ReplyDivider,
  ProtocolInfo,
  AuthChallenge,
} from './control/protocol.js';

// Report
export { ReportBuilder } from './report/ReportBuilder.js';
export type { ReportFields } from './report/ReportBuilder.js';
export {
  ReportCollector,
  checkConnections,
  missingFlags,
  CONNECTION_FAILED_PREFIX,
} from './report/ReportCollector.js';
export type { ReportCollectorOptions } from './report/ReportCollector.js';
export { formatReportText } from './report/ReportFormatter.js';

// Mail
export { ReportMailer } from './mail/ReportMailer.js';
export type { ReportMailerOptions } from './mail/ReportMailer.js';
export { buildSubject, STATUS_WARNING, STATUS_ERROR, STATUS_OK } from './mail/subject.js';

// Config
export { loadConfig, findConfigFile } from './config/loadConfig.js';
export type { LoadConfigOptions, LoadedConfig } from './config/loadConfig.js';

// Pipeline
export { runReport } from './runner.js';
export type {
  ReportOutcome,
  ReportStage,
  ReportSource,
  ReportSender,
  RunReportOptions,
} from './runner.js';
