export type {
  RelayWatchConfig,
  ControlConfig,
  SmtpConfig,
  EmailConfig,
  RelayConfig,
  ThresholdsConfig,
} from './config.js';

export type { RelayReport, RouterStatusEntry, AccountingInfo } from './report.js';

export type { ControlEndpoint, ControlSession, ControlConnector } from './control.js';
