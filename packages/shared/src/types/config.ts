import type { LogLevel } from '../utils/logger.js';

export interface RelayWatchConfig {
  control: ControlConfig;
  smtp?: SmtpConfig;
  email?: EmailConfig;
  relay: RelayConfig;
  thresholds: ThresholdsConfig;
  logLevel: LogLevel;
}

export interface ControlConfig {
  host: string;
  port: number;
  /** Cookie authentication is used when unset. */
  password?: string;
}

export interface SmtpConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  /** STARTTLS upgrade when true, implicit TLS when false. */
  starttls: boolean;
}

export interface EmailConfig {
  from: string;
  to: string;
}

export interface RelayConfig {
  /** Used when the relay does not report its own Nickname. */
  nickname: string;
}

export interface ThresholdsConfig {
  minConnectionsWarn: number;
  minConnectionsCrit: number;
}
