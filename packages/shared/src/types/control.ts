import type { RouterStatusEntry } from './report.js';

export interface ControlEndpoint {
  host: string;
  port: number;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
}

/**
 * The query surface the collector needs from a Tor control connection.
 */
export interface ControlSession {
  authenticate(password?: string): Promise<void>;
  getInfo(key: string, defaultValue?: string): Promise<string>;
  getConf(key: string, defaultValue?: string): Promise<string>;
  getNetworkStatus(fingerprint: string): Promise<RouterStatusEntry>;
  close(): Promise<void>;
}

export type ControlConnector = (endpoint: ControlEndpoint) => Promise<ControlSession>;
