import { homedir } from 'node:os';
import { join } from 'node:path';

export const RELAYWATCH_VERSION = '1.0.0';

export const RELAYWATCH_HOME = process.env.RELAYWATCH_HOME || join(homedir(), '.relaywatch');
export const RELAYWATCH_CONFIG_FILE = 'relaywatch.config.json';

export const DEFAULT_CONTROL_HOST = '127.0.0.1';
export const DEFAULT_CONTROL_PORT = 9051;
export const DEFAULT_CONTROL_TIMEOUT = 10_000;

export const DEFAULT_SMTP_PORT = 587;
export const DEFAULT_RELAY_NICKNAME = 'Unnamed';

export const DEFAULT_MIN_CONNECTIONS_WARN = 100;
export const DEFAULT_MIN_CONNECTIONS_CRIT = 50;

export const DEFAULT_ADDRESS = 'unknown';
export const DEFAULT_OR_PORT = '9001';

export const EXPECTED_FLAGS = ['Running', 'Valid'] as const;
export const FLAGS_UNAVAILABLE = '(unable to retrieve)';

export const RELAY_SEARCH_URL = 'https://metrics.torproject.org/rs.html#details/';
