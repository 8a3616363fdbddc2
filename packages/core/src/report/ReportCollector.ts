import { hostname as osHostname } from 'node:os';
import {
  DEFAULT_ADDRESS,
  DEFAULT_OR_PORT,
  EXPECTED_FLAGS,
  FLAGS_UNAVAILABLE,
  RelayWatchError,
  countLines,
  errorMessage,
  formatDuration,
  getLogger,
  isFingerprintValid,
} from '@relaywatch/shared';
import type {
  ControlConfig,
  ControlConnector,
  ControlSession,
  RelayReport,
  ThresholdsConfig,
} from '@relaywatch/shared';
import { ControlClient } from '../control/ControlClient.js';
import { ReportBuilder } from './ReportBuilder.js';

export const CONNECTION_FAILED_PREFIX = 'Failed to connect to Tor control port';

export interface ReportCollectorOptions {
  control: ControlConfig;
  /** Reported when the relay has no Nickname configured. */
  nickname: string;
  thresholds: ThresholdsConfig;
  connect?: ControlConnector;
  now?: () => Date;
  hostname?: () => string;
}

/**
 * Connection-count alert, if the count is under either threshold. The
 * critical tier wins; at most one message is produced.
 */
export function checkConnections(count: number, thresholds: ThresholdsConfig): string | undefined {
  if (count < thresholds.minConnectionsCrit) {
    return `⚠️  CRITICAL: Only ${count} connections (threshold: ${thresholds.minConnectionsCrit})`;
  }
  if (count < thresholds.minConnectionsWarn) {
    return `⚠️  WARNING: Only ${count} connections (threshold: ${thresholds.minConnectionsWarn})`;
  }
  return undefined;
}

/**
 * Expected consensus flags absent from `flags`, sorted.
 */
export function missingFlags(flags: readonly string[]): string[] {
  const present = new Set(flags);
  return EXPECTED_FLAGS.filter((flag) => !present.has(flag)).sort();
}

function toInteger(value: string, key: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new RelayWatchError(`Unexpected ${key} value: "${value}"`, 'INVALID_CONTROL_VALUE');
  }
  return parsed;
}

export class ReportCollector {
  private readonly connect: ControlConnector;
  private readonly now: () => Date;
  private readonly hostname: () => string;

  constructor(private readonly options: ReportCollectorOptions) {
    this.connect = options.connect ?? ((endpoint) => ControlClient.connect(endpoint));
    this.now = options.now ?? (() => new Date());
    this.hostname = options.hostname ?? osHostname;
  }

  /**
   * Gather a report from the control port. Never rejects: failures are
   * recorded in the report's error list.
   */
  async collect(): Promise<RelayReport> {
    const builder = new ReportBuilder(this.now(), this.hostname());
    const { host, port, password } = this.options.control;
    const logger = getLogger();

    let session: ControlSession;
    try {
      session = await this.connect({ host, port });
    } catch (err) {
      logger.error({ err, host, port }, 'Could not connect to control port');
      builder.error(`${CONNECTION_FAILED_PREFIX}: ${errorMessage(err)}`).markConnectionFailed();
      return builder.build();
    }

    try {
      await session.authenticate(password);
      logger.debug({ host, port, method: password ? 'password' : 'cookie' }, 'Authenticated');
    } catch (err) {
      logger.error({ err, host, port }, 'Control port authentication failed');
      builder.error(`${CONNECTION_FAILED_PREFIX}: ${errorMessage(err)}`).markConnectionFailed();
      await this.close(session);
      return builder.build();
    }

    try {
      await this.collectStatus(session, builder);
    } catch (err) {
      logger.error({ err }, 'Report collection aborted');
      builder.error(`Report collection aborted: ${errorMessage(err)}`);
    } finally {
      await this.close(session);
    }

    return builder.build();
  }

  private async collectStatus(session: ControlSession, builder: ReportBuilder): Promise<void> {
    const version = await this.query(builder, 'version', async () => {
      const [first] = (await session.getInfo('version')).trim().split(/\s+/);
      return first;
    });
    if (version) builder.set('version', version);

    const uptime = await this.query(builder, 'uptime', async () =>
      toInteger(await session.getInfo('uptime'), 'uptime'),
    );
    if (uptime !== undefined) {
      builder.set('uptimeSeconds', uptime);
      builder.set('uptimeHuman', formatDuration(uptime));
    }

    const bytesRead = await this.query(builder, 'traffic read', async () =>
      toInteger(await session.getInfo('traffic/read'), 'traffic/read'),
    );
    if (bytesRead !== undefined) builder.set('bytesRead', bytesRead);

    const bytesWritten = await this.query(builder, 'traffic written', async () =>
      toInteger(await session.getInfo('traffic/written'), 'traffic/written'),
    );
    if (bytesWritten !== undefined) builder.set('bytesWritten', bytesWritten);

    const fingerprint = await this.query(builder, 'fingerprint', async () =>
      (await session.getInfo('fingerprint')).trim(),
    );
    if (fingerprint) builder.set('fingerprint', fingerprint);

    const nickname = await this.query(builder, 'nickname', () =>
      session.getConf('Nickname', this.options.nickname),
    );
    if (nickname) builder.set('nickname', nickname);

    const address = await this.query(builder, 'address', () =>
      session.getInfo('address', DEFAULT_ADDRESS),
    );
    if (address) builder.set('address', address);

    const orPort = await this.query(builder, 'OR port', () =>
      session.getConf('ORPort', DEFAULT_OR_PORT),
    );
    if (orPort) builder.set('orPort', orPort);

    const circuits = await this.query(builder, 'circuit status', async () =>
      (await session.getInfo('status/circuit-established')) === '1',
    );
    if (circuits !== undefined) builder.set('circuitsEstablished', circuits);

    const connectionCount = await this.query(builder, 'connection count', async () =>
      countLines(await session.getInfo('orconn-status', '')),
    );
    if (connectionCount !== undefined) {
      builder.set('connectionCount', connectionCount);
      const alert = checkConnections(connectionCount, this.options.thresholds);
      if (alert) builder.warn(alert);
    }

    await this.collectConsensus(session, builder, fingerprint);
    await this.collectAccounting(session, builder);
  }

  private async collectConsensus(
    session: ControlSession,
    builder: ReportBuilder,
    fingerprint: string | undefined,
  ): Promise<void> {
    try {
      if (!isFingerprintValid(fingerprint)) {
        throw new RelayWatchError(
          fingerprint ? `invalid relay fingerprint "${fingerprint}"` : 'relay fingerprint unavailable',
          'FINGERPRINT_UNAVAILABLE',
        );
      }
      const entry = await session.getNetworkStatus(fingerprint);
      builder.set('consensus', entry);
      builder.set('flags', [...entry.flags]);
    } catch (err) {
      getLogger().warn({ err }, 'Consensus entry unavailable');
      builder.set('flags', [FLAGS_UNAVAILABLE]);
      builder.error(`Could not get network status: ${errorMessage(err)}`);
      return;
    }

    const missing = missingFlags(builder.get('flags') ?? []);
    if (missing.length > 0) {
      builder.warn(`⚠️  Missing expected flags: ${missing.join(', ')}`);
    }
  }

  /**
   * Accounting is optional on the relay; any failure here leaves no trace in the report.
   */
  private async collectAccounting(session: ControlSession, builder: ReportBuilder): Promise<void> {
    try {
      const enabled = await session.getInfo('accounting/enabled', '0');
      if (enabled !== '1') return;

      const bytesLeft = await session.getInfo('accounting/bytes-left');
      const intervalEnd = await session.getInfo('accounting/interval-end');
      builder.set('accounting', { bytesLeft, intervalEnd });
    } catch (err) {
      getLogger().debug({ err }, 'Accounting information unavailable');
    }
  }

  private async query<T>(
    builder: ReportBuilder,
    label: string,
    fetch: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fetch();
    } catch (err) {
      getLogger().warn({ err, field: label }, 'Control port query failed');
      builder.error(`Could not get ${label}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async close(session: ControlSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      getLogger().debug({ err }, 'Error closing control session');
    }
  }
}
