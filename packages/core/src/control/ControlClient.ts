import { createConnection, type Socket } from 'node:net';
import { readFile } from 'node:fs/promises';
import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import {
  DEFAULT_CONTROL_TIMEOUT,
  ControlAuthenticationError,
  ControlConnectionError,
  ControlReplyError,
  ControlTimeoutError,
  errorMessage,
  getLogger,
} from '@relaywatch/shared';
import type { ControlEndpoint, ControlSession, RouterStatusEntry } from '@relaywatch/shared';
import {
  ReplyParser,
  assertOk,
  formatCommand,
  isAsyncEvent,
  parseAuthChallenge,
  parseConfValue,
  parseInfoValue,
  parseProtocolInfo,
  parseRouterStatus,
  quoteString,
  STATUS_OK,
  type ControlReply,
} from './protocol.js';

const SAFECOOKIE_SERVER_KEY = 'Tor safe cookie authentication server-to-controller hash';
const SAFECOOKIE_CLIENT_KEY = 'Tor safe cookie authentication controller-to-server hash';
const COOKIE_LENGTH = 32;

interface PendingRequest {
  resolve: (reply: ControlReply) => void;
  reject: (reason: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Tor control port connection. Replies come back in the order commands were
 * sent, so pending requests are matched first-in first-out.
 */
export class ControlClient implements ControlSession {
  private socket: Socket | null = null;
  private pending: PendingRequest[] = [];
  private parser = new ReplyParser();
  private buffer: string = '';
  private readonly timeout: number;

  private constructor(private readonly endpoint: ControlEndpoint) {
    this.timeout = endpoint.timeout ?? DEFAULT_CONTROL_TIMEOUT;
  }

  static async connect(endpoint: ControlEndpoint): Promise<ControlClient> {
    const client = new ControlClient(endpoint);
    await client.open();
    return client;
  }

  private open(): Promise<void> {
    const { host, port } = this.endpoint;

    return new Promise((resolve, reject) => {
      let settled = false;

      const socket = createConnection({ host, port }, () => {
        settled = true;
        resolve();
      });
      this.socket = socket;

      socket.setEncoding('utf8');

      socket.on('data', (data: string) => {
        this.handleData(data);
      });

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          reject(new ControlConnectionError(`${host}:${port}: ${err.message}`));
        } else {
          this.rejectAll(new ControlConnectionError(err.message));
        }
      });

      socket.on('close', () => {
        this.rejectAll(new ControlConnectionError('Connection closed'));
        this.socket = null;
      });
    });
  }

  async authenticate(password?: string): Promise<void> {
    try {
      if (password !== undefined) {
        assertOk(await this.send(formatCommand('AUTHENTICATE', quoteString(password))));
        return;
      }

      const info = parseProtocolInfo(assertOk(await this.send(formatCommand('PROTOCOLINFO', '1'))));
      const methods = info.authMethods;

      if (methods.includes('NULL')) {
        assertOk(await this.send(formatCommand('AUTHENTICATE')));
      } else if (methods.includes('SAFECOOKIE') && info.cookieFile) {
        await this.authenticateSafeCookie(await readCookie(info.cookieFile));
      } else if (methods.includes('COOKIE') && info.cookieFile) {
        const cookie = await readCookie(info.cookieFile);
        assertOk(await this.send(formatCommand('AUTHENTICATE', cookie.toString('hex'))));
      } else if (methods.includes('HASHEDPASSWORD')) {
        throw new ControlAuthenticationError(
          'Control port requires a password but none is configured',
        );
      } else {
        throw new ControlAuthenticationError(
          `No supported authentication method (offered: ${methods.join(', ') || 'none'})`,
        );
      }
    } catch (err) {
      if (err instanceof ControlAuthenticationError) throw err;
      throw new ControlAuthenticationError(`Authentication failed: ${errorMessage(err)}`);
    }
  }

  private async authenticateSafeCookie(cookie: Buffer): Promise<void> {
    const clientNonce = randomBytes(32);
    const challenge = parseAuthChallenge(
      assertOk(
        await this.send(formatCommand('AUTHCHALLENGE', 'SAFECOOKIE', clientNonce.toString('hex'))),
      ),
    );

    const serverNonce = Buffer.from(challenge.serverNonce, 'hex');
    const message = Buffer.concat([cookie, clientNonce, serverNonce]);

    const expected = createHmac('sha256', SAFECOOKIE_SERVER_KEY).update(message).digest();
    const received = Buffer.from(challenge.serverHash, 'hex');
    if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
      throw new ControlAuthenticationError('Tor sent an invalid SAFECOOKIE server hash');
    }

    const clientHash = createHmac('sha256', SAFECOOKIE_CLIENT_KEY).update(message).digest('hex');
    assertOk(await this.send(formatCommand('AUTHENTICATE', clientHash)));
  }

  async getInfo(key: string, defaultValue?: string): Promise<string> {
    try {
      const reply = assertOk(await this.send(formatCommand('GETINFO', key)));
      return parseInfoValue(reply, key);
    } catch (err) {
      if (defaultValue !== undefined) return defaultValue;
      throw err;
    }
  }

  async getConf(key: string, defaultValue?: string): Promise<string> {
    let value: string | undefined;
    try {
      value = parseConfValue(assertOk(await this.send(formatCommand('GETCONF', key))), key);
    } catch (err) {
      if (defaultValue !== undefined) return defaultValue;
      throw err;
    }
    if (value !== undefined) return value;
    if (defaultValue !== undefined) return defaultValue;
    throw new ControlReplyError(STATUS_OK, `Configuration option "${key}" is not set`);
  }

  async getNetworkStatus(fingerprint: string): Promise<RouterStatusEntry> {
    const body = await this.getInfo(`ns/id/${fingerprint}`);
    return parseRouterStatus(body);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;

    if (!socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.once('close', () => resolve());
        socket.end(formatCommand('QUIT'), () => resolve());
      });
      socket.destroy();
    }
  }

  private send(command: string): Promise<ControlReply> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new ControlConnectionError('Not connected to the control port'));
    }

    const label = command.trim().split(' ')[0];

    return new Promise((resolve, reject) => {
      // A late reply would be matched to the wrong request, so a timeout ends the session.
      const timer = setTimeout(() => {
        this.rejectAll(new ControlTimeoutError(label));
        socket.destroy();
      }, this.timeout);

      this.pending.push({ resolve, reject, timer });
      socket.write(command);
    });
  }

  private handleData(data: string): void {
    this.buffer += data;

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const rawLine of lines) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

      let reply: ControlReply | null;
      try {
        reply = this.parser.push(line);
      } catch (err) {
        // Later lines can no longer be paired with their requests, so the session ends here.
        const reason = err instanceof Error ? err : new Error(String(err));
        this.buffer = '';
        this.rejectAll(reason);
        this.socket?.destroy();
        return;
      }

      if (!reply) continue;
      if (isAsyncEvent(reply)) {
        getLogger().debug({ status: reply.status }, 'Ignoring asynchronous control port event');
        continue;
      }
      const complete = reply;
      this.settleNext((p) => p.resolve(complete));
    }
  }

  private settleNext(settle: (pending: PendingRequest) => void): void {
    const next = this.pending.shift();
    if (!next) return;
    clearTimeout(next.timer);
    settle(next);
  }

  private rejectAll(reason: Error): void {
    const pending = this.pending;
    this.pending = [];
    for (const request of pending) {
      clearTimeout(request.timer);
      request.reject(reason);
    }
  }
}

async function readCookie(path: string): Promise<Buffer> {
  const cookie = await readFile(path);
  if (cookie.length !== COOKIE_LENGTH) {
    throw new ControlAuthenticationError(
      `Authentication cookie ${path} is ${cookie.length} bytes, expected ${COOKIE_LENGTH}`,
    );
  }
  return cookie;
}
