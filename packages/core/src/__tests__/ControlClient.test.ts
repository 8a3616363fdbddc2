import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { createHmac } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import {
  ControlAuthenticationError,
  ControlConnectionError,
  ControlTimeoutError,
  createLogger,
  setDefaultLogger,
} from '@relaywatch/shared';
import { ControlClient } from '../control/ControlClient.js';

// --- Mock setup ---

type Responder = (command: string) => string | undefined;

class MockSocket extends EventEmitter {
  destroyed = false;
  written: string[] = [];
  respond: Responder = () => undefined;

  setEncoding(): this {
    return this;
  }

  write(data: string): boolean {
    this.written.push(data);
    const answer = this.respond(data);
    if (answer !== undefined) {
      process.nextTick(() => this.emit('data', answer));
    }
    return true;
  }

  end(data: string, callback: () => void): this {
    this.written.push(data);
    process.nextTick(callback);
    return this;
  }

  destroy(): this {
    if (!this.destroyed) {
      this.destroyed = true;
      process.nextTick(() => this.emit('close'));
    }
    return this;
  }
}

const net = vi.hoisted(() => {
  const state: { socket: unknown; connectError: Error | null } = { socket: null, connectError: null };
  return state;
});

vi.mock('node:net', () => ({
  createConnection: vi.fn((_options: { host: string; port: number }, callback: () => void) => {
    const socket = new MockSocket();
    net.socket = socket;
    const failure = net.connectError;
    process.nextTick(() => (failure ? socket.emit('error', failure) : callback()));
    return socket;
  }),
}));

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

function currentSocket(): MockSocket {
  if (!(net.socket instanceof MockSocket)) throw new Error('No socket was opened');
  return net.socket;
}

async function connect(respond: Responder, timeout?: number): Promise<ControlClient> {
  const client = await ControlClient.connect({ host: '127.0.0.1', port: 9051, timeout });
  currentSocket().respond = respond;
  return client;
}

function table(replies: Record<string, string>): Responder {
  return (command) => replies[command];
}

const COOKIE = Buffer.alloc(32, 0xab);
const SERVER_NONCE = 'cd'.repeat(32);
const SERVER_KEY = 'Tor safe cookie authentication server-to-controller hash';
const CLIENT_KEY = 'Tor safe cookie authentication controller-to-server hash';

function safeCookieHash(key: string, clientNonce: string): string {
  return createHmac('sha256', key)
    .update(Buffer.concat([COOKIE, Buffer.from(clientNonce, 'hex'), Buffer.from(SERVER_NONCE, 'hex')]))
    .digest('hex');
}

// --- Tests ---

describe('ControlClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    net.socket = null;
    net.connectError = null;
    setDefaultLogger(createLogger({ level: 'fatal' }));
  });

  describe('connect', () => {
    it('should resolve once the socket connects', async () => {
      await connect(() => undefined);
      expect(currentSocket().destroyed).toBe(false);
    });

    it('should reject with the endpoint when the connection is refused', async () => {
      net.connectError = new Error('connect ECONNREFUSED 127.0.0.1:9051');
      const attempt = ControlClient.connect({ host: '127.0.0.1', port: 9051 });
      await expect(attempt).rejects.toBeInstanceOf(ControlConnectionError);
      await expect(attempt).rejects.toThrow('127.0.0.1:9051: connect ECONNREFUSED 127.0.0.1:9051');
    });
  });

  describe('getInfo', () => {
    it('should return the value of a single-line reply', async () => {
      const client = await connect(table({ 'GETINFO version\r\n': '250-version=0.4.8.10\r\n250 OK\r\n' }));
      await expect(client.getInfo('version')).resolves.toBe('0.4.8.10');
      expect(currentSocket().written).toEqual(['GETINFO version\r\n']);
    });

    it('should reassemble a reply split across chunks', async () => {
      const client = await connect(() => undefined);
      const pending = client.getInfo('uptime');
      const socket = currentSocket();
      socket.emit('data', '250-upti');
      socket.emit('data', 'me=3661\r\n250 O');
      socket.emit('data', 'K\r\n');
      await expect(pending).resolves.toBe('3661');
    });

    it('should skip asynchronous events', async () => {
      const client = await connect(
        table({ 'GETINFO version\r\n': '650 BW 10 20\r\n250-version=0.4.8.10\r\n250 OK\r\n' }),
      );
      await expect(client.getInfo('version')).resolves.toBe('0.4.8.10');
    });

    it('should match replies to requests in order', async () => {
      const client = await connect(
        table({
          'GETINFO uptime\r\n': '250-uptime=60\r\n250 OK\r\n',
          'GETINFO traffic/read\r\n': '250-traffic/read=2048\r\n250 OK\r\n',
        }),
      );
      const [uptime, read] = await Promise.all([
        client.getInfo('uptime'),
        client.getInfo('traffic/read'),
      ]);
      expect(uptime).toBe('60');
      expect(read).toBe('2048');
    });

    it('should return the default when the key is rejected', async () => {
      const client = await connect(() => '552 Unrecognized key "address"\r\n');
      await expect(client.getInfo('address', 'unknown')).resolves.toBe('unknown');
    });

    it('should throw the reply error when there is no default', async () => {
      const client = await connect(() => '552 Unrecognized key "address"\r\n');
      await expect(client.getInfo('address')).rejects.toThrow('552 Unrecognized key "address"');
    });

    it('should time out and end the session when no reply arrives', async () => {
      const client = await connect(() => undefined, 20);
      const pending = client.getInfo('version');
      await expect(pending).rejects.toBeInstanceOf(ControlTimeoutError);
      await expect(pending).rejects.toThrow('Control port request timed out: GETINFO');
      expect(currentSocket().destroyed).toBe(true);
    });

    it('should fail every pending request and end the session on a malformed line', async () => {
      const client = await connect(() => undefined);
      const uptime = client.getInfo('uptime');
      const read = client.getInfo('traffic/read');

      currentSocket().emit(
        'data',
        '250-uptime=1\r\ngarbage\r\n250 OK\r\n250-traffic/read=42\r\n250 OK\r\n',
      );

      await Promise.all([
        expect(uptime).rejects.toThrow('0 Malformed reply line: garbage'),
        expect(read).rejects.toThrow('0 Malformed reply line: garbage'),
      ]);
      expect(currentSocket().destroyed).toBe(true);
      await expect(client.getInfo('version')).rejects.toThrow('Not connected to the control port');
    });

    it('should reject pending requests when the connection closes', async () => {
      const client = await connect(() => undefined);
      const pending = client.getInfo('version');
      currentSocket().emit('close');
      await expect(pending).rejects.toThrow('Connection closed');
    });
  });

  describe('getConf', () => {
    it('should return a configured value', async () => {
      const client = await connect(table({ 'GETCONF Nickname\r\n': '250 Nickname=MyRelay\r\n' }));
      await expect(client.getConf('Nickname', 'Unnamed')).resolves.toBe('MyRelay');
    });

    it('should return the default for an unset option', async () => {
      const client = await connect(table({ 'GETCONF ORPort\r\n': '250 ORPort\r\n' }));
      await expect(client.getConf('ORPort', '9001')).resolves.toBe('9001');
    });

    it('should throw for an unset option without a default', async () => {
      const client = await connect(table({ 'GETCONF ORPort\r\n': '250 ORPort\r\n' }));
      await expect(client.getConf('ORPort')).rejects.toThrow('Configuration option "ORPort" is not set');
    });
  });

  describe('getNetworkStatus', () => {
    it('should parse the router status entry for a fingerprint', async () => {
      const fingerprint = '000102030405060708090A0B0C0D0E0F10111213';
      const client = await connect(
        table({
          [`GETINFO ns/id/${fingerprint}\r\n`]: [
            `250+ns/id/${fingerprint}=`,
            'r MyRelay AAECAwQFBgcICQoLDA0ODxAREhM 2025-01-15 07:00:00 198.51.100.7 9001 0',
            's Fast Running Stable Valid',
            'w Bandwidth=5000',
            '.',
            '250 OK',
            '',
          ].join('\r\n'),
        }),
      );
      const entry = await client.getNetworkStatus(fingerprint);
      expect(entry.fingerprint).toBe(fingerprint);
      expect(entry.flags).toEqual(['Fast', 'Running', 'Stable', 'Valid']);
      expect(entry.bandwidth).toBe(5000);
    });
  });

  describe('authenticate', () => {
    it('should send a quoted password', async () => {
      const client = await connect(table({ 'AUTHENTICATE "test-secret"\r\n': '250 OK\r\n' }));
      await client.authenticate('test-secret');
      expect(currentSocket().written).toEqual(['AUTHENTICATE "test-secret"\r\n']);
    });

    it('should keep a password with line breaks inside one command', async () => {
      const client = await connect(() => '250 OK\r\n');
      await client.authenticate('pw\r\nSIGNAL HALT');
      expect(currentSocket().written).toEqual(['AUTHENTICATE "pw\\r\\nSIGNAL HALT"\r\n']);
    });

    it('should wrap a rejected password', async () => {
      const client = await connect(() => '515 Bad authentication\r\n');
      const attempt = client.authenticate('test-secret');
      await expect(attempt).rejects.toBeInstanceOf(ControlAuthenticationError);
      await expect(attempt).rejects.toThrow('Authentication failed: 515 Bad authentication');
    });

    it('should authenticate without credentials when NULL is offered', async () => {
      const client = await connect(
        table({
          'PROTOCOLINFO 1\r\n':
            '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=NULL\r\n250-VERSION Tor="0.4.8.10"\r\n250 OK\r\n',
          'AUTHENTICATE\r\n': '250 OK\r\n',
        }),
      );
      await client.authenticate();
      expect(currentSocket().written).toEqual(['PROTOCOLINFO 1\r\n', 'AUTHENTICATE\r\n']);
    });

    it('should send the cookie as hex for COOKIE authentication', async () => {
      vi.mocked(readFile).mockResolvedValue(COOKIE);
      const client = await connect(
        table({
          'PROTOCOLINFO 1\r\n':
            '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=COOKIE COOKIEFILE="/run/tor/control.authcookie"\r\n250 OK\r\n',
          [`AUTHENTICATE ${'ab'.repeat(32)}\r\n`]: '250 OK\r\n',
        }),
      );
      await client.authenticate();
      expect(readFile).toHaveBeenCalledWith('/run/tor/control.authcookie');
      expect(currentSocket().written[1]).toBe(`AUTHENTICATE ${'ab'.repeat(32)}\r\n`);
    });

    it('should complete the SAFECOOKIE handshake', async () => {
      vi.mocked(readFile).mockResolvedValue(COOKIE);
      let expectedClientHash = '';
      const client = await connect((command) => {
        if (command === 'PROTOCOLINFO 1\r\n') {
          return '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=COOKIE,SAFECOOKIE COOKIEFILE="/run/tor/control.authcookie"\r\n250 OK\r\n';
        }
        const challenge = /^AUTHCHALLENGE SAFECOOKIE ([0-9a-f]+)\r\n$/.exec(command);
        if (challenge) {
          expectedClientHash = safeCookieHash(CLIENT_KEY, challenge[1]);
          const serverHash = safeCookieHash(SERVER_KEY, challenge[1]);
          return `250 AUTHCHALLENGE SERVERHASH=${serverHash} SERVERNONCE=${SERVER_NONCE}\r\n`;
        }
        if (command === `AUTHENTICATE ${expectedClientHash}\r\n`) return '250 OK\r\n';
        return '515 Bad authentication\r\n';
      });

      await client.authenticate();
      expect(currentSocket().written).toHaveLength(3);
      expect(currentSocket().written[2]).toBe(`AUTHENTICATE ${expectedClientHash}\r\n`);
    });

    it('should reject a server hash that does not match the cookie', async () => {
      vi.mocked(readFile).mockResolvedValue(COOKIE);
      const client = await connect((command) => {
        if (command === 'PROTOCOLINFO 1\r\n') {
          return '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=SAFECOOKIE COOKIEFILE="/run/tor/control.authcookie"\r\n250 OK\r\n';
        }
        return `250 AUTHCHALLENGE SERVERHASH=${'00'.repeat(32)} SERVERNONCE=${SERVER_NONCE}\r\n`;
      });
      await expect(client.authenticate()).rejects.toThrow('Tor sent an invalid SAFECOOKIE server hash');
    });

    it('should reject a cookie of the wrong length', async () => {
      vi.mocked(readFile).mockResolvedValue(Buffer.alloc(16));
      const client = await connect(
        table({
          'PROTOCOLINFO 1\r\n':
            '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=COOKIE COOKIEFILE="/run/tor/control.authcookie"\r\n250 OK\r\n',
        }),
      );
      await expect(client.authenticate()).rejects.toThrow(
        'Authentication cookie /run/tor/control.authcookie is 16 bytes, expected 32',
      );
    });

    it('should ask for a password when only HASHEDPASSWORD is offered', async () => {
      const client = await connect(
        table({ 'PROTOCOLINFO 1\r\n': '250-PROTOCOLINFO 1\r\n250-AUTH METHODS=HASHEDPASSWORD\r\n250 OK\r\n' }),
      );
      await expect(client.authenticate()).rejects.toThrow(
        'Control port requires a password but none is configured',
      );
    });
  });

  describe('close', () => {
    it('should send QUIT and destroy the socket', async () => {
      const client = await connect(() => undefined);
      const socket = currentSocket();
      await client.close();
      expect(socket.written).toEqual(['QUIT\r\n']);
      expect(socket.destroyed).toBe(true);
    });

    it('should be safe to call twice', async () => {
      const client = await connect(() => undefined);
      const socket = currentSocket();
      await client.close();
      await client.close();
      expect(socket.written).toEqual(['QUIT\r\n']);
    });

    it('should refuse commands after closing', async () => {
      const client = await connect(() => undefined);
      await client.close();
      await expect(client.getInfo('version')).rejects.toThrow('Not connected to the control port');
    });
  });
});
