import { ControlReplyError } from '@relaywatch/shared';
import type { RouterStatusEntry } from '@relaywatch/shared';

export type ReplyDivider = '-' | ' ' | '+';

export interface ReplyLine {
  status: number;
  divider: ReplyDivider;
  content: string;
  /** Body of a `+` data line, dot-unescaped and joined with '\n'. */
  data?: string;
}

export interface ControlReply {
  /** Status code of the final line. */
  status: number;
  lines: ReplyLine[];
}

export interface ProtocolInfo {
  authMethods: string[];
  cookieFile?: string;
  torVersion?: string;
}

export interface AuthChallenge {
  serverHash: string;
  serverNonce: string;
}

export const STATUS_OK = 250;

const REPLY_LINE = /^(\d{3})([ +-])(.*)$/;

/**
 * Assembles CRLF-delimited control port lines into complete replies.
 */
export class ReplyParser {
  private lines: ReplyLine[] = [];
  private dataLine: ReplyLine | null = null;
  private dataBody: string[] = [];

  /**
   * Feed one line (without its line terminator). Returns a reply once its
   * final line has been seen.
   */
  push(raw: string): ControlReply | null {
    if (this.dataLine) {
      if (raw === '.') {
        this.lines.push({ ...this.dataLine, data: this.dataBody.join('\n') });
        this.dataLine = null;
        this.dataBody = [];
      } else {
        this.dataBody.push(raw.startsWith('.') ? raw.slice(1) : raw);
      }
      return null;
    }

    const match = REPLY_LINE.exec(raw);
    if (!match) {
      this.reset();
      throw new ControlReplyError(0, `Malformed reply line: ${raw}`);
    }

    const line: ReplyLine = {
      status: Number(match[1]),
      divider: toDivider(match[2]),
      content: match[3],
    };

    if (line.divider === '+') {
      this.dataLine = line;
      return null;
    }

    this.lines.push(line);
    if (line.divider === '-') return null;

    const reply: ControlReply = { status: line.status, lines: this.lines };
    this.lines = [];
    return reply;
  }

  reset(): void {
    this.lines = [];
    this.dataLine = null;
    this.dataBody = [];
  }
}

function toDivider(value: string): ReplyDivider {
  switch (value) {
    case '+':
      return '+';
    case '-':
      return '-';
    default:
      return ' ';
  }
}

export function formatCommand(keyword: string, ...args: string[]): string {
  return [keyword, ...args].join(' ') + '\r\n';
}

const ESCAPES: Record<string, string> = { '\\': '\\', '"': '"', '\r': 'r', '\n': 'n', '\t': 't' };
const UNESCAPES: Record<string, string> = { r: '\r', n: '\n', t: '\t' };

/**
 * Quote a command argument. Line breaks are escaped so an argument can never
 * end the command early.
 */
export function quoteString(value: string): string {
  return `"${value.replace(/[\\"\r\n\t]/g, (char) => `\\${ESCAPES[char]}`)}"`;
}

export function unquoteString(value: string): string {
  return value.replace(/\\(.)/g, (_match, char: string) => UNESCAPES[char] ?? char);
}

/**
 * 6xx replies are asynchronous events, never an answer to a command.
 */
export function isAsyncEvent(reply: ControlReply): boolean {
  return reply.status >= 600 && reply.status < 700;
}

export function assertOk(reply: ControlReply): ControlReply {
  if (reply.status !== STATUS_OK) {
    const last = reply.lines[reply.lines.length - 1];
    throw new ControlReplyError(reply.status, last?.content ?? 'Unknown error');
  }
  return reply;
}

/**
 * Extract the value of `key` from a GETINFO reply.
 */
export function parseInfoValue(reply: ControlReply, key: string): string {
  const prefix = `${key}=`;
  for (const line of reply.lines) {
    if (line.content.startsWith(prefix)) {
      return line.data ?? line.content.slice(prefix.length);
    }
  }
  throw new ControlReplyError(reply.status, `Reply is missing "${key}"`);
}

/**
 * Extract the first value of `key` from a GETCONF reply. An option that is
 * set to its default is reported without a value and yields undefined.
 */
export function parseConfValue(reply: ControlReply, key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const line of reply.lines) {
    const eq = line.content.indexOf('=');
    const name = eq === -1 ? line.content : line.content.slice(0, eq);
    if (name.toLowerCase() !== wanted) continue;
    if (eq === -1) return undefined;
    const value = line.content.slice(eq + 1);
    return value.startsWith('"') && value.endsWith('"')
      ? unquoteString(value.slice(1, -1))
      : value;
  }
  return undefined;
}

export function parseProtocolInfo(reply: ControlReply): ProtocolInfo {
  const info: ProtocolInfo = { authMethods: [] };

  for (const line of reply.lines) {
    if (line.content.startsWith('AUTH ')) {
      const methods = /METHODS=(\S+)/.exec(line.content);
      if (methods) info.authMethods = methods[1].split(',');
      const cookie = /COOKIEFILE="((?:[^"\\]|\\.)*)"/.exec(line.content);
      if (cookie) info.cookieFile = unquoteString(cookie[1]);
    } else if (line.content.startsWith('VERSION ')) {
      const version = /Tor="((?:[^"\\]|\\.)*)"/.exec(line.content);
      if (version) info.torVersion = unquoteString(version[1]);
    }
  }

  return info;
}

export function parseAuthChallenge(reply: ControlReply): AuthChallenge {
  const content = reply.lines[reply.lines.length - 1]?.content ?? '';
  const serverHash = /SERVERHASH=([0-9A-Fa-f]+)/.exec(content);
  const serverNonce = /SERVERNONCE=([0-9A-Fa-f]+)/.exec(content);
  if (!serverHash || !serverNonce) {
    throw new ControlReplyError(reply.status, `Malformed AUTHCHALLENGE reply: ${content}`);
  }
  return { serverHash: serverHash[1], serverNonce: serverNonce[1] };
}

/**
 * Decode the base64 identity digest of an `r` line into a hex fingerprint.
 */
export function identityToFingerprint(identity: string): string {
  return Buffer.from(identity, 'base64').toString('hex').toUpperCase();
}

/**
 * Parse a router status entry (the body of `GETINFO ns/id/<fingerprint>`).
 *
 * The `r` line carries a descriptor digest in full consensuses and omits it
 * in microdescriptor consensuses, so its trailing fields are read from the end.
 */
export function parseRouterStatus(text: string): RouterStatusEntry {
  let entry: RouterStatusEntry | null = null;
  let flags: string[] = [];
  let bandwidth: number | undefined;

  for (const line of text.split('\n')) {
    const [keyword, ...fields] = line.trim().split(/\s+/);

    if (keyword === 'r') {
      if (fields.length < 7) {
        throw new ControlReplyError(STATUS_OK, `Malformed router status line: ${line}`);
      }
      const n = fields.length;
      const published = new Date(`${fields[n - 5]}T${fields[n - 4]}Z`);
      const orPort = Number(fields[n - 2]);
      entry = {
        nickname: fields[0],
        fingerprint: identityToFingerprint(fields[1]),
        flags: [],
        published: Number.isNaN(published.getTime()) ? undefined : published,
        address: fields[n - 3],
        orPort: Number.isInteger(orPort) ? orPort : undefined,
      };
    } else if (keyword === 's') {
      flags = fields;
    } else if (keyword === 'w') {
      const match = fields.find((field) => field.startsWith('Bandwidth='));
      if (match) {
        const value = Number(match.slice('Bandwidth='.length));
        if (Number.isFinite(value)) bandwidth = value;
      }
    }
  }

  if (!entry) {
    throw new ControlReplyError(STATUS_OK, 'Router status entry has no "r" line');
  }

  return { ...entry, flags, bandwidth };
}
