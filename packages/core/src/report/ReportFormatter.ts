import { format, subSeconds } from 'date-fns';
import { RELAY_SEARCH_URL, formatBytes } from '@relaywatch/shared';
import type { RelayReport } from '@relaywatch/shared';

const HEAVY_RULE = '='.repeat(60);
const FOOTER_RULE = '-'.repeat(60);
const SECTION_RULE = '-'.repeat(40);

const GENERATED_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const RESTART_FORMAT = 'MM/dd/yyyy HH:mm';

const NA = 'N/A';

function field(label: string, value: string | number | undefined): string {
  return `  ${`${label}:`.padEnd(15)}${value ?? NA}`;
}

/**
 * Render a report as the plain-text digest sent by email or printed to stdout.
 */
export function formatReportText(report: RelayReport): string {
  const lines: string[] = [];

  lines.push(HEAVY_RULE);
  lines.push(`  TOR RELAY REPORT: ${report.nickname ?? 'Unknown'}`);
  lines.push(`  Generated: ${format(report.generated, GENERATED_FORMAT)}`);
  lines.push(`  Host: ${report.hostname || 'unknown'}`);
  lines.push(HEAVY_RULE);
  lines.push('');

  if (report.warnings.length > 0) {
    lines.push('ALERTS');
    lines.push(SECTION_RULE);
    lines.push(...report.warnings);
    lines.push('');
  }

  if (report.errors.length > 0) {
    lines.push('ERRORS');
    lines.push(SECTION_RULE);
    lines.push(...report.errors.map((error) => `❌ ${error}`));
    lines.push('');
  }

  // Nothing past this point is trustworthy without a control session.
  if (report.connectionFailed) {
    return lines.join('\n');
  }

  lines.push('STATUS');
  lines.push(SECTION_RULE);
  lines.push(field('Circuits', report.circuitsEstablished ? '✅ Established' : '❌ NOT Established'));
  lines.push(field('Connections', report.connectionCount));
  lines.push(field('Uptime', report.uptimeHuman));
  lines.push(field('Tor Version', report.version));
  lines.push('');

  lines.push('RELAY IDENTITY');
  lines.push(SECTION_RULE);
  lines.push(field('Nickname', report.nickname));
  lines.push(field('Address', `${report.address ?? NA}:${report.orPort ?? NA}`));
  lines.push(field('Fingerprint', report.fingerprint));
  lines.push('');

  lines.push('CONSENSUS FLAGS');
  lines.push(SECTION_RULE);
  lines.push(report.flags && report.flags.length > 0 ? `  ${report.flags.join(', ')}` : '  (none)');
  lines.push('');

  const uptime = report.uptimeSeconds ?? 0;
  if (uptime > 0) {
    const restarted = subSeconds(report.generated, uptime);
    lines.push(`TRAFFIC SINCE RESTART (${format(restarted, RESTART_FORMAT)})`);
  } else {
    lines.push('TRAFFIC SINCE RESTART');
  }
  lines.push(SECTION_RULE);
  lines.push(field('Read', report.bytesRead !== undefined ? formatBytes(report.bytesRead) : undefined));
  lines.push(
    field('Written', report.bytesWritten !== undefined ? formatBytes(report.bytesWritten) : undefined),
  );
  if (uptime > 0) {
    lines.push(field('Avg Read', `${formatBytes((report.bytesRead ?? 0) / uptime)}/s`));
    lines.push(field('Avg Write', `${formatBytes((report.bytesWritten ?? 0) / uptime)}/s`));
  }
  lines.push('');

  lines.push(FOOTER_RULE);
  lines.push(`Relay search: ${RELAY_SEARCH_URL}${report.fingerprint ?? ''}`);
  lines.push('');

  return lines.join('\n');
}
