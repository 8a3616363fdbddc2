import type { RelayReport } from '@relaywatch/shared';

export const STATUS_WARNING = '⚠️';
export const STATUS_ERROR = '❌';
export const STATUS_OK = '✅';

/**
 * Subject line for a report. Decided from the diagnostic lists; warnings
 * outrank errors.
 */
export function buildSubject(report: RelayReport, defaultNickname: string): string {
  let indicator = STATUS_OK;
  if (report.warnings.length > 0) {
    indicator = STATUS_WARNING;
  } else if (report.errors.length > 0) {
    indicator = STATUS_ERROR;
  }
  return `${indicator} Tor Relay Report: ${report.nickname ?? defaultNickname}`;
}
