import { getLogger } from '@relaywatch/shared';
import type { RelayReport, RelayWatchConfig } from '@relaywatch/shared';
import { ReportCollector } from './report/ReportCollector.js';
import { formatReportText } from './report/ReportFormatter.js';
import { ReportMailer } from './mail/ReportMailer.js';
import { buildSubject } from './mail/subject.js';

export type ReportOutcome = 'printed' | 'sent' | 'fallback';

export type ReportStage = 'collect' | 'send' | 'done';

export interface ReportSource {
  collect(): Promise<RelayReport>;
}

export interface ReportSender {
  send(subject: string, body: string): Promise<boolean>;
}

export interface RunReportOptions {
  config: RelayWatchConfig;
  /** Print the report instead of emailing it. */
  stdout: boolean;
  collector?: ReportSource;
  mailer?: ReportSender;
  write?: (line: string) => void;
  onStage?: (stage: ReportStage) => void;
}

/**
 * Collect, format and deliver one report. A failed email falls back to
 * printing the full report so the scheduler's log keeps it.
 */
export async function runReport(options: RunReportOptions): Promise<ReportOutcome> {
  const { config } = options;
  const write = options.write ?? ((line: string) => console.log(line));
  const onStage = options.onStage ?? (() => undefined);

  const collector =
    options.collector ??
    new ReportCollector({
      control: config.control,
      nickname: config.relay.nickname,
      thresholds: config.thresholds,
    });
  const mailer =
    options.mailer ?? new ReportMailer({ smtp: config.smtp, email: config.email, write });

  onStage('collect');
  const report = await collector.collect();
  const body = formatReportText(report);
  const subject = buildSubject(report, config.relay.nickname);

  getLogger().info(
    { warnings: report.warnings.length, errors: report.errors.length },
    'Report collected',
  );

  if (options.stdout) {
    onStage('done');
    write(body);
    return 'printed';
  }

  onStage('send');
  const delivered = await mailer.send(subject, body);
  onStage('done');

  if (delivered) {
    write(`Report sent to ${config.email?.to ?? 'unknown recipient'}`);
    return 'sent';
  }

  write('Email failed, dumping report:');
  write(body);
  return 'fallback';
}
