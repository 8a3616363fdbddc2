import nodemailer from 'nodemailer';
import { MailConfigurationError, errorMessage, getLogger } from '@relaywatch/shared';
import type { EmailConfig, SmtpConfig } from '@relaywatch/shared';

export interface ReportMailerOptions {
  smtp?: SmtpConfig;
  email?: EmailConfig;
  /** Where delivery failures are reported for the scheduler's log. */
  write?: (line: string) => void;
}

/**
 * Delivers a report over SMTP. One transport is opened and closed per send.
 */
export class ReportMailer {
  private readonly write: (line: string) => void;

  constructor(private readonly options: ReportMailerOptions) {
    this.write = options.write ?? ((line) => console.log(line));
  }

  /**
   * Send `body` as a plain-text message. Resolves false on any failure.
   */
  async send(subject: string, body: string): Promise<boolean> {
    const logger = getLogger();

    try {
      const { smtp, email } = this.options;
      if (!smtp) throw new MailConfigurationError('smtp');
      if (!email) throw new MailConfigurationError('email');

      const transporter = nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: !smtp.starttls,
        requireTLS: smtp.starttls,
        auth: { user: smtp.username, pass: smtp.password },
      });

      try {
        const info = await transporter.sendMail({
          from: email.from,
          to: email.to,
          subject,
          text: body,
        });
        logger.info({ messageId: info.messageId, to: email.to }, 'Report email sent');
      } finally {
        transporter.close();
      }
      return true;
    } catch (err) {
      logger.error({ err }, 'Failed to send report email');
      this.write(`Failed to send email: ${errorMessage(err)}`);
      return false;
    }
  }
}
