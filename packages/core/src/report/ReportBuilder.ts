import { ReportFieldAlreadySetError } from '@relaywatch/shared';
import type { RelayReport } from '@relaywatch/shared';

export type ReportFields = Omit<
  RelayReport,
  'generated' | 'hostname' | 'connectionFailed' | 'warnings' | 'errors'
>;

/**
 * Accumulates a RelayReport one field at a time. Fields are write-once and
 * diagnostics are append-only.
 */
export class ReportBuilder {
  private readonly fields: ReportFields = {};
  private readonly warnings: string[] = [];
  private readonly errors: string[] = [];
  private connectionFailed = false;

  constructor(
    private readonly generated: Date,
    private readonly hostname: string,
  ) {}

  set<K extends keyof ReportFields>(key: K, value: NonNullable<ReportFields[K]>): this {
    if (this.fields[key] !== undefined) {
      throw new ReportFieldAlreadySetError(String(key));
    }
    this.fields[key] = value;
    return this;
  }

  get<K extends keyof ReportFields>(key: K): ReportFields[K] {
    return this.fields[key];
  }

  warn(message: string): this {
    this.warnings.push(message);
    return this;
  }

  error(message: string): this {
    this.errors.push(message);
    return this;
  }

  markConnectionFailed(): this {
    this.connectionFailed = true;
    return this;
  }

  build(): RelayReport {
    return {
      generated: this.generated,
      hostname: this.hostname,
      connectionFailed: this.connectionFailed,
      ...this.fields,
      warnings: [...this.warnings],
      errors: [...this.errors],
    };
  }
}
