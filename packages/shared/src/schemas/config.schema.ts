import { z } from 'zod';
import {
  DEFAULT_CONTROL_HOST,
  DEFAULT_CONTROL_PORT,
  DEFAULT_MIN_CONNECTIONS_CRIT,
  DEFAULT_MIN_CONNECTIONS_WARN,
  DEFAULT_RELAY_NICKNAME,
  DEFAULT_SMTP_PORT,
} from '../constants.js';

const portSchema = z.coerce.number().int().min(1).max(65535);

export const controlConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_CONTROL_HOST),
  port: portSchema.default(DEFAULT_CONTROL_PORT),
  password: z.string().min(1).optional(),
});

export const smtpConfigSchema = z.object({
  host: z.string().min(1),
  port: portSchema.default(DEFAULT_SMTP_PORT),
  username: z.string().min(1),
  password: z.string().min(1),
  starttls: z.boolean().default(true),
});

export const emailConfigSchema = z.object({
  from: z.string().email(),
  to: z.string().email(),
});

export const relayConfigSchema = z.object({
  nickname: z.string().min(1).default(DEFAULT_RELAY_NICKNAME),
});

export const thresholdsSchema = z
  .object({
    minConnectionsWarn: z.number().int().min(0).default(DEFAULT_MIN_CONNECTIONS_WARN),
    minConnectionsCrit: z.number().int().min(0).default(DEFAULT_MIN_CONNECTIONS_CRIT),
  })
  .refine((value) => value.minConnectionsCrit <= value.minConnectionsWarn, {
    message: 'minConnectionsCrit must not exceed minConnectionsWarn',
    path: ['minConnectionsCrit'],
  });

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const relaywatchConfigSchema = z.object({
  control: controlConfigSchema.default({}),
  smtp: smtpConfigSchema.optional(),
  email: emailConfigSchema.optional(),
  relay: relayConfigSchema.default({}),
  thresholds: thresholdsSchema.default({}),
  logLevel: logLevelSchema.default('warn'),
});

export type ValidatedRelayWatchConfig = z.infer<typeof relaywatchConfigSchema>;
