/**
 * Option schemas for every configurable component. Each constructor runs its
 * input through `parseOptions`, which fills defaults and turns validation
 * failures into a ConfigError.
 */
import { z } from 'zod';
import { ConfigError } from '../errors';

export const ReconnectOptionsSchema = z.object({
  baseDelayMs: z.number().int().positive().default(1_000),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().positive().default(30_000),
  /** Symmetric jitter as a fraction of the delay; 0 disables it. */
  jitterRatio: z.number().min(0).max(1).default(0),
  /** Retries allowed before giving up. Unset means retry forever. */
  maxAttempts: z.number().int().positive().optional(),
});

export const KeepaliveOptionsSchema = z
  .object({
    intervalMs: z.number().int().positive().default(30_000),
    timeoutMs: z.number().int().positive().default(10_000),
  })
  .refine((value) => value.timeoutMs <= value.intervalMs, {
    message: 'timeoutMs must not exceed intervalMs',
    path: ['timeoutMs'],
  });

export const QueueOptionsSchema = z.object({
  capacity: z.number().int().positive().default(100),
});

export const TokenAttachmentSchema = z.enum(['query', 'header', 'both']);

export const ConnectionOptionsSchema = z.object({
  /** Log tag, e.g. `[connection]`. */
  name: z.string().min(1).default('connection'),
  tokenAttachment: TokenAttachmentSchema.default('both'),
  tokenQueryParam: z.string().min(1).default('token'),
  handshakeTimeoutMs: z.number().int().positive().default(10_000),
  keepalive: KeepaliveOptionsSchema.default({}),
  queue: QueueOptionsSchema.default({}),
});

export const ShellOptionsSchema = z.object({
  projectPath: z.string().default(''),
  commandTimeoutMs: z.number().int().positive().default(10_000),
  queueLimit: z.number().int().positive().default(50),
  historyLimit: z.number().int().positive().default(100),
  cols: z.number().int().positive().default(80),
  rows: z.number().int().positive().default(24),
});

export type ReconnectOptions = z.input<typeof ReconnectOptionsSchema>;
export type ReconnectSettings = z.output<typeof ReconnectOptionsSchema>;
export type KeepaliveOptions = z.input<typeof KeepaliveOptionsSchema>;
export type KeepaliveSettings = z.output<typeof KeepaliveOptionsSchema>;
export type QueueOptions = z.input<typeof QueueOptionsSchema>;
export type TokenAttachment = z.output<typeof TokenAttachmentSchema>;
export type ConnectionSettings = z.output<typeof ConnectionOptionsSchema>;
export type ConnectionSettingsInput = z.input<typeof ConnectionOptionsSchema>;
export type ShellOptions = z.input<typeof ShellOptionsSchema>;
export type ShellSettings = z.output<typeof ShellOptionsSchema>;

/** @throws ConfigError listing every failed field. */
export function parseOptions<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string
): Output {
  const result = schema.safeParse(input ?? {});
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const detail = issues.map((issue) => `${issue.path || label}: ${issue.message}`).join('; ');
  throw new ConfigError(`Invalid ${label} options (${detail})`, issues);
}
