/**
 * Payload shapes the shell service sends. Output and errors arrive under
 * different field names depending on the service version.
 */
import { z } from 'zod';
import { toNativeObject, type MappingValue } from '@tether/protocol';

const OutputPayloadSchema = z.object({
  output: z.string().optional(),
  data: z.string().optional(),
});

const ErrorPayloadSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  data: z.string().optional(),
});

const InitPayloadSchema = z.object({
  cwd: z.string().nullable().optional(),
});

const ExitPayloadSchema = z.object({
  exitCode: z.number().int().nullable().optional(),
  code: z.number().int().nullable().optional(),
});

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: MappingValue | null): T | null {
  if (payload === null) return null;
  const result = schema.safeParse(toNativeObject(payload));
  return result.success ? result.data : null;
}

export function readOutput(payload: MappingValue | null): string | null {
  const parsed = parsePayload(OutputPayloadSchema, payload);
  return parsed?.output ?? parsed?.data ?? null;
}

export function readError(payload: MappingValue | null): string | null {
  const parsed = parsePayload(ErrorPayloadSchema, payload);
  return parsed?.error ?? parsed?.message ?? parsed?.data ?? null;
}

/** Working directory the remote shell started in, when it reports one. */
export function readWorkingDirectory(payload: MappingValue | null): string | null {
  return parsePayload(InitPayloadSchema, payload)?.cwd ?? null;
}

export function readExitCode(payload: MappingValue | null): number | null {
  const parsed = parsePayload(ExitPayloadSchema, payload);
  return parsed?.exitCode ?? parsed?.code ?? null;
}
