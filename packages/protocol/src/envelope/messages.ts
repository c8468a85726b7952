/**
 * Builders for the outbound messages the client sends. Each returns a ready
 * envelope; the service reads these fields from the payload.
 */
import { createEnvelope, type MessageEnvelope } from './Envelope';
import { MessageType } from '../types/protocol';
import type { NativeObject } from '../codec/GenericValue';

function commandPayload(content: string, projectPath: string, sessionId?: string): NativeObject {
  const payload: NativeObject = { content, projectPath };
  if (sessionId) {
    payload['sessionId'] = sessionId;
    payload['resume'] = true;
  }
  return payload;
}

/** Prompt for the assistant; resumes `sessionId` when given. */
export function assistantCommand(
  content: string,
  projectPath: string,
  sessionId?: string
): MessageEnvelope {
  return createEnvelope(MessageType.AssistantCommand, commandPayload(content, projectPath, sessionId), {
    correlationId: sessionId ?? null,
  });
}

export function cursorCommand(
  content: string,
  projectPath: string,
  sessionId?: string
): MessageEnvelope {
  return createEnvelope(MessageType.CursorCommand, commandPayload(content, projectPath, sessionId), {
    correlationId: sessionId ?? null,
  });
}

export function abortSession(sessionId: string): MessageEnvelope {
  return createEnvelope(MessageType.AbortSession, { sessionId }, { correlationId: sessionId });
}

// ─── Shell ────────────────────────────────────────────────────────────────────

export function shellInit(projectPath: string, cols: number, rows: number): MessageEnvelope {
  return createEnvelope(MessageType.ShellInit, {
    projectPath,
    sessionId: null,
    hasSession: false,
    provider: 'terminal',
    cols,
    rows,
  });
}

export function shellCommand(command: string, cwd: string, commandId: string): MessageEnvelope {
  return createEnvelope(MessageType.ShellCommand, { command, cwd }, { correlationId: commandId });
}

export function shellInput(data: string): MessageEnvelope {
  return createEnvelope(MessageType.ShellInput, { data });
}

export function shellResize(cols: number, rows: number): MessageEnvelope {
  return createEnvelope(MessageType.ShellResize, { cols, rows });
}
