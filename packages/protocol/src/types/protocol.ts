// Wire vocabulary shared by the session and shell channels. The set is closed:
// a tag not listed here decodes as an "unrecognized" frame, never an error.

export const MessageType = {
  // Session lifecycle
  Connection: 'connection',
  SessionStart: 'session:start',
  SessionMessage: 'session:message',
  SessionEnd: 'session:end',
  SessionCreated: 'session-created',
  SessionAborted: 'session-aborted',
  AbortSession: 'abort-session',

  // Commands and streamed responses
  AssistantCommand: 'claude-command',
  CursorCommand: 'cursor-command',
  AssistantOutput: 'claude-output',
  AssistantResponse: 'claude-response',
  StreamingResponse: 'stream:response',
  StreamStart: 'stream:start',
  StreamChunk: 'stream:chunk',
  StreamEnd: 'stream:end',
  ToolUse: 'tool_use',
  ToolResult: 'tool_result',
  Message: 'message',
  Typing: 'typing',
  Status: 'status',
  Error: 'error',

  // Projects and files
  ProjectList: 'project:list',
  ProjectCreate: 'project:create',
  ProjectDelete: 'project:delete',
  ProjectsUpdated: 'projects_updated',
  FileOperation: 'file:operation',

  // Shell
  ShellInit: 'init',
  ShellCommand: 'shell-command',
  ShellOutput: 'shell-output',
  ShellRawOutput: 'output',
  ShellError: 'shell-error',
  ShellInput: 'input',
  ShellResize: 'resize',
  ShellExit: 'exit',
  UrlOpen: 'url_open',
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export const MESSAGE_TYPES: readonly MessageType[] = Object.freeze(Object.values(MessageType));

const known = new Set<string>(MESSAGE_TYPES);

export function isMessageType(tag: string): tag is MessageType {
  return known.has(tag);
}

/** Keys of the envelope header as written on the wire. */
export const HEADER_KEYS = ['type', 'payload', 'timestamp', 'sessionId'] as const;
