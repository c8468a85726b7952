import {
  MessageType,
  shellCommand,
  shellInit,
  shellInput,
  shellResize,
  type MessageEnvelope,
} from '@tether/protocol';
import { parseOptions, ShellOptionsSchema, type ShellOptions, type ShellSettings } from '../config/options';
import { Connection, type ConnectionOptions } from '../connection/Connection';
import type { ConnectionState, ErrorContext } from '../connection/types';
import { createLogger, type Logger } from '../logger';
import { readError, readExitCode, readOutput, readWorkingDirectory } from './frames';

export type CommandFailureReason = 'timeout' | 'disconnected' | 'queueFull' | 'remote';

export interface CommandResult {
  commandId: string;
  command: string;
  status: 'completed' | 'failed';
  /** Text of the acknowledging output frame. */
  output: string;
  failure: { reason: CommandFailureReason; message: string } | null;
}

export interface CommandChannelObserver {
  /** The remote shell is ready; `cwd` is null when it does not say where. */
  onInitialized?(cwd: string | null): void;
  onOutput?(chunk: string): void;
  onError?(message: string): void;
  onExit?(code: number | null): void;
  onStateChanged?(state: ConnectionState): void;
}

export interface CommandChannelOptions extends ShellOptions {
  connection?: ConnectionOptions;
  logger?: Logger;
}

export interface OpenOptions {
  projectPath?: string;
}

interface PendingCommand {
  id: string;
  command: string;
  cwd: string;
  resolve: (result: CommandResult) => void;
}

interface InFlightCommand extends PendingCommand {
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Remote shell over its own Connection. Commands run strictly one at a time;
 * a command the service never acknowledges fails after `commandTimeoutMs`
 * and the next one starts.
 */
export class CommandChannel {
  private readonly connection: Connection;
  private readonly settings: ShellSettings;
  private readonly log: Logger;
  private readonly pending: PendingCommand[] = [];
  private inFlight: InFlightCommand | null = null;
  private readonly recent: string[] = [];
  private projectPath: string;
  private cols: number;
  private rows: number;
  private nextId = 1;

  constructor(
    private readonly observer: CommandChannelObserver = {},
    options: CommandChannelOptions = {}
  ) {
    this.settings = parseOptions(ShellOptionsSchema, options, 'shell');
    this.log = options.logger ?? createLogger('shell');
    this.projectPath = this.settings.projectPath;
    this.cols = this.settings.cols;
    this.rows = this.settings.rows;

    this.connection = new Connection(
      {
        onStateChanged: (state) => this.handleState(state),
        onMessage: (envelope) => this.handleMessage(envelope),
        onRawData: (data) => this.emitOutput(new TextDecoder().decode(data)),
        onError: (error, context) => this.handleError(error, context),
      },
      { name: 'shell', logger: this.log, ...options.connection }
    );
  }

  open(endpoint: string | URL, token?: string | null, options: OpenOptions = {}): boolean {
    if (options.projectPath !== undefined) this.projectPath = options.projectPath;
    return this.connection.connect(endpoint, token);
  }

  /** Disconnects and fails every queued or running command. */
  close(): void {
    this.failAll('disconnected', 'Channel closed');
    this.connection.disconnect();
  }

  /** Resolves once the command completes, fails or times out. Never rejects. */
  execute(command: string, cwd?: string): Promise<CommandResult> {
    const id = `cmd-${this.nextId++}`;
    this.remember(command);

    return new Promise<CommandResult>((resolve) => {
      if (this.pending.length >= this.settings.queueLimit) {
        this.log.warn(`Command queue full (${this.settings.queueLimit}), rejecting "${command}"`);
        resolve(failed({ id, command }, 'queueFull', 'Command queue is full'));
        return;
      }
      this.pending.push({ id, command, cwd: cwd ?? this.projectPath, resolve });
      this.dispatchNext();
    });
  }

  /** Sends the terminal size now, or on the next connect when offline. */
  resize(cols: number, rows: number): boolean {
    this.cols = cols;
    this.rows = rows;
    if (!this.connection.isConnected) return false;
    return this.connection.send(shellResize(cols, rows));
  }

  /** Sends keystrokes to the remote terminal. */
  input(data: string): boolean {
    if (!this.connection.isConnected) return false;
    return this.connection.send(shellInput(data));
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  get queuedCount(): number {
    return this.pending.length;
  }

  get runningCommand(): string | null {
    return this.inFlight?.command ?? null;
  }

  /** Most recent last, without consecutive duplicates. */
  get history(): readonly string[] {
    return [...this.recent];
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private handleState(state: ConnectionState): void {
    if (state === 'connected') {
      this.connection.send(shellInit(this.projectPath, this.cols, this.rows));
      this.dispatchNext();
    } else if (state === 'failed') {
      this.failAll('disconnected', 'Connection failed');
    }
    this.observer.onStateChanged?.(state);
  }

  private handleMessage(envelope: MessageEnvelope): void {
    switch (envelope.type) {
      case MessageType.ShellInit: {
        const cwd = readWorkingDirectory(envelope.payload);
        this.log.info(`Shell initialized${cwd === null ? '' : ` in ${cwd}`}`);
        this.observer.onInitialized?.(cwd);
        break;
      }
      case MessageType.ShellOutput:
      case MessageType.ShellRawOutput: {
        const text = readOutput(envelope.payload) ?? '';
        this.emitOutput(text);
        const running = this.acknowledged(envelope);
        if (running) this.settle(running, completed(running, text));
        break;
      }
      case MessageType.ShellError:
      case MessageType.Error: {
        const message = readError(envelope.payload) ?? 'Unknown shell error';
        this.observer.onError?.(message);
        const running = this.acknowledged(envelope);
        if (running) this.settle(running, failed(running, 'remote', message));
        break;
      }
      case MessageType.ShellExit: {
        const code = readExitCode(envelope.payload);
        this.log.info(`Shell exited${code === null ? '' : ` with code ${code}`}`);
        this.observer.onExit?.(code);
        this.close();
        break;
      }
      default:
        this.log.debug(`Ignoring ${envelope.type} frame`);
    }
  }

  /**
   * The running command a reply settles. Frames tagged with another command's
   * id (late output of an earlier command) settle nothing.
   */
  private acknowledged(envelope: MessageEnvelope): InFlightCommand | null {
    const running = this.inFlight;
    if (running === null) return null;
    if (envelope.correlationId !== null && envelope.correlationId !== running.id) {
      this.log.debug(`Reply for ${envelope.correlationId} while ${running.id} is running`);
      return null;
    }
    return running;
  }

  private handleError(error: Error, context: ErrorContext): void {
    // Plain-text frames from the terminal are output, not envelopes.
    if (context.type === 'decode') {
      this.emitOutput(context.frame);
      return;
    }
    this.log.debug(`Connection error (${context.type}): ${error.message}`);
  }

  private emitOutput(chunk: string): void {
    if (chunk !== '') this.observer.onOutput?.(chunk);
  }

  private dispatchNext(): void {
    if (this.inFlight !== null || !this.connection.isConnected) return;
    const next = this.pending.shift();
    if (next === undefined) return;

    const timer = setTimeout(() => {
      const running = this.inFlight;
      if (running === null || running.id !== next.id) return;
      const seconds = this.settings.commandTimeoutMs / 1000;
      this.log.warn(`Command "${next.command}" timed out after ${seconds}s`);
      this.settle(running, failed(next, 'timeout', `No response within ${seconds}s`));
    }, this.settings.commandTimeoutMs);

    this.inFlight = { ...next, timer };
    this.log.debug(`Running "${next.command}" in ${next.cwd || '(default cwd)'}`);
    this.connection.send(shellCommand(next.command, next.cwd, next.id));
  }

  private settle(command: InFlightCommand, result: CommandResult): void {
    clearTimeout(command.timer);
    this.inFlight = null;
    command.resolve(result);
    this.dispatchNext();
  }

  private failAll(reason: CommandFailureReason, message: string): void {
    const running = this.inFlight;
    if (running !== null) {
      clearTimeout(running.timer);
      this.inFlight = null;
      running.resolve(failed(running, reason, message));
    }
    for (const command of this.pending.splice(0)) {
      command.resolve(failed(command, reason, message));
    }
  }

  private remember(command: string): void {
    const trimmed = command.trim();
    if (trimmed === '' || this.recent[this.recent.length - 1] === trimmed) return;
    this.recent.push(trimmed);
    if (this.recent.length > this.settings.historyLimit) this.recent.shift();
  }
}

function completed(command: { id: string; command: string }, output: string): CommandResult {
  return { commandId: command.id, command: command.command, status: 'completed', output, failure: null };
}

function failed(
  command: { id: string; command: string },
  reason: CommandFailureReason,
  message: string
): CommandResult {
  return {
    commandId: command.id,
    command: command.command,
    status: 'failed',
    output: '',
    failure: { reason, message },
  };
}
