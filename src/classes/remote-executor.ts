import { readFileSync } from 'fs';
import { NodeSSH } from 'node-ssh';
import type { Config } from 'node-ssh';
import type { Client, ClientChannel } from 'ssh2';
import shellEscape from 'shell-escape';
import { v4 as uuidv4 } from 'uuid';
import { SessionState } from '../interfaces';
import type { CommandResult, SessionConfig } from '../interfaces';
import {
  CommandExecutionError,
  ConnectionError,
  errorMessage,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { sanitizeSessionConfig } from '../lib/sanitization';

/**
 * Owns one SSH session: connect once, run commands one at a time,
 * disconnect once. A disconnected or failed executor cannot be reused.
 */
export class RemoteExecutor {
  readonly sessionId = uuidv4();
  private ssh: NodeSSH;
  private config: SessionConfig;
  private client: Client | null = null;
  private channel: ClientChannel | null = null;
  private failInFlight: ((error: unknown) => void) | null = null;
  private _state: SessionState = SessionState.Unconnected;

  constructor(config: SessionConfig) {
    this.config = sanitizeSessionConfig(config);
    this.ssh = new NodeSSH();
  }

  get state(): SessionState {
    return this._state;
  }

  get host(): string {
    return this.config.host;
  }

  // an 'error' event with no listener throws out of the ssh2 socket handler
  private readonly handleSessionError = (error: Error): void => {
    if (this.failInFlight) {
      this.failInFlight(error);
      return;
    }
    logger.warn('SSH session error while idle', {
      session: this.sessionId,
      error: error.message,
    });
  };

  /**
   * Connect to the remote server
   */
  async connect(): Promise<void> {
    if (this._state !== SessionState.Unconnected) {
      throw new ConnectionError(
        `SSH connection failed: session is ${this._state} and cannot be reconnected`
      );
    }

    logger.debug('Connecting to SSH host', {
      session: this.sessionId,
      host: this.config.host,
      port: this.config.port,
      username: this.config.username,
    });

    try {
      await this.ssh.connect(this.buildTransportConfig());
      this.client = this.ssh.connection;
      this.client?.on('error', this.handleSessionError);
      this._state = SessionState.Connected;
      logger.debug('SSH connection established', { session: this.sessionId });
    } catch (error) {
      this._state = SessionState.Failed;
      throw new ConnectionError(
        `SSH connection failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Run one command and collect stdout and stderr into a single buffer
   */
  async executeCommand(command: string): Promise<CommandResult> {
    if (this._state !== SessionState.Connected) {
      throw new CommandExecutionError(
        `Command execution failed: SSH session is ${this._state}`
      );
    }

    logger.debug('Executing remote command', {
      session: this.sessionId,
      command,
    });

    let output = '';
    let failChannel: (error: unknown) => void = () => undefined;
    const channelError = new Promise<never>((_, reject) => {
      failChannel = reject;
    });
    this.failInFlight = failChannel;

    try {
      const result = await Promise.race([
        this.ssh.execCommand(command, {
          onChannel: (channel) => {
            this.channel = channel;
            channel.on('error', failChannel);
          },
          onStdout: (chunk) => {
            output += chunk.toString();
          },
          onStderr: (chunk) => {
            output += chunk.toString();
          },
        }),
        channelError,
      ]);

      if (result.code === null) {
        logger.warn('Remote command exited without a status code', {
          session: this.sessionId,
          signal: result.signal,
        });
      }

      return Object.freeze({ output, exitCode: result.code ?? -1 });
    } catch (error) {
      throw new CommandExecutionError(
        `Command execution failed: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      this.failInFlight = null;
      this.channel = null;
    }
  }

  /**
   * Disconnect from the remote server. Safe in every state.
   */
  async disconnect(): Promise<void> {
    if (this.failInFlight) {
      this.failInFlight(
        new Error('SSH session was disconnected while the command was running')
      );
    }

    if (this.channel) {
      this.channel.close();
      this.channel = null;
    }

    if (this._state === SessionState.Disconnected) {
      return;
    }

    try {
      this.ssh.dispose();
    } catch (error) {
      logger.warn('Error while closing SSH session', {
        session: this.sessionId,
        error: errorMessage(error),
      });
    }

    if (this.client) {
      this.client.removeListener('error', this.handleSessionError);
      this.client = null;
    }

    this._state = SessionState.Disconnected;
    logger.debug('SSH session closed', { session: this.sessionId });
  }

  private buildTransportConfig(): Config {
    const { host, port, username, password, passphrase, readyTimeout } =
      this.config;

    const privateKey =
      this.config.privateKey ||
      (this.config.privateKeyPath
        ? readFileSync(this.config.privateKeyPath, 'utf8')
        : undefined);

    return {
      host,
      port,
      username,
      password,
      privateKey,
      passphrase,
      readyTimeout,
    };
  }
}

/**
 * Build the full command string with shell-escaped arguments
 */
export function buildCommand(command: string, args?: string[]): string {
  if (!args || args.length === 0) {
    return command;
  }

  return `${command} ${shellEscape(args)}`;
}
