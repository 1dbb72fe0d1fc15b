export interface SessionConfig {
  host: string;
  port?: number; // default 22
  username: string;

  // at least one of password, privateKey or privateKeyPath must be provided
  password?: string;
  privateKey?: string;
  privateKeyPath?: string;
  passphrase?: string; // only used with an encrypted private key
  readyTimeout?: number;
}

export interface CommandResult {
  /**
   * @description stdout and stderr chunks, concatenated in arrival order.
   */
  readonly output: string;
  readonly exitCode: number;
}

export enum SessionState {
  Unconnected = 'unconnected',
  Connected = 'connected',
  Failed = 'failed',
  Disconnected = 'disconnected',
}

export interface ServerInfo {
  reachable: boolean;
  hostname: string;
  uptime: string;
}
