import type { SessionConfig } from '../interfaces';
import {
  sanitizeNumber,
  sanitizeSessionConfig,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
  ValidationError,
} from './sanitization';

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_READY_TIMEOUT_MS = 20000;

/**
 * Connection options as commander hands them over; every field can also
 * come from the environment.
 */
export interface ConnectionOptions {
  host?: string;
  username?: string;
  port?: string;
  password?: string;
  privateKey?: string; // path to a key file
  passphrase?: string;
  timeout?: string;
}

/**
 * Merge CLI options with SSH_* environment variables. Options win.
 */
export function resolveSessionConfig(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const host = options.host || env.SSH_HOST;
  const username = options.username || env.SSH_USERNAME;

  if (!host || !username) {
    throw new ValidationError(
      'Host and username are required. Provide them via options or environment variables (SSH_HOST, SSH_USERNAME)'
    );
  }

  const port = sanitizeNumber(
    options.port || env.SSH_PORT || String(DEFAULT_SSH_PORT),
    'port',
    1,
    65535
  );
  const readyTimeout = sanitizeNumber(
    options.timeout || env.SSH_TIMEOUT || String(DEFAULT_READY_TIMEOUT_MS),
    'timeout',
    1
  );

  const password = options.password || env.SSH_PASSWORD;
  const keyPath = options.privateKey || env.SSH_PRIVATE_KEY_PATH;
  const privateKeyPath = keyPath ? sanitizeSSHKeyPath(keyPath) : undefined;
  const privateKey = privateKeyPath ? undefined : env.SSH_PRIVATE_KEY;

  if (!password && !privateKeyPath && !privateKey) {
    throw new ValidationError(
      'Either --password or --private-key must be provided (or SSH_PASSWORD/SSH_PRIVATE_KEY_PATH/SSH_PRIVATE_KEY environment variables)'
    );
  }

  return sanitizeSessionConfig({
    host: sanitizeSSHHost(host),
    port,
    username: sanitizeSSHUsername(username),
    password,
    privateKey,
    privateKeyPath,
    passphrase: options.passphrase || env.SSH_PASSPHRASE,
    readyTimeout,
  });
}
