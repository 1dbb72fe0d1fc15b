import * as path from 'path';
import * as fs from 'fs';
import * as net from 'net';
import type { SessionConfig } from '../interfaces';
import { logger } from './logger';

/**
 * Sanitization utilities for session configuration and CLI input
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(value, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates a port number that is already numeric
 */
export function sanitizePort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError('SSH port must be an integer between 1 and 65535');
  }
  return port;
}

/**
 * Validates commands sent to the remote shell
 */
export function sanitizeCommand(command: string): string {
  if (!command || typeof command !== 'string') {
    throw new ValidationError('Command is required and must be a string');
  }

  if (command.trim().length === 0) {
    throw new ValidationError('Command cannot be empty');
  }

  if (command.includes('\0')) {
    throw new ValidationError('Command contains null bytes');
  }

  return command;
}

/**
 * Validates command arguments before they are shell-escaped
 */
export function sanitizeArgs(args: string[]): string[] {
  if (!Array.isArray(args)) {
    throw new ValidationError('Arguments must be an array');
  }

  return args.map((arg, index) => {
    if (typeof arg !== 'string') {
      throw new ValidationError(`Argument ${index} must be a string`);
    }

    // Check for null bytes and other control characters
    if (/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/.test(arg)) {
      throw new ValidationError(
        `Argument ${index} contains invalid control characters`
      );
    }

    return arg;
  });
}

/**
 * Validates and resolves file paths
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  return path.resolve(trimmed);
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  const sanitized = sanitizeFilePath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`Private key file not found: ${sanitized}`);
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // should not be readable by group or others
  if (stats.mode & 0o044) {
    logger.warn(
      'SSH key file is readable by others, consider changing permissions',
      { path: sanitized }
    );
  }

  return sanitized;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  const hostnameRegex = /^[a-zA-Z0-9.-]+$/;

  if (!hostnameRegex.test(trimmed) && net.isIP(trimmed) === 0) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  // Unix username validation
  if (!/^[a-z_][a-z0-9._-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  if (trimmed === 'root') {
    logger.warn('Using root user for SSH connections is not recommended');
  }

  return trimmed;
}

function requireText(value: string, fieldName: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${fieldName} is required`);
  }
  return value.trim();
}

/**
 * Validates a whole session configuration. Runs before any network
 * activity; at least one non-empty credential is required. Host and
 * username only need to be non-empty here; the stricter shape checks
 * belong to the CLI.
 */
export function sanitizeSessionConfig(config: SessionConfig): SessionConfig {
  const password = config.password || undefined;
  const privateKey = config.privateKey || undefined;
  const privateKeyPath = config.privateKeyPath
    ? sanitizeFilePath(config.privateKeyPath, 'SSH key path')
    : undefined;

  if (!password && !privateKey && !privateKeyPath) {
    throw new ValidationError(
      'Either password, privateKey, or privateKeyPath must be provided'
    );
  }

  if (
    config.readyTimeout !== undefined &&
    (!Number.isInteger(config.readyTimeout) || config.readyTimeout < 1)
  ) {
    throw new ValidationError('Ready timeout must be a positive integer');
  }

  return {
    host: requireText(config.host, 'SSH host'),
    port: sanitizePort(config.port ?? 22),
    username: requireText(config.username, 'SSH username'),
    password,
    privateKey,
    privateKeyPath,
    passphrase: config.passphrase || undefined,
    readyTimeout: config.readyTimeout,
  };
}
