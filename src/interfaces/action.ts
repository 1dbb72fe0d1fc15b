import { z } from 'zod';

/**
 * @description Connection fields shared by every remote action input.
 */
export const connectionFields = {
  host: z
    .string()
    .min(1)
    .describe('The hostname or IP address of the remote machine'),
  username: z.string().min(1).describe('The username to connect with'),
  password: z
    .string()
    .min(1)
    .optional()
    .describe('The password for authentication'),
  privateKey: z
    .string()
    .min(1)
    .optional()
    .describe('The private key content for authentication'),
  privateKeyPath: z
    .string()
    .min(1)
    .optional()
    .describe('Path to the private key file for authentication'),
  port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(22)
    .describe('The SSH port number'),
};

export const CREDENTIAL_REQUIRED_MESSAGE =
  'Either password, privateKey, or privateKeyPath must be provided';

export function hasCredential(data: {
  password?: string;
  privateKey?: string;
  privateKeyPath?: string;
}): boolean {
  return Boolean(data.password || data.privateKey || data.privateKeyPath);
}
