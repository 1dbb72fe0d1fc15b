import { z } from 'zod';
import { RemoteAction } from './remote-action';
import {
  connectionFields,
  CREDENTIAL_REQUIRED_MESSAGE,
  hasCredential,
} from '../interfaces';
import { RemoteExecutor } from '../classes/remote-executor';
import { ConnectionError } from '../lib/errors';

const SSH_ACCESS_PROMPT = `
This tool will establish an SSH connection to a remote machine.
It takes the following inputs:
- host: The hostname or IP address of the remote machine
- username: The username to connect with
- password: (Optional) The password for authentication
- privateKey: (Optional) The private key content for authentication
- privateKeyPath: (Optional) Path to the private key file for authentication
- port: The SSH port number (default 22)

Note: Either password or privateKey/privateKeyPath must be provided for authentication.
`;

const SSHAccessInputSchema = z
  .object(connectionFields)
  .strict()
  .refine(hasCredential, { message: CREDENTIAL_REQUIRED_MESSAGE });

export type SSHAccessInput = z.infer<typeof SSHAccessInputSchema>;

export class SSHAccessAction extends RemoteAction<SSHAccessInput> {
  readonly name = 'ssh_access';
  readonly description = SSH_ACCESS_PROMPT;
  readonly argsSchema = SSHAccessInputSchema;

  protected async run(input: SSHAccessInput): Promise<string> {
    const executor = new RemoteExecutor(input);

    try {
      await executor.connect();
      return `Successfully established SSH connection to ${input.host}`;
    } catch (error) {
      if (error instanceof ConnectionError) {
        return `Failed to establish SSH connection: ${error.message}`;
      }
      throw error;
    } finally {
      await executor.disconnect();
    }
  }
}
