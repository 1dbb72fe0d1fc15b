import { z } from 'zod';
import { RemoteAction } from './remote-action';
import {
  connectionFields,
  CREDENTIAL_REQUIRED_MESSAGE,
  hasCredential,
} from '../interfaces';
import { withRemoteSession } from '../lib/session';
import { withTimeout } from '../lib/timeout';

const REMOTE_SHELL_PROMPT = `
This tool will execute a command on the remote server via SSH.
It takes the following inputs:
- host: The hostname or IP address of the remote machine
- username: The username to connect with
- password: (Optional) The password for authentication
- privateKey: (Optional) The private key content for authentication
- privateKeyPath: (Optional) Path to the private key file for authentication
- port: The SSH port number (default 22)
- command: The shell command to execute
- timeoutMs: (Optional) Give up waiting for the command after this many milliseconds

Note: Either password or privateKey/privateKeyPath must be provided for authentication.
The result is JSON with the combined stdout/stderr output and the exit code.
`;

const RemoteShellSchema = z
  .object({
    ...connectionFields,
    command: z.string().min(1).describe('The shell command to execute'),
    timeoutMs: z
      .number()
      .int()
      .positive()
      .optional()
      .describe('Wall-clock budget for the command in milliseconds'),
  })
  .strict()
  .refine(hasCredential, { message: CREDENTIAL_REQUIRED_MESSAGE });

export type RemoteShellInput = z.infer<typeof RemoteShellSchema>;

export class RemoteShellAction extends RemoteAction<RemoteShellInput> {
  readonly name = 'remote_shell';
  readonly description = REMOTE_SHELL_PROMPT;
  readonly argsSchema = RemoteShellSchema;

  protected async run(input: RemoteShellInput): Promise<string> {
    const { command, timeoutMs, ...config } = input;

    const result = await withRemoteSession(config, (executor) => {
      const execution = executor.executeCommand(command);
      return timeoutMs
        ? withTimeout(execution, timeoutMs, `Command "${command}"`)
        : execution;
    });

    return JSON.stringify({
      output: result.output,
      exitCode: result.exitCode,
    });
  }
}
