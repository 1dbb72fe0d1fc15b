import sinon from 'sinon';
import { NodeSSH } from 'node-ssh';
import type { SSHExecCommandOptions, SSHExecCommandResponse } from 'node-ssh';
import { Client, Server, utils } from 'ssh2';
import type { ClientChannel } from 'ssh2';

/**
 * Await a promise that is expected to reject and hand back the error
 */
export async function captureError(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw new Error(`Rejected with a non-Error value: ${String(error)}`);
  }
  throw new Error('Expected promise to reject');
}

export interface FakeCommand {
  stdout?: string[];
  stderr?: string[];
  code?: number | null;
  signal?: string | null;
}

/**
 * Replay stdout/stderr chunks through the execCommand callbacks, stdout
 * chunks first, then stderr chunks.
 */
export function replay(
  fake: FakeCommand,
  options: SSHExecCommandOptions | undefined
): SSHExecCommandResponse {
  for (const chunk of fake.stdout ?? []) {
    options?.onStdout?.(Buffer.from(chunk));
  }
  for (const chunk of fake.stderr ?? []) {
    options?.onStderr?.(Buffer.from(chunk));
  }
  return {
    stdout: (fake.stdout ?? []).join(''),
    stderr: (fake.stderr ?? []).join(''),
    code: fake.code === undefined ? 0 : fake.code,
    signal: fake.signal ?? null,
  };
}

/**
 * Stub the transport so nothing leaves the process. A successful connect
 * installs `client` as the live connection, which is never opened.
 */
export function stubTransport(
  sandbox: sinon.SinonSandbox,
  client: Client = new Client()
) {
  return {
    client,
    connect: sandbox
      .stub(NodeSSH.prototype, 'connect')
      .callsFake(async function (this: NodeSSH) {
        this.connection = client;
        return this;
      }),
    execCommand: sandbox.stub(NodeSSH.prototype, 'execCommand'),
    dispose: sandbox.stub(NodeSSH.prototype, 'dispose'),
  };
}

/**
 * Let execCommand reach the real transport, handing every channel it
 * opens to `onOpen` after the executor has seen it.
 */
export function watchChannels(
  sandbox: sinon.SinonSandbox,
  onOpen: (channel: ClientChannel) => void
) {
  const execCommand = NodeSSH.prototype.execCommand;
  return sandbox
    .stub(NodeSSH.prototype, 'execCommand')
    .callsFake(function (
      this: NodeSSH,
      command: string,
      options: SSHExecCommandOptions = {}
    ) {
      return execCommand.call(this, command, {
        ...options,
        onChannel: (channel) => {
          options.onChannel?.(channel);
          onOpen(channel);
        },
      });
    });
}

export interface TestServer {
  port: number;
  close(): Promise<void>;
}

/**
 * SSH server on a loopback port. Accepts test-user/test-password only.
 * `hang` writes "partial" and never exits; any other command prints
 * "ran <command>" on stdout and " with a warning" on stderr, then exits 0.
 */
export async function startTestServer(): Promise<TestServer> {
  const hostKey = utils.generateKeyPairSync('ed25519').private;

  const server = new Server({ hostKeys: [hostKey] }, (client) => {
    // the executor may drop the socket mid-command
    client.on('error', () => undefined);

    client.on('authentication', (ctx) => {
      if (
        ctx.method === 'password' &&
        ctx.username === testConfig.username &&
        ctx.password === testConfig.password
      ) {
        ctx.accept();
      } else {
        ctx.reject(['password']);
      }
    });

    client.on('session', (acceptSession) => {
      const session = acceptSession();
      session.on('exec', (acceptExec, _rejectExec, info) => {
        const stream = acceptExec();
        if (info.command === 'hang') {
          stream.write('partial');
          return;
        }
        stream.write(`ran ${info.command}`);
        stream.stderr.write(' with a warning');
        stream.exit(0);
        stream.end();
      });
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', resolve);
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }

  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export const testConfig = {
  host: 'test-host',
  username: 'test-user',
  password: 'test-password',
  port: 22,
};
