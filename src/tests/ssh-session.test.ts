import { expect } from 'chai';
import { describe, it, before, after, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import type { ClientChannel } from 'ssh2';
import { RemoteExecutor } from '../classes/remote-executor';
import { CommandExecutionError } from '../lib/errors';
import {
  captureError,
  startTestServer,
  testConfig,
  watchChannels,
} from './helpers';
import type { TestServer } from './helpers';

describe('RemoteExecutor over a loopback SSH server', function () {
  this.timeout(10000);

  let server: TestServer;
  let sandbox: sinon.SinonSandbox;

  before(async () => {
    server = await startTestServer();
  });

  after(async () => {
    await server.close();
  });

  beforeEach(() => {
    sandbox = sinon.createSandbox();
  });

  afterEach(() => {
    sandbox.restore();
  });

  function loopbackExecutor(): RemoteExecutor {
    return new RemoteExecutor({
      ...testConfig,
      host: '127.0.0.1',
      port: server.port,
    });
  }

  it('should collect stdout and stderr from a real channel', async () => {
    const executor = loopbackExecutor();
    await executor.connect();

    try {
      const result = await executor.executeCommand('uptime');

      expect(result).to.deep.equal({
        output: 'ran uptime with a warning',
        exitCode: 0,
      });
    } finally {
      await executor.disconnect();
    }
  });

  it('should reject instead of returning partial output when the channel errors', async () => {
    watchChannels(sandbox, (channel) => {
      channel.emit('error', new Error('channel reset'));
    });
    const executor = loopbackExecutor();
    await executor.connect();

    try {
      const error = await captureError(executor.executeCommand('hang'));

      expect(error).to.be.instanceOf(CommandExecutionError);
      expect(error.message).to.equal(
        'Command execution failed: channel reset'
      );
    } finally {
      await executor.disconnect();
    }
  });

  it('should close the open channel when disconnected mid-command', async () => {
    let markOpen: (channel: ClientChannel) => void = () => undefined;
    const opened = new Promise<ClientChannel>((resolve) => {
      markOpen = resolve;
    });
    watchChannels(sandbox, (channel) => markOpen(channel));
    const executor = loopbackExecutor();
    await executor.connect();

    const failure = captureError(executor.executeCommand('hang'));
    const channel = await opened;
    const close = sandbox.spy(channel, 'close');

    await executor.disconnect();
    const error = await failure;

    expect(close.calledOnce).to.equal(true);
    expect(error).to.be.instanceOf(CommandExecutionError);
    expect(error.message).to.equal(
      'Command execution failed: SSH session was disconnected while the command was running'
    );
  });
});
