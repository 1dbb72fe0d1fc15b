import { RemoteExecutor } from '../classes/remote-executor';
import type { ServerInfo, SessionConfig } from '../interfaces';
import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * Connect, hand the executor to `fn`, and always disconnect afterwards.
 */
export async function withRemoteSession<T>(
  config: SessionConfig,
  fn: (executor: RemoteExecutor) => Promise<T>
): Promise<T> {
  const executor = new RemoteExecutor(config);

  try {
    await executor.connect();
    return await fn(executor);
  } finally {
    await executor.disconnect();
  }
}

/**
 * Check that commands run on the server and collect basic host details
 */
export async function probeServer(executor: RemoteExecutor): Promise<ServerInfo> {
  const echo = await executor.executeCommand('echo "Connection test successful"');
  if (echo.exitCode !== 0) {
    return { reachable: false, hostname: '', uptime: '' };
  }

  try {
    const hostname = await executor.executeCommand('hostname');
    const uptime = await executor.executeCommand('uptime');

    return {
      reachable: true,
      hostname: hostname.output.trim(),
      uptime: uptime.output.trim(),
    };
  } catch (error) {
    logger.warn('Could not retrieve server information', {
      host: executor.host,
      error: errorMessage(error),
    });
    return { reachable: true, hostname: '', uptime: '' };
  }
}
