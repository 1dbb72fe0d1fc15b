import { Command } from 'commander';
import chalk from 'chalk';
import { RemoteExecutor, buildCommand } from '../../classes/remote-executor';
import { resolveSessionConfig } from '../../lib/config';
import type { ConnectionOptions } from '../../lib/config';
import {
  sanitizeArgs,
  sanitizeCommand,
  sanitizeNumber,
} from '../../lib/sanitization';
import { probeServer } from '../../lib/session';
import { withTimeout } from '../../lib/timeout';
import { reportError, toProcessExitCode } from './utility';

function addConnectionOptions(command: Command): Command {
  return command
    .option('-H, --host <host>', 'Remote server hostname or IP address')
    .option('-u, --username <username>', 'SSH username')
    .option('-p, --port <port>', 'SSH port (default: 22)')
    .option(
      '--password <password>',
      'SSH password (not recommended for production)'
    )
    .option('--private-key <path>', 'Path to private key file')
    .option('--passphrase <passphrase>', 'Passphrase for private key')
    .option(
      '--timeout <timeout>',
      'Connection timeout in milliseconds (default: 20000)'
    );
}

interface ExecOptions extends ConnectionOptions {
  commandTimeout?: string;
}

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --host 127.0.0.1 --username user --password password --port 2222
  addConnectionOptions(
    program
      .command('ssh-test')
      .description('Test SSH connection to remote server')
  ).action(async (options: ConnectionOptions) => {
    console.log(chalk.bold('🔐 Testing SSH Connection...'));

    let executor: RemoteExecutor | null = null;
    let ok = false;

    try {
      const config = resolveSessionConfig(options);

      console.log(
        chalk.dim(
          `Connecting to ${config.username}@${config.host}:${config.port}\n`
        )
      );
      if (config.password && !config.privateKey && !config.privateKeyPath) {
        console.log(chalk.yellow('⚠️  Using password authentication'));
      } else {
        console.log(chalk.blue('🔑 Using private key authentication'));
      }

      executor = new RemoteExecutor(config);

      console.log(chalk.dim('Establishing connection...'));
      await executor.connect();

      console.log(chalk.dim('Testing connection...'));
      const serverInfo = await probeServer(executor);

      if (serverInfo.reachable) {
        ok = true;
        console.log(chalk.green('✅ SSH connection test successful!'));
        if (serverInfo.hostname) {
          console.log(chalk.dim('\n📋 Server Information:'));
          console.log(chalk.cyan(`   Hostname: ${serverInfo.hostname}`));
          console.log(chalk.cyan(`   Uptime: ${serverInfo.uptime}`));
        } else {
          console.log(
            chalk.yellow('⚠️  Could not retrieve server information')
          );
        }
      } else {
        console.log(chalk.red('❌ SSH connection test failed'));
      }
    } catch (error) {
      reportError(error, 'SSH connection failed');
    } finally {
      if (executor) {
        await executor.disconnect();
        console.log(chalk.dim('Connection closed'));
      }
    }

    if (!ok) {
      process.exit(1);
    }
  });

  // example: npx tsx src/cli/index.ts exec "ls -la" /tmp --host 127.0.0.1 --username user --password password
  addConnectionOptions(
    program
      .command('exec')
      .description('Run a command on the remote server')
      .argument('<command>', 'Command to execute')
      .argument('[args...]', 'Arguments, shell-escaped before sending')
      .option(
        '--command-timeout <ms>',
        'Stop waiting for the command after this many milliseconds'
      )
  ).action(async (command: string, args: string[], options: ExecOptions) => {
    let executor: RemoteExecutor | null = null;
    let exitCode = 1;

    try {
      const fullCommand = buildCommand(
        sanitizeCommand(command),
        sanitizeArgs(args)
      );
      const commandTimeout = options.commandTimeout
        ? sanitizeNumber(options.commandTimeout, 'command timeout', 1)
        : undefined;

      executor = new RemoteExecutor(resolveSessionConfig(options));
      await executor.connect();

      const execution = executor.executeCommand(fullCommand);
      const result = commandTimeout
        ? await withTimeout(execution, commandTimeout, `Command "${fullCommand}"`)
        : await execution;

      process.stdout.write(result.output);
      exitCode = toProcessExitCode(result.exitCode);
      if (result.exitCode === -1) {
        console.error(
          chalk.yellow('Command was terminated before reporting an exit status')
        );
      } else if (result.exitCode !== 0) {
        console.error(
          chalk.yellow(`Command exited with code ${result.exitCode}`)
        );
      }
    } catch (error) {
      reportError(error, 'Remote execution failed');
    } finally {
      if (executor) {
        await executor.disconnect();
      }
    }

    process.exit(exitCode);
  });
}
