import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { createRemoteToolkit, getRemoteAction } from '../../actions';
import { ValidationError } from '../../lib/sanitization';
import { reportError } from './utility';

function parseInput(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Tool input must be valid JSON: ${error}`);
  }
}

export function registerToolCommands(program: Command) {
  const toolsCmd = program
    .command('tools')
    .description('Agent tool commands');

  // example: npx tsx src/cli/index.ts tools list
  toolsCmd
    .command('list')
    .description('List the tools exposed to agents')
    .action(() => {
      const table = new Table({
        head: ['Tool', 'Description'],
        colWidths: [16, 70],
        wordWrap: true,
      });

      for (const action of createRemoteToolkit()) {
        const summary = action.description.trim().split('\n')[0];
        table.push([action.name, summary]);
      }

      console.log(table.toString());
    });

  // example: npx tsx src/cli/index.ts tools run remote_shell --input '{"host":"10.0.0.5","username":"ubuntu","password":"secret","command":"uptime"}'
  toolsCmd
    .command('run')
    .description('Run a tool with JSON input')
    .argument('<name>', 'Tool name')
    .requiredOption('-i, --input <json>', 'Tool input as JSON')
    .action(async (name: string, options: { input: string }) => {
      try {
        const action = getRemoteAction(name);
        const result = await action.execute(parseInput(options.input));
        console.log(result);
      } catch (error) {
        reportError(error, `Tool ${name} failed`);
        process.exit(1);
      }
    });
}
