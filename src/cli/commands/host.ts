import chalk from 'chalk';
import type { Command } from 'commander';
import { action, list, parseEnvPairs, printJson, type GlobalOptions } from '../context.js';

interface HostAddOptions {
  tag: string[];
  env: Record<string, string>;
}

interface HostUpdateOptions {
  tag?: string[];
  env?: Record<string, string>;
}

export function registerHostCommands(program: Command, globals: () => GlobalOptions): void {
  const host = program.command('host').description('Manage hosts');

  host
    .command('add <name> <address>')
    .description('Register a host (address is user@host, or "local")')
    .option('-t, --tag <tags>', 'Tags, comma separated (repeatable)', list, [])
    .option('-e, --env <KEY=VALUE>', 'Environment for remote commands (repeatable)', parseEnvPairs, {})
    .action(
      action(globals, async (orchestrator, name: string, address: string, options: HostAddOptions) => {
        const added = await orchestrator.model.addHost({ name, address, tags: options.tag, env: options.env });
        console.log(chalk.green(`Host '${added.name}' added (${added.address})`));
      })
    );

  host
    .command('list')
    .description('List hosts')
    .option('--json', 'Print JSON')
    .action(
      action(globals, async (orchestrator, options: { json?: boolean }) => {
        const hosts = await orchestrator.model.listHosts();
        if (options.json) {
          printJson(hosts);
          return;
        }
        for (const h of hosts) {
          const tags = h.tags.length > 0 ? chalk.gray(` [${h.tags.join(', ')}]`) : '';
          console.log(`${chalk.cyan(h.name)}  ${h.address}${tags}`);
        }
      })
    );

  host
    .command('update <name>')
    .description('Replace the tags and/or env of a host')
    .option('-t, --tag <tags>', 'Tags, comma separated (repeatable)', list)
    .option('-e, --env <KEY=VALUE>', 'Environment (repeatable)', parseEnvPairs)
    .action(
      action(globals, async (orchestrator, name: string, options: HostUpdateOptions) => {
        await orchestrator.model.updateHost(name, { tags: options.tag, env: options.env });
        console.log(chalk.green(`Host '${name}' updated`));
      })
    );

  host
    .command('remove <name>')
    .description('Remove a host that no feature is attached to')
    .action(
      action(globals, async (orchestrator, name: string) => {
        await orchestrator.model.removeHost(name);
        console.log(chalk.green(`Host '${name}' removed`));
      })
    );
}
