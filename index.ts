#!/usr/bin/env node

import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import {
  compareServers,
  listServers,
  scanServer,
  syncServers,
  type SyncOptions,
} from './src/mod-sync';
import { formatPlan, formatStructure } from './src/core/execute/sync-summary';
import { bold, dim, red, yellow } from './src/utils/logger';

function readVersion(): string {
  try {
    const packageJson = JSON.parse(
      fs.readFileSync(new URL('./package.json', import.meta.url), 'utf8'),
    );
    return typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

const VERSION = readVersion();

export function parseCliArgs(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      json: { type: 'boolean' },
      apply: { type: 'boolean' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  return {
    ...values,
    command: positionals[0],
    operands: positionals.slice(1),
  };
}

export type CliArgs = ReturnType<typeof parseCliArgs>;

export interface CliCommands {
  listServers: typeof listServers;
  scanServer: typeof scanServer;
  compareServers: typeof compareServers;
  syncServers: typeof syncServers;
}

const defaultCommands: CliCommands = {
  listServers,
  scanServer,
  compareServers,
  syncServers,
};

function showHelp() {
  console.log(`
${bold(`craftsync v${VERSION} - Keep a Minecraft server's mods in line with a client instance`)}

${bold('Usage:')}
  craftsync list
  craftsync scan <name>
  craftsync compare <client> <server> [--json]
  craftsync sync <client> <server> [--apply]

${bold('Options:')}
  --config=<path>         Server configuration file (default: ~/.craftsync/servers.toml)
  --json                  Print the comparison plan as JSON
  --apply                 Execute the sync plan instead of only printing it
  --quiet                 Show minimal output
  --verbose               Show detailed output including per-archive details
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  craftsync compare laptop survival
  craftsync sync laptop survival --apply
  craftsync scan survival --verbose
`);
}

function showVersion() {
  console.log(`craftsync v${VERSION}`);
}

function usageError(message: string): number {
  console.error(red(`Error: ${message}`));
  console.log();
  showHelp();
  return 1;
}

/**
 * Run one CLI invocation and resolve to the process exit code.
 */
export async function runCli(
  rawArgs: string[],
  signal?: AbortSignal,
  commands: CliCommands = defaultCommands,
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(rawArgs);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return usageError(errorMessage);
  }

  if (args.version) {
    showVersion();
    return 0;
  }
  if (args.help || !args.command) {
    showHelp();
    return 0;
  }

  const options: SyncOptions = {
    configPath: args.config,
    quiet: args.quiet || args.json,
    verbose: args.verbose,
    signal,
  };

  try {
    switch (args.command) {
      case 'list': {
        const listing = commands.listServers(options);
        if (listing.servers.length === 0) {
          console.log(yellow(`No servers are configured in ${listing.configPath}`));
          return 0;
        }
        for (const server of listing.servers) {
          console.log(`  ${bold(server.name)} ${dim(server.type)} ${server.location}`);
        }
        return 0;
      }

      case 'scan': {
        const [name] = args.operands;
        if (!name) {
          return usageError('scan needs a server name');
        }
        const structure = await commands.scanServer(name, options);
        for (const line of formatStructure(structure)) {
          console.log(line);
        }
        return 0;
      }

      case 'compare': {
        const [clientName, serverName] = args.operands;
        if (!clientName || !serverName) {
          return usageError('compare needs a client and a server name');
        }
        const plan = await commands.compareServers(clientName, serverName, options);
        if (args.json) {
          console.log(JSON.stringify(plan, null, 2));
        } else {
          for (const line of formatPlan(plan)) {
            console.log(line);
          }
        }
        return 0;
      }

      case 'sync': {
        const [clientName, serverName] = args.operands;
        if (!clientName || !serverName) {
          return usageError('sync needs a client and a server name');
        }
        const { report } = await commands.syncServers(clientName, serverName, {
          ...options,
          apply: args.apply,
        });
        return report && (report.counts.failed > 0 || report.aborted) ? 1 : 0;
      }

      default:
        return usageError(`Unknown command: ${args.command}`);
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(red(`Error: ${errorMessage}`));
    return 1;
  }
}

async function main() {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error(yellow('Interrupted; stopping after the current action...'));
    controller.abort();
  });

  process.exitCode = await runCli(process.argv.slice(2), controller.signal);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    console.error(red(`Error: ${errorMessage}`));
    process.exit(1);
  });
}
