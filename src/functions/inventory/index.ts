/**
 * Ansible dynamic inventory entry point.
 *
 * Parses --list / --host / --refresh-cache, runs the orchestrator, and
 * prints JSON on stdout. Diagnostics go to stderr through the logger.
 *
 * Exit codes:
 * - 0: success
 * - 1: fatal error (configuration, credentials, no region reachable)
 * - 2: inventory printed but some regions failed
 */

import { Command, CommanderError } from 'commander';
import type { InventoryConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { ConfigError, loadConfig } from './core/config';
import { AuthenticationError, FetchError } from './core/fetcher';
import { Orchestrator } from './core/orchestrator';
import type { OutcomeInfo } from './core/orchestrator';

const logger = setupLogger('cvm-inventory:main');

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_DEGRADED = 2;

type CliOptions = {
  list?: boolean;
  host?: string;
  refreshCache?: boolean;
  config?: string;
};

export interface MainDeps {
  /**
   * Builds the orchestrator for a loaded configuration.
   */
  createOrchestrator?: (config: InventoryConfig) => Orchestrator;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs the inventory CLI.
 *
 * @param argv - Full argument vector, including the node and script entries
 * @param deps - Optional overrides for testing
 * @returns Process exit code
 *
 * @example
 * main(['node', 'inventory', '--list']) // prints the inventory, resolves 0
 * main(['node', 'inventory', '--host', '203.0.113.10']) // prints one host's variables
 */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const createOrchestrator =
    deps.createOrchestrator ?? ((config: InventoryConfig) => new Orchestrator(config));

  const program = new Command()
    .name('tencentcloud-inventory')
    .description('Produce an Ansible inventory from Tencent Cloud CVM instances')
    .option('--list', 'list instances (default)')
    .option('--host <address>', 'show all the variables of a specific host')
    .option('--refresh-cache', 'force a refresh of the cache by calling the CVM API')
    .option('--config <path>', 'path to the YAML configuration file')
    .exitOverride()
    .configureOutput({
      writeOut: stdout,
      writeErr: stderr,
    });

  let options: CliOptions;
  try {
    program.parse(argv);
    options = program.opts<CliOptions>();
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.version'
        ? EXIT_OK
        : EXIT_FATAL;
    }
    throw error;
  }

  try {
    const config = await loadConfig(options.config, deps.env ?? process.env);
    const orchestrator = createOrchestrator(config);
    const refreshCache = options.refreshCache ?? false;

    let payload: unknown;
    let outcome: OutcomeInfo;
    if (options.host !== undefined) {
      const result = await orchestrator.host(options.host, refreshCache);
      payload = result.hostvars;
      outcome = result;
    } else {
      const result = await orchestrator.list(refreshCache);
      payload = result.inventory;
      outcome = result;
    }

    stdout(`${JSON.stringify(payload, null, 2)}\n`);

    if (outcome.failedRegions.length > 0) {
      stderr(
        `Warning: inventory is incomplete, failed regions: ${outcome.failedRegions
          .map((f) => f.region)
          .join(', ')}\n`
      );
      return EXIT_DEGRADED;
    }
    return EXIT_OK;
  } catch (error) {
    logger.error({ error: String(error) }, 'Inventory run failed');
    stderr(`Error: ${describeError(error)}\n`);
    return EXIT_FATAL;
  }
}

function describeError(error: unknown): string {
  if (error instanceof ConfigError) {
    return `invalid configuration: ${error.message}`;
  }
  if (error instanceof AuthenticationError) {
    return `authentication failed: ${error.message}`;
  }
  if (error instanceof FetchError) {
    return `could not list instances: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
