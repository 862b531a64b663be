/**
 * Per-invocation wiring shared by the upload and download commands:
 * output, logger, configuration and transport.
 */

import type { Command } from 'commander';
import type { Logger } from 'pino';
import { loadRepositoryConfig } from '../core/config/config.js';
import type { RepositoryConfig } from '../core/config/types.js';
import { createLogger } from '../core/logger.js';
import { HttpTransport } from '../core/transport/http-transport.js';
import type { OutputStream } from './ui.js';
import { Ui } from './ui.js';

/** Host environment a CLI invocation runs against */
export interface CliContext {
  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;

  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Explicit config file path */
  configPath?: string;

  /** Logger to use instead of one built from the flags */
  logger?: Logger;

  stdout?: OutputStream;
  stderr?: OutputStream;
}

/** Flags every transfer command accepts */
export interface CommonCommandOptions {
  quiet?: boolean;
  verbose?: boolean;
  glob?: string;
  dryRun?: boolean;
  url?: string;
  username?: string;
  password?: string;
}

/** Repository connection flags; each beats the environment and the config file */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('--url <url>', 'repository base URL (default: $NEXUS_URL)')
    .option('--username <name>', 'repository user (default: $NEXUS_USER)')
    .option('--password <password>', 'repository password (default: $NEXUS_PASS)');
}

function connectionOverrides(options: CommonCommandOptions): Partial<RepositoryConfig> {
  const overrides: Partial<RepositoryConfig> = {};
  if (options.url) overrides.baseUrl = options.url;
  if (options.username) overrides.username = options.username;
  if (options.password) overrides.password = options.password;
  return overrides;
}

export interface CommandEnvironment {
  ui: Ui;
  logger: Logger;
  config: RepositoryConfig;
  transport: HttpTransport;
}

/**
 * Build the UI, logger, config and transport for one command run.
 * Throws ConfigError when the configuration is invalid.
 */
export function prepareCommand(
  context: CliContext,
  options: CommonCommandOptions
): CommandEnvironment {
  const quiet = options.quiet ?? false;
  const ui = new Ui({
    stdout: context.stdout ?? process.stdout,
    stderr: context.stderr ?? process.stderr,
    quiet,
  });

  const logger =
    context.logger ??
    createLogger({
      level: quiet ? 'silent' : options.verbose ? 'debug' : 'warn',
      pretty: options.verbose === true && !quiet,
    });

  const config = loadRepositoryConfig(connectionOverrides(options), {
    env: context.env,
    configPath: context.configPath,
    onWarning: (message) => ui.warn(message),
  });

  logger.debug({ baseUrl: config.baseUrl, username: config.username }, 'Loaded configuration');

  const transport = new HttpTransport(config, logger, { fetchFn: context.fetchFn });
  return { ui, logger, config, transport };
}
