/**
 * Program definition and exit-code mapping for the raw-transfer CLI.
 */

import { Command, CommanderError } from 'commander';
import { registerDownloadCommand } from './commands/download.js';
import { registerUploadCommand } from './commands/upload.js';
import { UsageError, errorMessage } from './core/errors.js';
import type { CliContext } from './utils/command-context.js';
import { ExitCode } from './utils/exit-codes.js';

export interface RunCliOptions extends CliContext {
  version?: string;
}

export function createProgram(
  context: CliContext,
  onExit: (code: ExitCode) => void,
  version = '0.0.0'
): Command {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;

  const program = new Command();

  // Settings below are inherited by the subcommands registered after them
  program
    .name('raw-transfer')
    .description('Upload and download directory trees to a raw artifact repository')
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        stdout.write(str);
      },
      writeErr: (str) => {
        stderr.write(str);
      },
    });

  registerUploadCommand(program, context, onExit);
  registerDownloadCommand(program, context, onExit);

  return program;
}

/**
 * Parse `argv` (node-style: executable and script first), run the command,
 * and return the process exit code. Never throws.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<ExitCode> {
  const stderr = options.stderr ?? process.stderr;
  let exitCode: ExitCode = ExitCode.Success;
  let quiet = false;

  const program = createProgram(options, (code) => {
    exitCode = code;
  }, options.version);
  program.hook('preAction', (_program, actionCommand) => {
    quiet = actionCommand.opts().quiet === true;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version exit 0; every other commander error is a usage error
      return err.exitCode === 0 ? ExitCode.Success : ExitCode.Usage;
    }
    if (err instanceof UsageError) {
      stderr.write(`error: ${err.message}\n`);
      return ExitCode.Usage;
    }
    // Configuration, listing and other fatal errors; --quiet leaves only the exit code
    if (!quiet) {
      stderr.write(`error: ${errorMessage(err)}\n`);
    }
    return ExitCode.Failure;
  }
}
