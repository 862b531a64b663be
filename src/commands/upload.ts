/**
 * raw-transfer upload <src> <repository[/subdir]>
 *
 * Posts every file under <src> to the repository as a single raw component.
 */

import type { Command } from 'commander';
import { UploadEncoder } from '../core/upload/upload-encoder.js';
import type { CliContext, CommonCommandOptions } from '../utils/command-context.js';
import { addConnectionOptions, prepareCommand } from '../utils/command-context.js';
import { ExitCode } from '../utils/exit-codes.js';
import { ProgressBar } from '../utils/progress-bar.js';
import { parseUploadDestination } from '../utils/repository-path.js';
import { pluralize } from '../utils/ui.js';

export type UploadCommandOptions = CommonCommandOptions;

/**
 * Run an upload and return the exit code.
 */
export async function runUpload(
  src: string,
  dest: string,
  options: UploadCommandOptions,
  context: CliContext
): Promise<ExitCode> {
  const { repository, directory } = parseUploadDestination(dest);
  const { ui, logger, config, transport } = prepareCommand(context, options);

  const encoder = new UploadEncoder(transport, config, logger);
  const progress: { bar: ProgressBar | null } = { bar: null };

  const outcome = await encoder.uploadAll(src, repository, {
    directory,
    glob: options.glob,
    dryRun: options.dryRun,
    quiet: options.quiet,
    onProgress: ui.progressEnabled
      ? (update) => {
        progress.bar ??= new ProgressBar(ui.stdout, 'Uploading', update.totalBytes);
        progress.bar.update(update.bytesSent);
      }
      : undefined,
  });

  progress.bar?.finish();

  if (options.dryRun && outcome.success) {
    const target = directory ? `${repository}/${directory}` : repository;
    ui.info(`Would upload ${pluralize(outcome.fileCount, 'file')} from ${src} to ${target}`);
    for (const entry of outcome.manifest.entries) {
      ui.item(entry.relativePath);
    }
    return ExitCode.Success;
  }

  if (!outcome.success) {
    ui.error(outcome.error?.message ?? 'Failed to upload files');
    return ExitCode.Failure;
  }

  ui.success(`Uploaded ${outcome.fileCount} files from ${src}`);
  return ExitCode.Success;
}

export function registerUploadCommand(
  program: Command,
  context: CliContext,
  onExit: (code: ExitCode) => void
): void {
  const command = program
    .command('upload')
    .description('Upload a local directory tree as one raw component')
    .argument('<src>', 'local directory to upload')
    .argument('<dest>', 'repository[/subdir] to upload into')
    .option('-q, --quiet', 'suppress output and progress')
    .option('-v, --verbose', 'debug logging')
    .option('--glob <patterns>', 'comma-separated globs relative to <src>; prefix ! to exclude')
    .option('--dry-run', 'list what would be uploaded without sending anything');

  addConnectionOptions(command)
    .action(async (src: string, dest: string, options: UploadCommandOptions) => {
      onExit(await runUpload(src, dest, options, context));
    });
}
