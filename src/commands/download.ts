/**
 * raw-transfer download <repository/folder> <dest>
 *
 * Lists every raw asset under the folder and downloads them in parallel,
 * preserving repository paths under <dest>.
 */

import type { Command } from 'commander';
import { AssetLister, filterAssets } from '../core/download/asset-lister.js';
import { DownloadCoordinator, totalRecordedSize } from '../core/download/download-coordinator.js';
import { errorMessage } from '../core/errors.js';
import { parseGlobFilter } from '../core/filter/glob-filter.js';
import type { CliContext, CommonCommandOptions } from '../utils/command-context.js';
import { addConnectionOptions, prepareCommand } from '../utils/command-context.js';
import { ExitCode } from '../utils/exit-codes.js';
import { ProgressBar } from '../utils/progress-bar.js';
import { parseDownloadSource } from '../utils/repository-path.js';
import { pluralize } from '../utils/ui.js';

export interface DownloadCommandOptions extends CommonCommandOptions {
  flatten?: boolean;
}

/**
 * Run a download and return the exit code.
 */
export async function runDownload(
  src: string,
  dest: string,
  options: DownloadCommandOptions,
  context: CliContext
): Promise<ExitCode> {
  const { repository, folder } = parseDownloadSource(src);
  const { ui, logger, config, transport } = prepareCommand(context, options);

  const lister = new AssetLister(transport, logger);
  const listed = await lister.listAssets(repository, folder);
  const assets = filterAssets(listed, folder, parseGlobFilter(options.glob));

  if (assets.length === 0) {
    ui.info(`No assets found in folder '${folder}' in repository '${repository}'`);
    return ExitCode.Success;
  }

  const coordinator = new DownloadCoordinator(config, transport, logger);
  const placement = { basePath: folder, flatten: options.flatten ?? false };

  if (options.dryRun) {
    const plan = coordinator.planTasks(assets, dest, placement);
    ui.info(
      `Would download ${pluralize(plan.tasks.length, 'file')} from '${folder}' in repository '${repository}' to '${dest}'`
    );
    for (const task of plan.tasks) {
      ui.item(`${task.asset.path} -> ${task.localPath}`);
    }
    for (const rejected of plan.rejected) {
      ui.warn(rejected.error?.message ?? `Refusing to download ${rejected.assetPath}`);
    }
    return ExitCode.Success;
  }

  const bar = ui.progressEnabled
    ? new ProgressBar(ui.stdout, 'Downloading', totalRecordedSize(assets))
    : null;

  const outcome = await coordinator.downloadAll(assets, dest, {
    ...placement,
    quiet: options.quiet,
    onProgress: bar ? (progress) => bar.advance(progress.chunkBytes) : undefined,
  });

  bar?.finish();

  if (outcome.success) {
    ui.success(
      `Downloaded ${outcome.total} files from '${folder}' in repository '${repository}' to '${dest}'`
    );
    return ExitCode.Success;
  }

  ui.error(
    `Downloaded ${outcome.succeeded} of ${outcome.total} files from '${folder}' in repository '${repository}' to '${dest}'. ${outcome.failed} failed.`
  );
  ui.failures(
    outcome.results
      .filter((result) => !result.success)
      .map((result) => ({
        path: result.assetPath,
        message: result.error ? errorMessage(result.error) : 'unknown error',
      }))
  );
  return ExitCode.Failure;
}

export function registerDownloadCommand(
  program: Command,
  context: CliContext,
  onExit: (code: ExitCode) => void
): void {
  const command = program
    .command('download')
    .description('Download every file under a repository folder')
    .argument('<src>', 'repository/folder to download from')
    .argument('<dest>', 'local destination directory')
    .option('-q, --quiet', 'suppress output and progress')
    .option('-v, --verbose', 'debug logging')
    .option('--glob <patterns>', 'comma-separated globs relative to the folder; prefix ! to exclude')
    .option('--dry-run', 'list what would be downloaded without writing files')
    .option('--flatten', 'place files relative to the folder instead of the repository root');

  addConnectionOptions(command)
    .action(async (src: string, dest: string, options: DownloadCommandOptions) => {
      onExit(await runDownload(src, dest, options, context));
    });
}
