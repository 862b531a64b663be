import chalk from 'chalk';

/** The part of a writable stream the UI needs */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface UiOptions {
  stdout: OutputStream;
  stderr: OutputStream;
  /** Suppress all text output; the exit code is the only signal */
  quiet?: boolean;
}

const MAX_LISTED_FAILURES = 5;

export class Ui {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly quiet: boolean;

  constructor(options: UiOptions) {
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.quiet = options.quiet ?? false;
  }

  /** Progress bars are drawn only on an interactive stdout */
  get progressEnabled(): boolean {
    return !this.quiet && this.stdout.isTTY === true;
  }

  success(msg: string): void {
    if (this.quiet) return;
    this.stdout.write(chalk.green('✓') + ' ' + msg + '\n');
  }

  info(msg: string): void {
    if (this.quiet) return;
    this.stdout.write(chalk.dim('~') + ' ' + msg + '\n');
  }

  item(msg: string): void {
    if (this.quiet) return;
    this.stdout.write('  ' + msg + '\n');
  }

  warn(msg: string): void {
    if (this.quiet) return;
    this.stderr.write(chalk.yellow('!') + ' ' + msg + '\n');
  }

  error(msg: string): void {
    if (this.quiet) return;
    this.stderr.write(chalk.red('✗') + ' ' + msg + '\n');
  }

  /**
   * List failed items, at most five, then a count of the rest.
   */
  failures(items: Array<{ path: string; message: string }>): void {
    if (this.quiet) return;
    for (const failure of items.slice(0, MAX_LISTED_FAILURES)) {
      this.error(`${failure.path}: ${failure.message}`);
    }
    if (items.length > MAX_LISTED_FAILURES) {
      this.error(`... and ${items.length - MAX_LISTED_FAILURES} more`);
    }
  }
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}
