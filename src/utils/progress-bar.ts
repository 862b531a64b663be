/**
 * Single-line byte progress bar, redrawn in place with a carriage return.
 */

import chalk from 'chalk';
import type { OutputStream } from './ui.js';

const BAR_WIDTH = 30;
const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export class ProgressBar {
  private readonly stream: OutputStream;
  private readonly label: string;
  private readonly total: number;
  private current = 0;
  private lastDrawn = -1;

  /** `total` of 0 means unknown: only the byte count is shown */
  constructor(stream: OutputStream, label: string, total: number) {
    this.stream = stream;
    this.label = label;
    this.total = total;
  }

  advance(bytes: number): void {
    this.current += bytes;
    this.draw();
  }

  update(current: number): void {
    this.current = current;
    this.draw();
  }

  finish(): void {
    this.draw(true);
    this.stream.write('\n');
  }

  render(): string {
    if (this.total <= 0) {
      return `${this.label} ${formatBytes(this.current)}`;
    }
    const ratio = Math.min(this.current / this.total, 1);
    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = chalk.cyan('█'.repeat(filled)) + chalk.dim('░'.repeat(BAR_WIDTH - filled));
    const pct = Math.round(ratio * 100);
    return `${this.label} ${bar} ${pct}% ${formatBytes(this.current)}/${formatBytes(this.total)}`;
  }

  private draw(force = false): void {
    // Redraw at most once per percent on known totals
    const mark = this.total > 0 ? Math.floor((this.current / this.total) * 100) : this.current;
    if (!force && mark === this.lastDrawn) return;
    this.lastDrawn = mark;
    this.stream.write(`\r${this.render()}`);
  }
}
