/**
 * 传输进度显示
 */

import ora, { Ora } from 'ora';
import { ProgressObserver, TransferProgress } from './types.js';

const BAR_WIDTH = 40;
const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(2)} ${UNITS[unit]}`;
}

/**
 * 40 列进度条：已完成 #，当前位置 >，剩余 -
 */
export function renderBar(transferred: number, total: number, width = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(transferred / total, 1) : 1;
  const filled = Math.floor(ratio * width);
  if (filled >= width) {
    return '#'.repeat(width);
  }
  return '#'.repeat(filled) + '>' + '-'.repeat(width - filled - 1);
}

export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return '--';
  }
  const rounded = Math.ceil(seconds);
  const h = Math.floor(rounded / 3600);
  const m = Math.floor((rounded % 3600) / 60);
  const s = rounded % 60;
  return h > 0 ? `${h}h${m}m` : m > 0 ? `${m}m${s}s` : `${s}s`;
}

export function describeProgress(progress: TransferProgress, elapsedMs: number): string {
  const rate = elapsedMs > 0 ? progress.transferred / (elapsedMs / 1000) : 0;
  const remaining = progress.total - progress.transferred;
  const eta = rate > 0 ? formatEta(remaining / rate) : '--';
  return `[${renderBar(progress.transferred, progress.total)}] `
    + `${formatBytes(progress.transferred)}/${formatBytes(progress.total)} (${eta})`;
}

export class SpinnerProgress implements ProgressObserver {
  private spinner: Ora | null = null;
  private startedAt = 0;

  constructor(private label = 'Uploading') {}

  start(total: number): void {
    this.startedAt = Date.now();
    this.spinner = ora(`${this.label} ${describeProgress({ transferred: 0, total, percent: 0 }, 0)}`).start();
  }

  update(progress: TransferProgress): void {
    if (this.spinner) {
      this.spinner.text = `${this.label} ${describeProgress(progress, Date.now() - this.startedAt)}`;
    }
  }

  complete(progress: TransferProgress): void {
    this.spinner?.succeed(`Transfer completed! ${formatBytes(progress.total)}`);
    this.spinner = null;
  }

  fail(error: Error): void {
    this.spinner?.fail(error.message);
    this.spinner = null;
  }
}
