/**
 * Progress bars for the hashing and directory phases of a scan
 */

import type { ProgressCallback, ProgressEvent } from './types.js';

export interface ProgressOptions {
  total: number;
  label: string;
  /** Where the bar is drawn; stderr keeps stdout clean for reports. */
  stream?: NodeJS.WritableStream;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  eta: number;
  rate: number;
}

const BAR_WIDTH = 20;
const REDRAW_INTERVAL_MS = 100;

function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}

/**
 * Single-line bar redrawn in place, at most every 100ms until the last item
 */
export class ProgressTracker {
  private current = 0;
  private startTime = Date.now();
  private lastDraw = 0;
  private stream: NodeJS.WritableStream;

  constructor(private options: ProgressOptions) {
    this.stream = options.stream ?? process.stderr;
  }

  set(value: number): void {
    this.current = Math.min(Math.max(value, 0), this.options.total);
    this.draw();
  }

  complete(): void {
    this.current = this.options.total;
    this.draw();
    this.stream.write('\n');
  }

  getStats(): ProgressStats {
    const { total } = this.options;
    const elapsed = (Date.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;

    return {
      current: this.current,
      total,
      percent: total > 0 ? (this.current / total) * 100 : 100,
      elapsed: Math.round(elapsed),
      eta: rate > 0 ? Math.round((total - this.current) / rate) : 0,
      rate: Math.round(rate * 10) / 10,
    };
  }

  private draw(): void {
    const stats = this.getStats();
    const now = Date.now();
    if (now - this.lastDraw < REDRAW_INTERVAL_MS && stats.current < stats.total) return;
    this.lastDraw = now;

    const filled = Math.round((stats.percent / 100) * BAR_WIDTH);
    const parts = [
      `${this.options.label}:`,
      `[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}]`,
      `${stats.current}/${stats.total}`,
      `${Math.round(stats.percent)}%`,
      formatDuration(stats.elapsed),
    ];
    if (stats.current > 0 && stats.current < stats.total) {
      parts.push(`ETA ${formatDuration(stats.eta)}`, `${stats.rate} items/s`);
    }

    this.stream.write('\r' + ' '.repeat(120));
    this.stream.write('\r' + parts.join(' '));
  }
}

const PHASE_LABELS: Record<ProgressEvent['phase'], string> = {
  files: 'Hashing files',
  directories: 'Fingerprinting directories'
};

/**
 * Progress callback that draws one bar per scan phase, starting a fresh bar
 * whenever the phase or its total changes.
 */
export function createProgressReporter(stream: NodeJS.WritableStream = process.stderr): ProgressCallback {
  let tracker: ProgressTracker | null = null;
  let key = '';

  return event => {
    const eventKey = `${event.phase}:${event.total}`;
    if (!tracker || key !== eventKey) {
      key = eventKey;
      tracker = new ProgressTracker({ total: event.total, label: PHASE_LABELS[event.phase], stream });
    }
    if (event.completed >= event.total) {
      tracker.complete();
      tracker = null;
      key = '';
    } else {
      tracker.set(event.completed);
    }
  };
}
