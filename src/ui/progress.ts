/**
 * Progress display for a run: one bar that advances per finished job
 */

import pc from "picocolors";

export interface ProgressBarOptions {
  total: number;
  label?: string;
  width?: number;
  quiet?: boolean;
  /** Raw terminal writer; defaults to stdout when it is a TTY */
  write?: (chunk: string) => void;
  now?: () => number;
}

export interface ProgressBar {
  tick: (message?: string) => void;
  /** Erase the bar so normal output can follow */
  clear: () => void;
  finish: () => void;
}

/**
 * Format seconds as human-readable duration
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  } else if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  } else {
    const hours = Math.floor(seconds / 3600);
    const mins = Math.round((seconds % 3600) / 60);
    return `${hours}h ${mins}m`;
  }
}

function defaultWriter(): ((chunk: string) => void) | null {
  if (!process.stdout.isTTY) return null;
  return (chunk) => {
    process.stdout.write(chunk);
  };
}

export function renderBar(current: number, total: number, width: number): string {
  const ratio = total > 0 ? Math.min(1, current / total) : 1;
  const filledWidth = Math.round(ratio * width);
  const filled = "█".repeat(filledWidth);
  const empty = "░".repeat(width - filledWidth);
  return `[${filled}${empty}] ${Math.round(ratio * 100)}% (${current}/${total})`;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBar {
  const { total, label = "", width = 30, quiet = false, now = Date.now } = options;
  const write = quiet ? null : (options.write ?? defaultWriter());
  const startTime = now();
  let current = 0;
  let lastRenderedLine = "";

  function render(message?: string) {
    if (!write) return;

    let line = label ? `${pc.bold(pc.blue(label))} ${renderBar(current, total, width)}` : renderBar(current, total, width);

    const elapsed = (now() - startTime) / 1000;
    line += pc.dim(` • ${formatDuration(elapsed)}`);
    if (current > 0 && current < total) {
      const remaining = (elapsed / current) * (total - current);
      line += pc.dim(` • ~${formatDuration(remaining)} remaining`);
    }
    if (message) {
      line += ` ${pc.dim(message)}`;
    }

    if (line !== lastRenderedLine) {
      write(`\r\x1b[K${line}`);
      lastRenderedLine = line;
    }
  }

  return {
    tick(message?: string) {
      current = Math.min(total, current + 1);
      render(message);
    },

    clear() {
      if (write && lastRenderedLine) {
        write("\r\x1b[K");
        lastRenderedLine = "";
      }
    },

    finish() {
      if (write && lastRenderedLine) {
        write("\n");
        lastRenderedLine = "";
      }
    },
  };
}
