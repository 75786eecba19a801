import type { ConsoleMessage, Page } from 'playwright';

import type { ConsoleEntry, ConsoleLevel } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// ── Public interface ─────────────────────────────────────────

export interface CaptureCollector {
  /** Return accumulated console entries and reset the buffer. */
  flush(): ConsoleEntry[];
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Attach console listeners to a Playwright page.
 * Call once at page creation; listeners persist for the session.
 * The buffer keeps the most recent `limit` entries.
 */
export function attachCapture(
  page: Page,
  limit: number = LIMITS.MAX_CONSOLE_LINES,
): CaptureCollector {
  let entries: ConsoleEntry[] = [];

  const push = (entry: ConsoleEntry): void => {
    entries.push(entry);
    if (entries.length > limit) entries.shift();
  };

  page.on('console', (msg) => {
    push({ level: consoleLevel(msg), text: msg.text() });
  });

  page.on('pageerror', (error) => {
    push({ level: 'error', text: `Uncaught ${error.message}` });
  });

  return {
    flush(): ConsoleEntry[] {
      const captured = entries;
      entries = [];
      return captured;
    },
  };
}

function consoleLevel(msg: ConsoleMessage): ConsoleLevel {
  switch (msg.type()) {
    case 'error':
      return 'error';
    case 'warning':
      return 'warn';
    case 'info':
      return 'info';
    case 'debug':
      return 'debug';
    default:
      return 'log';
  }
}
