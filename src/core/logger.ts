/**
 * logger.ts — Human-readable, timestamped logger for enrollment runs.
 *
 * Output format:
 *   `[2026-08-01T01:00:00.000Z] [INFO ] [AccountPipeline] 1234567890: 18285 enrolled`
 *
 * Callers log NIMs and course ids freely; passwords, decrypted credentials
 * and bearer tokens never go through this class.
 */

export type LogLevel = 'info' | 'warn' | 'error';

type Threshold = LogLevel | 'silent';

const LEVEL_RANK: Record<Threshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function currentThreshold(): Threshold {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return raw === 'warn' || raw === 'error' || raw === 'silent' ? raw : 'info';
}

/**
 * Usage:
 *   const logger = new Logger('Orchestrator');
 *   logger.info('Launching 12 account pipeline(s) with concurrency 4');
 */
export class Logger {
  /** Label prepended to every message. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Routine progress: login ok, target enrolled, run finished. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Recorded failures and unexpected-but-handled responses. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** Failures of the engine itself: store unreachable, pipeline crash. */
  error(message: string, err?: unknown): void {
    const printed = this.emit('error', message);
    if (printed && err) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): boolean {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentThreshold()]) {
      return false;
    }

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
    return true;
  }
}
