import Transport from 'winston-transport';
import { LOG_CONSTANTS } from '../../../shared/src';

interface LogInfo {
  level: string;
  message: unknown;
  timestamp?: unknown;
  [key: string | symbol]: unknown;
}

// Uncolorized level, set by winston before any format runs
const LEVEL = Symbol.for('level');

/**
 * Winston transport keeping the last N formatted log lines in memory
 *
 * Backs the `GET /?showlog=1` view, which lets users of the desktop
 * build read the log without a console.
 */
export class RecentLogTransport extends Transport {
  private readonly capacity: number;
  private lines: string[] = [];

  constructor(options: Transport.TransportStreamOptions & { capacity?: number } = {}) {
    super(options);
    this.capacity = options.capacity ?? LOG_CONSTANTS.RECENT_LOG_LINES;
  }

  log(info: LogInfo, callback: () => void): void {
    this.push(formatLine(info));
    callback();
  }

  push(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  clear(): void {
    this.lines = [];
  }
}

function formatLine(info: LogInfo): string {
  const { message, timestamp } = info;
  const rawLevel = info[LEVEL];
  const level = typeof rawLevel === 'string' ? rawLevel : info.level;
  const time = typeof timestamp === 'string' ? timestamp : new Date().toISOString();
  return `${time} [${level}]: ${String(message)}`;
}
