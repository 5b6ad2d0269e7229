/**
 * Event log for the alias index, the identity cache and the migration
 *
 * Lines read `[time] [LEVEL] [event] scope/record message {details}`; the
 * location, message and details parts are left out when absent. Debug lines
 * are written only while STONEWARD_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Dotted event name such as `index.rebuild.end` */
  event: string;
  /** World scope the event concerns */
  scope?: string;
  /** Protected area id the event concerns */
  record?: string;
  message?: string;
  details?: Record<string, unknown>;
}

type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function formatEntry(entry: LogEntry): string {
  const line = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.scope !== undefined || entry.record !== undefined) {
    line.push(`${entry.scope ?? "*"}/${entry.record ?? ""}`);
  }
  if (entry.message) line.push(entry.message);
  if (entry.details) line.push(JSON.stringify(entry.details));
  return line.join(" ");
}

class EventLogger {
  #enabled = true;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.STONEWARD_DEBUG) return;

    SINKS[level](formatEntry({ timestamp: new Date().toISOString(), level, event, ...fields }));
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  /** Switch every level on or off; tests and the CLI turn it off */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  isEnabled(): boolean {
    return this.#enabled;
  }
}

export const logger = new EventLogger();
