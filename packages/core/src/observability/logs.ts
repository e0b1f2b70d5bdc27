/**
 * Build event log
 *
 * One line per event: `[ts] [LEVEL] [event] subject message {details}`, where
 * the subject is the document id, or the source file name when no id exists
 * yet. Lines go to stderr so stdout stays free for command output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Dotted event name, e.g. `build.start` or `document.failed` */
  event: string;
  /** Document identifier (`YYYY-MM-DD-slug`) */
  id?: string;
  file?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

export type LogSink = (line: string, entry: LogEntry) => void;

const stderrSink: LogSink = (line) => {
  console.error(line);
};

/**
 * Render an entry as a single log line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  const subject = entry.id ?? entry.file;
  if (subject) {
    parts.push(subject);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }
  return parts.join(" ");
}

class Logger {
  #enabled = true;
  #sink: LogSink = stderrSink;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    // Debug lines only with DAYBOOK_DEBUG set
    if (level === "debug" && !process.env.DAYBOOK_DEBUG) return;

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, event, ...fields };
    this.#sink(formatLogEntry(entry), entry);
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

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Send lines to another sink; without one, back to stderr
   */
  setSink(sink: LogSink = stderrSink): void {
    this.#sink = sink;
  }
}

export const logger = new Logger();
