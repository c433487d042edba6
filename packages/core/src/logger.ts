/**
 * Structured logger for gitbrief.
 *
 * Writes run logs to `<dataDir>/logs/` so a failed scheduled run can be
 * inspected afterwards. Console echo is left to the CLI through `onLog`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for log files; no file is written when omitted */
  logDir?: string;
  /** Prefix of the log file name */
  fileLabel?: string;
  /** An optional callback invoked on every log entry (for testing / custom sinks) */
  onLog?: (entry: LogEntry) => void;
}

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private readonly logFilePath: string | null;
  private readonly onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.onLog = opts.onLog;

    if (opts.logDir) {
      fs.mkdirSync(opts.logDir, { recursive: true });
      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(opts.logDir, `${opts.fileLabel ?? 'run'}-${timestamp}.log`);
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.info('logger', 'Log session started', { logFile: this.logFilePath });
    } else {
      this.logFilePath = null;
    }
  }

  /** Path to the current log file, if any */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /** All entries captured this session (in-memory) */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  // ── Public logging methods ────────────────────────────────────────

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  // ── Specialised helpers ───────────────────────────────────────────

  /** Log a pipeline stage transition */
  stage(project: string, from: string, to: string): void {
    this.info('run', `${project}: ${from} -> ${to}`);
  }

  /** Log an LLM request being sent */
  llmRequest(opts: {
    provider: string;
    operation: string;
    model: string;
    inputTokens: number;
    commit?: string;
  }): void {
    this.debug('llm', `Sending ${opts.operation} request to ${opts.provider}/${opts.model}`, {
      inputTokens: opts.inputTokens,
      ...(opts.commit ? { commit: opts.commit } : {}),
    });
  }

  /** Log an LLM response received */
  llmResponse(opts: {
    provider: string;
    operation: string;
    model: string;
    outputTokens: number;
    latencyMs: number;
  }): void {
    this.info('llm', `Response from ${opts.provider}/${opts.model} (${opts.operation})`, {
      outputTokens: opts.outputTokens,
      latencyMs: opts.latencyMs,
    });
  }

  /** Log an LLM error with full API details */
  llmError(opts: {
    provider: string;
    operation: string;
    kind: string;
    errorMessage: string;
    statusCode?: number;
    attempt?: number;
    maxAttempts?: number;
  }): void {
    const data: Record<string, unknown> = {
      provider: opts.provider,
      operation: opts.operation,
      kind: opts.kind,
    };
    if (opts.statusCode !== undefined) data.statusCode = opts.statusCode;
    if (opts.attempt !== undefined) data.attempt = `${opts.attempt}/${opts.maxAttempts ?? '?'}`;
    this.error('llm', opts.errorMessage, data);
  }

  /** Flush and close the log file */
  close(): void {
    if (this.fileStream) {
      this.info('logger', 'Log session ended', {
        totalEntries: this.entries.length,
      });
      this.fileStream.end();
      this.fileStream = null;
    }
  }

  // ── Core write ────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    this.entries.push(entry);
    this.onLog?.(entry);
    this.fileStream?.write(formatLogLine(entry) + '\n');
  }
}

/** One log file line: timestamp, padded level, padded category, message, data */
export function formatLogLine(entry: LogEntry): string {
  const lvl = entry.level.toUpperCase().padEnd(5);
  const cat = `[${entry.category}]`.padEnd(10);
  let line = `${entry.timestamp} ${lvl} ${cat} ${entry.message}`;
  if (entry.data) {
    line += ' ' + JSON.stringify(entry.data);
  }
  return line;
}

// ─── Process logger (set once per CLI run) ──────────────────────────

let globalLogger: Logger | null = null;

/** Initialise the process logger. Call once at CLI startup. */
export function initLogger(opts: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}

/** Get the process logger, or a silent in-memory logger if none was initialised. */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
