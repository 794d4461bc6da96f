/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { CONFIG } from "@/config/config";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import {
  LogLevel,
  LogCategory,
  LOG_LEVEL_RANK,
  isLogLevel,
  isLogCategory,
} from "@/shared/constants/LogEnums";

/**
 * Logging utility for the navigation core.
 *
 * Features:
 * - Console output with colored levels, filtered by a minimum level
 * - Bounded memory buffer with optional JSON-lines file evacuation
 * - Category-based logging for subsystem identification
 * - Per-category/level counters
 * - Throttling to prevent log spam from per-tick code paths
 */

/**
 * Log entry with category and agent context.
 */
export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  /** Robot id when the log relates to a specific robot */
  agentId?: string;
  /** Simulation tick when the log was created */
  tick: number;
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  totalCount: number;
  throttledCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: string;
  /** Case-insensitive text search in message */
  messageContains?: string;
  /** Keep only the most recent N matches */
  limit?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  /** Empty string disables file output */
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  writeIntervalMs: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: isLogLevel(CONFIG.LOG.LEVEL) ? CONFIG.LOG.LEVEL : LogLevel.INFO,
  maxMemoryLogs: CONFIG.LOG.MAX_MEMORY_LOGS,
  logDir: CONFIG.LOG.DIR ? path.resolve(CONFIG.LOG.DIR) : "",
  throttleWindowMs: CONFIG.LOG.THROTTLE_WINDOW_MS,
  maxThrottleCount: CONFIG.LOG.MAX_THROTTLE_COUNT,
  writeIntervalMs: CONFIG.LOG.WRITE_INTERVAL_MS,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

/**
 * Logger class with memory buffering and optional file evacuation.
 * Console: levels at or above `minLevel`, colored
 * Memory: all levels with full metadata
 * File: JSON lines, only when a log directory is configured
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrite: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private writeInterval?: NodeJS.Timeout;
  private writePromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.logDir) {
      this.ensureLogDir();
      this.writeInterval = setInterval(() => {
        void this.flush();
      }, this.config.writeIntervalMs);
      this.writeInterval.unref();
    }
  }

  private initMetrics(): LogMetrics {
    const byLevel: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 0,
      [LogLevel.WARN]: 0,
      [LogLevel.ERROR]: 0,
    };
    const byCategory: Record<LogCategory, number> = {
      [LogCategory.SIMULATION]: 0,
      [LogCategory.MOVEMENT]: 0,
      [LogCategory.PATHFINDING]: 0,
      [LogCategory.ROBOTS]: 0,
      [LogCategory.WORLD]: 0,
      [LogCategory.CONFIG]: 0,
      [LogCategory.GENERAL]: 0,
    };
    return { byLevel, byCategory, totalCount: 0, throttledCount: 0 };
  }

  private ensureLogDir(): void {
    try {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
      this.config.logDir = "";
    }
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.config.logDir, `logs-${date}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.logDir) {
      this.pendingWrite.push(entry);
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.totalCount++;
  }

  private async writePending(): Promise<void> {
    if (!this.config.logDir || this.pendingWrite.length === 0) return;

    const batch = this.pendingWrite.splice(0);
    const lines = batch.map((log) => JSON.stringify(log)).join("\n");
    try {
      await fs.promises.appendFile(this.getLogFilePath(), lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrite = [...batch, ...this.pendingWrite].slice(
        0,
        this.config.maxMemoryLogs,
      );
      console.error("Failed to write logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: batch.length,
      });
    }
  }

  /**
   * Set the current simulation tick for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { agentId?: string; data?: unknown },
  ): void {
    if (this.shouldThrottle(message)) {
      this.metrics.throttledCount++;
      return;
    }

    const now = Date.now();
    this.addToMemory({
      id: `${now}-${RandomUtils.float().toString(36).substring(2, 9)}`,
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      agentId: options?.agentId,
      tick: this.currentTick,
      data: options?.data,
    });

    if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[this.config.minLevel]) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    const data = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data);
        break;
    }
  }

  private logWithOptionalCategory(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  debug(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log a robot-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, {
      agentId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, agentId, messageContains, limit } = filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (!agentId || e.agentId === agentId) &&
        (!search || e.message.toLowerCase().includes(search)),
    );

    return limit ? results.slice(-limit) : results;
  }

  /**
   * Writes pending entries to the log file, if file output is enabled.
   */
  async flush(): Promise<void> {
    this.writePromise = this.writePromise.then(() => this.writePending());
    await this.writePromise;
  }

  /**
   * Empties the memory buffer, throttle state and counters.
   */
  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
    this.metrics = this.initMetrics();
  }

  destroy(): void {
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
      this.writeInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "@/shared/constants/LogEnums";
