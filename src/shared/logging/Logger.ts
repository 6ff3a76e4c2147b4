/**
 * 日志级别
 *
 * 锁只在 debug（授予、释放、跳过、销毁）、warn（授予被放弃）
 * 和 error（授予停滞）三个级别上记录。
 */
export type LogLevel = 'debug' | 'warn' | 'error';

/**
 * 日志条目
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
  /** 产生该条目的锁名称，未命名的锁为空串 */
  lockId?: string;
  prefix?: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerConfig {
  minLevel?: LogLevel;
  prefix?: string;
  /** 锁名称，随每条日志输出 */
  lockId?: string;
  enableConsole?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2
};

/**
 * 锁的结构化日志
 *
 * 子 Logger 的条目先交给自己的处理器，再沿 parent 链向上转发，
 * 所以挂在 defaultLogger 上的处理器能收到所有命名锁的日志。
 *
 * @example
 * ```typescript
 * const logger = new Logger({ prefix: '[QueueLock]', minLevel: 'debug', enableConsole: false });
 * logger.onLog((entry) => trace.push(entry));
 *
 * const lock = QueueLock.from(jobs, { logger: logger.createChild({ lockId: 'jobs' }) });
 * ```
 */
export class Logger {
  private handlers = new Set<LogHandler>();
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}, private readonly parent?: Logger) {
    this.config = {
      minLevel: config.minLevel ?? 'debug',
      prefix: config.prefix ?? '',
      lockId: config.lockId ?? '',
      enableConsole: config.enableConsole ?? true
    };

    if (this.config.enableConsole) {
      this.handlers.add(writeToConsole);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  /**
   * 记录错误，Error 对象展开为 name / message / stack 放进 metadata.error
   */
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const merged: Record<string, unknown> = { ...metadata };
    if (error instanceof Error) {
      merged.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      merged.error = error;
    }
    this.log('error', message, merged);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.config.minLevel];
  }

  /**
   * @returns 移除该处理器的函数
   */
  onLog(handler: LogHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * 派生一个带锁名称的子 Logger，未给出的配置沿用当前 Logger
   */
  createChild(config: Partial<LoggerConfig> = {}): Logger {
    return new Logger(
      {
        minLevel: config.minLevel ?? this.config.minLevel,
        prefix: config.prefix ?? this.config.prefix,
        lockId: config.lockId ?? this.config.lockId,
        enableConsole: false
      },
      this
    );
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    this.dispatch({
      level,
      message,
      timestamp: Date.now(),
      metadata,
      lockId: this.config.lockId,
      prefix: this.config.prefix
    });
  }

  private dispatch(entry: LogEntry): void {
    for (const handler of this.handlers) {
      try {
        handler(entry);
      } catch (error) {
        // 处理器异常不能打断锁的状态转换
        console.error('Log handler error:', error);
      }
    }
    this.parent?.dispatch(entry);
  }
}

function writeToConsole(entry: LogEntry): void {
  const prefix = entry.prefix ? `${entry.prefix} ` : '';
  const lockId = entry.lockId ? `[${entry.lockId}] ` : '';
  const line = `${new Date(entry.timestamp).toISOString()} ${prefix}${lockId}${entry.message}`;
  console[entry.level](line, entry.metadata ?? '');
}

/**
 * 未指定 logger 的锁都挂在这里；只输出 warn 及以上
 */
export const defaultLogger = new Logger({
  prefix: '[QueueLock]',
  minLevel: 'warn'
});
