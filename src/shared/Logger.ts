export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** 一行已序列化的 log 輸出目的地（預設 stderr，測試可替換） */
export type LogWriter = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line + '\n');
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/** 結構化 JSON logger，以建構子注入到各元件 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = 'info',
    private readonly writer: LogWriter = stderrWriter,
  ) {}

  /** 建立同一輸出設定、不同 context 的 logger */
  child(context: string): Logger {
    return new Logger(context, this.minLevel, this.writer);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.writer(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
