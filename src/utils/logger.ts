/**
 * 日志工具
 *
 * 控制台输出带颜色,同时以纯文本追加写入日志文件。
 */
import * as fs from 'fs';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4,
};

const COLORS = {
  white: '\x1b[97m',
  cyan: '\x1b[96m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  red: '\x1b[91m',
  end: '\x1b[0m',
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'NONE'>, string> = {
  DEBUG: COLORS.cyan,
  INFO: COLORS.green,
  WARN: COLORS.yellow,
  ERROR: COLORS.red,
};

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * 本地时间 YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  if (error === undefined) {
    return '';
  }
  return String(error);
}

export class Logger {
  private level: LogLevel = 'INFO';
  private logFile: string | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * 设置日志文件,传 null 关闭文件输出
   */
  setLogFile(filePath: string | null): void {
    this.logFile = filePath;
  }

  debug(module: string, message: string, error?: unknown): void {
    this.write('DEBUG', module, message, error);
  }

  info(module: string, message: string, error?: unknown): void {
    this.write('INFO', module, message, error);
  }

  warn(module: string, message: string, error?: unknown): void {
    this.write('WARN', module, message, error);
  }

  error(module: string, message: string, error?: unknown): void {
    this.write('ERROR', module, message, error);
  }

  private write(level: Exclude<LogLevel, 'NONE'>, module: string, message: string, error?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const timestamp = formatTimestamp(new Date());
    // WARN 只附带错误消息,ERROR 附带堆栈
    const detail =
      error === undefined
        ? ''
        : level === 'ERROR'
          ? `\n${describeError(error)}`
          : ` (${error instanceof Error ? error.message : String(error)})`;
    const line = `${level.padEnd(5)} [${module}] ${message}${detail}`;

    const color = LEVEL_COLOR[level];
    const consoleLine = `${COLORS.white}[${timestamp}]${COLORS.end} ${color}${line}${COLORS.end}`;
    if (level === 'ERROR') {
      console.error(consoleLine);
    } else {
      console.log(consoleLine);
    }

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, `[${timestamp}] ${line}\n`, 'utf-8');
      } catch (fileError) {
        console.error(`写入日志文件失败: ${this.logFile}`, fileError);
        this.logFile = null;
      }
    }
  }
}

export const logger = new Logger();
