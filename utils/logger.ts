import colors from 'ansi-colors';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Threshold = LogLevel | 'silent';

const PRIORITY: Record<Threshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PAINT: Record<LogLevel, (text: string) => string> = {
  debug: colors.gray,
  info: colors.cyan,
  warn: colors.yellow,
  error: colors.red,
};

interface LogMessage {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

function isThreshold(value: string): value is Threshold {
  return value in PRIORITY;
}

class Logger {
  private static threshold(): Threshold {
    const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    return isThreshold(configured) ? configured : 'info';
  }

  private static serialize(data: unknown): string {
    if (data instanceof Error) return data.stack ?? data.message;
    return JSON.stringify(data, null, 2);
  }

  private static formatMessage(msg: LogMessage): string {
    const dataStr = msg.data === undefined ? '' : `\n${Logger.serialize(msg.data)}`;
    return `[${msg.timestamp}] ${msg.level.toUpperCase()} [${msg.service}] ${msg.message}${dataStr}`;
  }

  private static log(level: LogLevel, service: string, message: string, data?: unknown) {
    if (PRIORITY[level] < PRIORITY[Logger.threshold()]) return;

    const line = Logger.formatMessage({
      level,
      service,
      message,
      timestamp: new Date().toISOString(),
      data,
    });

    const paint = PAINT[level];
    if (level === 'error') console.error(paint(line));
    else if (level === 'warn') console.warn(paint(line));
    else console.log(paint(line));
  }

  public static debug(service: string, message: string, data?: unknown) {
    Logger.log('debug', service, message, data);
  }

  public static info(service: string, message: string, data?: unknown) {
    Logger.log('info', service, message, data);
  }

  public static warn(service: string, message: string, data?: unknown) {
    Logger.log('warn', service, message, data);
  }

  public static error(service: string, message: string, data?: unknown) {
    Logger.log('error', service, message, data);
  }
}

export default Logger;
