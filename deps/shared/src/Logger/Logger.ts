export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * 呼叫端附帶的上下文。
 * - event：事件名稱，會取代 level 顯示在路徑後
 * - emoji：直接指定顯示的 emoji
 * - error：錯誤物件，Error 會帶出 stack
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type EmojiMap = Partial<Record<string, string>>;

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): LogTemplate;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 延伸路徑（a:b）並合併上下文 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併上下文，不改路徑 */
  append(context: LogContext): Logger;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}
