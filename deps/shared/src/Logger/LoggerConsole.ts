import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
} from "./Logger";

const levelRank: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

type StackAnchor = (...args: never[]) => unknown;

export class LoggerConsole implements Logger, AsyncDisposable {
  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly path: readonly string[] = []
  ) {}

  trace(context: LogContext, message: string): void;
  trace(message: string): void;
  trace(context?: LogContext): LogTemplate;
  trace(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.entry("trace", this.trace, first, message);
  }

  debug(context: LogContext, message: string): void;
  debug(message: string): void;
  debug(context?: LogContext): LogTemplate;
  debug(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.entry("debug", this.debug, first, message);
  }

  info(context: LogContext, message: string): void;
  info(message: string): void;
  info(context?: LogContext): LogTemplate;
  info(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.entry("info", this.info, first, message);
  }

  warn(context: LogContext, message: string): void;
  warn(message: string): void;
  warn(context?: LogContext): LogTemplate;
  warn(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.entry("warn", this.warn, first, message);
  }

  error(context: LogContext, message: string): void;
  error(message: string): void;
  error(context?: LogContext): LogTemplate;
  error(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.entry("error", this.error, first, message);
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  /** transport 由所有延伸出來的 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private entry(
    level: LogLevel,
    anchor: StackAnchor,
    first: LogContext | string | undefined,
    message: string | undefined
  ): LogTemplate | void {
    if (typeof first === "string") {
      this.write(level, {}, [first], [], anchor);
      return;
    }
    if (message !== undefined) {
      this.write(level, first ?? {}, [message], [], anchor);
      return;
    }
    const template: LogTemplate = (strings, ...values) => {
      this.write(level, first ?? {}, strings, values, template);
    };
    return template;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    strings: readonly string[],
    values: readonly unknown[],
    anchor: StackAnchor
  ) {
    if (levelRank[level] < levelRank[this.level]) return;

    const { event, emoji: callEmoji, error, ...callRest } = callContext;
    const { emoji: inheritedEmoji, ...baseRest } = this.context;
    delete baseRest.event;
    delete baseRest.error;

    let plain = "";
    let colored = "";
    const templateValues: Record<string, unknown> = {};
    strings.forEach((s, i) => {
      plain += s;
      colored += s;
      if (i < values.length) {
        plain += String(values[i]);
        colored += kleur.green(String(values[i]));
        templateValues[`__${i}`] = values[i];
      }
    });

    const context: Record<string, unknown> = {
      ...baseRest,
      ...callRest,
      ...templateValues,
    };
    if (error !== undefined && !(error instanceof Error)) {
      context.error = error;
    }

    let errInfo: LogRecord["err"];
    if (error instanceof Error) {
      errInfo = { name: error.name, message: error.message, stack: error.stack };
    } else if (level === "error") {
      const captured = new Error(plain);
      Error.captureStackTrace(captured, anchor);
      errInfo = { name: captured.name, message: plain, stack: captured.stack };
    }

    const emoji =
      callEmoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (level === "warn" || level === "error"
        ? this.emojiMap[level] ?? inheritedEmoji
        : inheritedEmoji ?? this.emojiMap[level]);
    const label = event ?? level;
    const head = this.path.length > 0 ? `${this.path.join(":")}:${label}` : label;

    let line = `${typeof emoji === "string" ? `${emoji} ` : ""}${head}: ${colored}`;
    if (Object.keys(context).length > 0) {
      line += ` ${kleur.gray(stringify(context))}`;
    }
    if (level === "error" && errInfo?.stack) {
      line += `\n${errInfo.stack}`;
    }
    consoleOf(level)(line);

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: plain,
      context,
      err: errInfo,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

function consoleOf(level: LogLevel): (line: string) => void {
  switch (level) {
    case "trace":
    case "debug":
      return (line) => console.debug(line);
    case "info":
      return (line) => console.info(line);
    case "warn":
      return (line) => console.warn(line);
    case "error":
      return (line) => console.error(line);
  }
}

function stringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}
