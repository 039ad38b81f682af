export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Same sink and level, tagged with a sub-component. */
  child(component: string): Logger;
}

/** Where formatted lines go. Defaults to the console. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  component?: string;
  verbose?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === "string" && /[\s"=]/.test(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatLine(tag: string, message: string, fields?: LogFields): string {
  let line = `[${tag}] ${message}`;
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

/**
 * Console logger passed explicitly to every station component.
 * Lines look like `[passlink:watcher] Watching directory path=/data`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const tag = options.component ? `passlink:${options.component}` : "passlink";
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? consoleSink;

  return {
    debug(message, fields) {
      if (verbose) sink.log(formatLine(tag, message, fields));
    },
    info(message, fields) {
      sink.log(formatLine(tag, message, fields));
    },
    warn(message, fields) {
      sink.warn(formatLine(tag, message, fields));
    },
    error(message, fields) {
      sink.error(formatLine(tag, message, fields));
    },
    child(component) {
      const childComponent = options.component ? `${options.component}:${component}` : component;
      return createLogger({ component: childComponent, verbose, sink });
    },
  };
}
