import { safeStringify } from "./utils/safeStringify";

export type PrintStrategy = "pretty" | "plain" | "json" | "json_pretty" | "none";

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

type Writer = (msg: string) => void;
type Paint = (code: string, text: string) => string;

const LEVEL_STYLE: Readonly<Record<LogLevels, { icon: string; ansi: string }>> = {
  trace: { icon: "○", ansi: "90" },
  debug: { icon: "◆", ansi: "36" },
  info: { icon: "●", ansi: "32" },
  warn: { icon: "▲", ansi: "33" },
  error: { icon: "✕", ansi: "31" },
  critical: { icon: "█", ansi: "35" },
};

const GRAY = "90";
const DIM = "2";
const BLUE = "34";
const CYAN = "36";

const ansi: Paint = (code, text) => `\x1b[${code}m${text}\x1b[0m`;
const noAnsi: Paint = (_code, text) => text;

const STDERR_LEVELS: ReadonlySet<LogLevels> = new Set<LogLevels>([
  "warn",
  "error",
  "critical",
]);

const defaultWriters = (): { log: Writer; error: Writer } => ({
  // eslint-disable-next-line no-console
  log: (msg) => console.log(msg),
  // eslint-disable-next-line no-console
  error: (msg) => console.error(msg),
});

/**
 * Renders logs for one strategy. `plain` is `pretty` without ANSI colors;
 * warnings and worse go to the error writer.
 */
export class LogPrinter {
  private readonly strategy: PrintStrategy;
  private readonly paint: Paint;

  constructor(options: { strategy: PrintStrategy; useColors: boolean }) {
    this.strategy = options.strategy;
    this.paint =
      options.useColors && options.strategy !== "plain" ? ansi : noAnsi;
  }

  public print(log: PrintableLog): void {
    switch (this.strategy) {
      case "none":
        return;
      case "json":
        LogPrinter.writers.log(safeStringify(toJsonShape(log)));
        return;
      case "json_pretty":
        LogPrinter.writers.log(safeStringify(toJsonShape(log), 2));
        return;
      default: {
        const write = STDERR_LEVELS.has(log.level)
          ? LogPrinter.writers.error
          : LogPrinter.writers.log;
        this.render(log).forEach((line) => write(line));
      }
    }
  }

  private render(log: PrintableLog): string[] {
    const { paint } = this;
    const style = LEVEL_STYLE[log.level];
    const time = log.timestamp.toISOString().slice(11, 23);
    const head = [
      paint(GRAY, time),
      paint(style.ansi, `${style.icon} ${log.level.toUpperCase().padEnd(7)}`),
    ];
    if (log.source) {
      head.push(paint(BLUE, `[${log.source}]`));
    }
    head.push(
      typeof log.message === "object" && log.message !== null
        ? safeStringify(log.message)
        : String(log.message),
    );

    const details: string[] = [];
    if (log.error) {
      const summary = `${log.error.name}: ${log.error.message}`;
      details.push(
        `    ${paint(GRAY, "╰─")} ${paint(LEVEL_STYLE.error.ansi, summary)}`,
      );
      for (const frame of log.error.stack?.split("\n") ?? []) {
        details.push(`       ${paint(GRAY, "↳")} ${paint(DIM, frame.trim())}`);
      }
    }
    if (log.data && Object.keys(log.data).length > 0) {
      details.push(...this.block("data", CYAN, log.data));
    }
    const { source: _source, ...context }: Record<string, unknown> =
      log.context ?? {};
    if (Object.keys(context).length > 0) {
      details.push(...this.block("context", BLUE, context));
    }

    const line = head.join(" ");
    return details.length > 0 ? [line, ...details, ""] : [line];
  }

  private block(
    label: string,
    color: string,
    payload: Record<string, unknown>,
  ): string[] {
    const body = safeStringify(payload, 2, { maxDepth: 3 })
      .split("\n")
      .map((line) => `       ${this.paint(DIM, line)}`);
    const title = `    ${this.paint(GRAY, "╰─")} ${this.paint(color, `${label}:`)}`;
    return [title, ...body];
  }

  private static writers: { log: Writer; error: Writer } = defaultWriters();

  public static setWriters(writers: Partial<{ log: Writer; error: Writer }>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = defaultWriters();
  }
}

// Object messages are re-parsed so Maps, bigints and cycles print as JSON
function toJsonShape(log: PrintableLog): Record<string, unknown> {
  if (typeof log.message !== "object" || log.message === null) {
    return { ...log };
  }
  const text = safeStringify(log.message);
  try {
    return { ...log, message: JSON.parse(text) };
  } catch {
    return { ...log, message: text };
  }
}
