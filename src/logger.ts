import { type ILogObj, Logger } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_IDS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_IDS, value);
}

export function parseLogLevel(raw: string | undefined): number {
  const normalized = String(raw ?? "").trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return LEVEL_IDS[normalized];
  }

  return LEVEL_IDS.info;
}

function serializeArg(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  return value;
}

function createLogger(): Logger<ILogObj> {
  // stdout belongs to the MCP stdio transport; records go to stderr as JSON lines.
  const instance = new Logger<ILogObj>({
    name: "gemini-webui",
    type: "hidden",
    minLevel: parseLogLevel(process.env.GEMINI_LOG_LEVEL),
  });

  instance.attachTransport((logObj) => {
    const { _meta: meta, ...args } = logObj;
    const record = {
      time: meta?.date instanceof Date ? meta.date.toISOString() : new Date().toISOString(),
      level: meta?.logLevelName ?? "INFO",
      name: meta?.name,
      args: Object.values(args).map(serializeArg),
    };
    process.stderr.write(`${JSON.stringify(record)}\n`);
  });

  return instance;
}

export const logger = createLogger();
