import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "../core/config/index";

// --- Custom `notify` level: operator-facing events such as dropped deliveries ---
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

interface EngineLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

winston.addColors(customLogLevels.colors);

const logsDir = path.join(process.cwd(), "logs");
const archiveDir = path.join(logsDir, "archive");
const LOG_FILES = ["error.log", "info.log", "combined.log"];

// Rotate the previous run's logs into logs/archive on startup
function archiveOldLogs() {
  fs.mkdirSync(archiveDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of LOG_FILES) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath)) {
      try {
        fs.copyFileSync(logPath, path.join(archiveDir, `${timestamp}_${logFile}`));
        fs.truncateSync(logPath, 0);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function convertJsToTsPath(jsPath: string): string {
  let tsPath = jsPath.endsWith(".js") ? jsPath.replace(/\.js$/, ".ts") : jsPath;
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/");
  }
  return tsPath;
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (!match) {
      continue;
    }
    const [, file, lineNumber] = match;
    if (
      file.includes("node_modules/") ||
      file.includes("internal/") ||
      file.includes("node:") ||
      file.endsWith("utils/logger.ts") ||
      file.endsWith("utils/logger.js")
    ) {
      continue;
    }
    const fnMatch = line.match(/at\s+([^(]+)\s+\(/);
    return {
      file: convertJsToTsPath(file),
      line: Number.parseInt(lineNumber, 10),
      function: fnMatch?.[1]?.trim() || "anonymous",
    };
  }
  return { file: "unknown", line: 0, function: "anonymous" };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const relativePath = path.relative(process.cwd(), stackInfo.file);
    info.logpath = `${relativePath}:${stackInfo.line}`;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.function = "anonymous";
  }
  return info;
});

// ---------------------------------------------------------
// Webhook transport: forwards error and notify entries to an incident channel
// ---------------------------------------------------------
interface WebhookTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

interface LogInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

class WebhookTransport extends Transport {
  private webhookUrl: string;

  constructor(opts: WebhookTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: LogInfo, callback: () => void) {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (info.level === "error" || info.level === "notify") {
      void this.send(info);
    }

    callback();
  }

  private async send(info: LogInfo) {
    try {
      await axios.post(this.webhookUrl, {
        username: "Weather Engine",
        level: info.level,
        source: info.logpath,
        time: info.timestamp,
        text: `[${info.level.toUpperCase()}] ${String(info.message)}`,
      });
    } catch (error) {
      // console only: logging through winston here would loop back into this transport
      console.error("Failed to send log to webhook:", error);
    }
  }
}

const transportsList: winston.transport[] = [];

if (Config.LOG_TO_FILE) {
  archiveOldLogs();
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

if (Config.LOG_WEBHOOK_URL && Config.ENABLE_WEBHOOK_LOGGING) {
  transportsList.push(new WebhookTransport({ webhookUrl: Config.LOG_WEBHOOK_URL }));
}

transportsList.push(
  new winston.transports.Console({
    silent: Config.LOG_SILENT,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => {
        const timestamp = new Date(String(info.timestamp)).getTime().toString();
        return `${timestamp} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`;
      }),
    ),
  }),
);

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as EngineLogger;
