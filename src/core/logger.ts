import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

const LOG_DIR = process.env.SLOTWATCH_LOG_DIR || path.join(process.cwd(), "LOG");
const LOG_FILE = path.join(LOG_DIR, "slotwatch.log");
const SESSION_DIR = path.join(LOG_DIR, "sessions");
const SESSION_ID = buildSessionId(new Date());
const SESSION_LOG_FILE = path.join(SESSION_DIR, `${SESSION_ID}.log`);
const LATEST_SESSION_FILE = path.join(LOG_DIR, "latest-session.txt");
const MIN_LEVEL = parseLogLevel(process.env.SLOTWATCH_LOG_LEVEL);

let sessionInitialized = false;

function ensureLogDir(): void {
  if (!existsSync(SESSION_DIR)) {
    mkdirSync(SESSION_DIR, { recursive: true });
  }
}

function ensureSessionInitialized(): void {
  ensureLogDir();
  if (sessionInitialized) {
    return;
  }
  sessionInitialized = true;
  writeFileSync(LATEST_SESSION_FILE, `${SESSION_ID}\n${SESSION_LOG_FILE}\n`, "utf8");
  const startupLine = formatLine(
    "INFO",
    `Session started ${formatFields({
      session_id: SESSION_ID,
      pid: process.pid,
      platform: process.platform,
      level: MIN_LEVEL
    })}`
  );
  appendFileSync(LOG_FILE, startupLine, "utf8");
  appendFileSync(SESSION_LOG_FILE, startupLine, "utf8");
}

function writeLine(level: LogLevel, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[MIN_LEVEL]) {
    return;
  }
  ensureSessionInitialized();
  const line = formatLine(level, message);
  appendFileSync(LOG_FILE, line, "utf8");
  appendFileSync(SESSION_LOG_FILE, line, "utf8");
}

function formatLine(level: LogLevel, message: string): string {
  return `[${new Date().toISOString()}] [${level}] ${message}\n`;
}

/**
 * Renders `key=value` pairs in insertion order. Undefined values are skipped,
 * null renders as `-`.
 */
export function formatFields(fields: Record<string, string | number | boolean | null | undefined>): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value === null ? "-" : String(value)}`)
    .join(" ");
}

export function logDebug(message: string): void {
  writeLine("DEBUG", message);
}

export function logInfo(message: string): void {
  writeLine("INFO", message);
}

export function logWarn(message: string): void {
  writeLine("WARN", message);
}

export function logError(message: string, error?: unknown): void {
  const detail = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error ?? "");
  writeLine("ERROR", detail ? `${message} | ${detail}` : message);
}

export function getLogSessionInfo(): {
  sessionId: string;
  logDir: string;
  appLogPath: string;
  sessionLogPath: string;
} {
  ensureSessionInitialized();
  return {
    sessionId: SESSION_ID,
    logDir: LOG_DIR,
    appLogPath: LOG_FILE,
    sessionLogPath: SESSION_LOG_FILE
  };
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toUpperCase();
  if (value === "DEBUG" || value === "INFO" || value === "WARN" || value === "ERROR") {
    return value;
  }
  return "INFO";
}

function buildSessionId(date: Date): string {
  return [
    date.getFullYear(),
    pad2(date.getMonth() + 1),
    pad2(date.getDate())
  ].join("-") +
    "_" +
    [pad2(date.getHours()), pad2(date.getMinutes()), pad2(date.getSeconds())].join("-") +
    `_pid${process.pid}`;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}
