import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import type { ConfirmationResult, ExecutionResult, GeneratedCommand, PolicyVerdict } from "./types.js";

export interface LoggerLimits {
  maxOut: number;
  maxCmd: number;
  maxMsg: number;
}

export interface LoggerOptions {
  version: string;
  /** Directory the JSONL file is created in; logging is off when null */
  dir: string | null;
  mode: string;
  limits?: Partial<LoggerLimits>;
}

const DEFAULT_LIMITS: LoggerLimits = { maxOut: 500, maxCmd: 200, maxMsg: 300 };

let logDir: string | null = null;
let logFile: string | null = null;
let pending: { version: string; mode: string } | null = null;
let limits: LoggerLimits = DEFAULT_LIMITS;

function trunc(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) + "…" : s;
}

/**
 * Filter sensitive data from text before logging
 * Removes API keys, tokens, passwords, and other credentials
 */
export function filterSensitiveData(text: string): string {
  const patterns = [
    /sk-[A-Za-z0-9_-]{20,}/g, // OpenAI keys
    /ghp_[A-Za-z0-9_]{36,}/g, // GitHub PAT
    /([A-Z_]+_(?:KEY|TOKEN|PASSWORD|SECRET))[=:]\s*[^\s]+/g,
    /password[=:]\s*[^\s]+/gi,
    /passwd[=:]\s*[^\s]+/gi,
    /AKIA[0-9A-Z]{16}/g,
    /-----BEGIN.*PRIVATE KEY-----[\s\S]*?-----END.*PRIVATE KEY-----/g,
    /https?:\/\/[^:/\s]+:[^@\s]+@/g,
  ];

  let filtered = text;
  for (const pattern of patterns) {
    filtered = filtered.replace(pattern, "[REDACTED]");
  }
  return filtered;
}

function ts(): number {
  return Math.floor(Date.now() / 1000);
}

function lazyInit(): void {
  if (logFile !== null || pending === null || logDir === null) return;
  try {
    mkdirSync(logDir, { recursive: true });
    const stamp = new Date().toISOString().slice(0, 19).replace(/:/g, "-");
    const file = join(logDir, `${stamp}_${process.pid}.jsonl`);
    appendFileSync(
      file,
      JSON.stringify({ t: ts(), ev: "start", ver: pending.version, mode: pending.mode }) + "\n",
      "utf8"
    );
    logFile = file;
  } catch {
    // Never fail a command because the audit log is unwritable
    logDir = null;
  }
}

function write(entry: Record<string, unknown>): void {
  lazyInit();
  if (!logFile) return;
  try {
    appendFileSync(logFile, JSON.stringify(entry) + "\n", "utf8");
  } catch {
    // Never fail a command because the audit log is unwritable
    logFile = null;
    logDir = null;
  }
}

export function initLogger(options: LoggerOptions): void {
  logDir = options.dir;
  logFile = null;
  pending = { version: options.version, mode: options.mode };
  limits = { ...DEFAULT_LIMITS, ...options.limits };
}

/** Path of the current audit file, once something has been written */
export function currentLogFile(): string | null {
  return logFile;
}

export function logIntent(intent: string, session: string | null): void {
  write({ t: ts(), ev: "intent", msg: trunc(filterSensitiveData(intent), limits.maxMsg), session });
}

export function logGenerated(generated: GeneratedCommand): void {
  write({
    t: ts(),
    ev: "generated",
    cmd: trunc(filterSensitiveData(generated.command), limits.maxCmd),
    ...(generated.explanation ? { msg: trunc(generated.explanation, limits.maxMsg) } : {}),
  });
}

export function logVerdict(command: string, policy: string, verdict: PolicyVerdict): void {
  const base = { t: ts(), ev: "policy", policy, cmd: trunc(filterSensitiveData(command), limits.maxCmd), dec: verdict.decision };
  switch (verdict.decision) {
    case "ALLOW":
      write(base);
      break;
    case "CONFIRM":
      write({ ...base, pattern: verdict.pattern, level: verdict.level });
      break;
    case "DENY":
      write({ ...base, pattern: verdict.pattern, reason: verdict.reason });
      break;
  }
}

export function logConfirmation(level: string, result: ConfirmationResult): void {
  write({ t: ts(), ev: "confirm", level, result });
}

export function logCommandResult(command: string, result: ExecutionResult): void {
  write({
    t: ts(),
    ev: "cmd",
    cmd: trunc(filterSensitiveData(command), limits.maxCmd),
    mode: result.mode,
    exit: result.exitCode,
    ...(result.timedOut ? { timedOut: true } : {}),
    out: trunc(filterSensitiveData(result.output), limits.maxOut),
  });
}

export function logSessionSaved(session: string, outputLength: number): void {
  write({ t: ts(), ev: "session", action: "saved", session, outLen: outputLength });
}

export function logSessionCleared(session: string): void {
  write({ t: ts(), ev: "session", action: "cleared", session });
}

export function logAnswer(answer: string): void {
  write({ t: ts(), ev: "answer", msg: trunc(filterSensitiveData(answer), limits.maxMsg) });
}

export function logError(stage: string, message: string): void {
  write({ t: ts(), ev: "error", stage, msg: trunc(filterSensitiveData(message), limits.maxMsg) });
}

export function logSessionEnd(exitCode: number): void {
  write({ t: ts(), ev: "end", exit: exitCode });
}
