import { join } from "node:path";

/** Directory names relative to the code-djinn home directory */
export const DIRS = {
  audit: "audit",
  sessions: "sessions",
} as const;

export function sessionsDir(homeDir: string): string {
  return join(homeDir, DIRS.sessions);
}

export function auditDir(homeDir: string): string {
  return join(homeDir, DIRS.audit);
}
