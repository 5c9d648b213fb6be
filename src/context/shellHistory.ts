import { readFileSync } from "node:fs";
import { join } from "node:path";

export type HistoryShell = "bash" | "zsh" | "fish";

export interface RecentCommandsOptions {
  /** Shell name or path; only bash, zsh and fish histories are read */
  shell: string;
  homeDir: string;
  count?: number;
  maxLength?: number;
  readTextFile?: (path: string) => string;
}

const SENSITIVE_PATTERNS: RegExp[] = [
  /password/i,
  /token/i,
  /api[_-]?key/i,
  /secret/i,
  /credential/i,
  /export.*KEY/i,
  /export.*TOKEN/i,
  /export.*SECRET/i,
  /export.*PASSWORD/i,
];

export function historyShell(shell: string): HistoryShell | null {
  const name = shell.trim().split(/[\\/]/).pop()?.replace(/\.exe$/i, "").toLowerCase();
  return name === "bash" || name === "zsh" || name === "fish" ? name : null;
}

export function historyPath(shell: HistoryShell, homeDir: string): string {
  switch (shell) {
    case "bash":
      return join(homeDir, ".bash_history");
    case "zsh":
      return join(homeDir, ".zsh_history");
    case "fish":
      return join(homeDir, ".local", "share", "fish", "fish_history");
  }
}

export function isSensitiveCommand(command: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(command));
}

/** Extracts commands, oldest first, from the text of a history file */
export function parseHistory(shell: HistoryShell, text: string): string[] {
  const lines = text.split(/\r?\n/).map((line) => line.trim());

  switch (shell) {
    case "bash":
      return lines.filter((line) => line !== "");
    case "zsh":
      // Extended history lines look like `: 1700000000:0;git status`
      return lines
        .map((line) => (line.startsWith(":") && line.includes(";") ? line.slice(line.indexOf(";") + 1).trim() : line))
        .filter((line) => line !== "");
    case "fish":
      return lines
        .filter((line) => line.startsWith("- cmd:"))
        .map((line) => line.slice("- cmd:".length).trim())
        .filter((line) => line !== "");
  }
}

/**
 * The user's most recent shell commands, oldest first. Commands that look
 * like they carry credentials are skipped, long ones are shortened. An
 * unsupported shell or unreadable history gives an empty list.
 */
export function readRecentCommands(options: RecentCommandsOptions): string[] {
  const shell = historyShell(options.shell);
  const count = options.count ?? 15;
  const maxLength = options.maxLength ?? 200;
  if (!shell || count <= 0) return [];

  const read = options.readTextFile ?? ((path: string) => readFileSync(path, "utf8"));
  let text: string;
  try {
    text = read(historyPath(shell, options.homeDir));
  } catch {
    return [];
  }

  const recent: string[] = [];
  const commands = parseHistory(shell, text);
  for (let i = commands.length - 1; i >= 0 && recent.length < count; i--) {
    const command = commands[i];
    if (isSensitiveCommand(command)) continue;
    recent.push(command.length > maxLength ? `${command.slice(0, maxLength)}...` : command);
  }
  return recent.reverse();
}
