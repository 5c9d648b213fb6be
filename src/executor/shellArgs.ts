/** Characters that need a shell to interpret them */
const SHELL_METACHARS = [
  "|", ">", "<", "&", ";", "$", "`", "(", ")", "*", "?", "[", "~",
  "\n", "\r", "#", "{", "}", "!",
] as const;

const TUI_PATTERNS: RegExp[] = [
  /\bhtop\b/,
  /\btop\b/,
  /\bvim?\b/,
  /\bnvim\b/,
  /\bemacs\b/,
  /\bnano\b/,
  /\bless\b/,
  /\bmore\b/,
];

const GIT_BASH = "C:/Program Files/Git/bin/bash.exe";

export function isSimpleCommand(command: string): boolean {
  return !SHELL_METACHARS.some((ch) => command.includes(ch));
}

/**
 * Full-screen programs take over the terminal and cannot be captured.
 */
export function isFullScreenTui(command: string): boolean {
  const lower = command.trim().toLowerCase();
  return TUI_PATTERNS.some((pattern) => pattern.test(lower));
}

interface TokenizerState {
  args: string[];
  current: string;
  hasToken: boolean;
  inSingleQuote: boolean;
  inDoubleQuote: boolean;
  escapeNext: boolean;
}

/**
 * Split a simple command into an argument vector.
 * Handles single quotes, double quotes and backslash escapes. Returns null
 * when a quote or escape is left open.
 */
export function splitCommandArgs(command: string): string[] | null {
  const state: TokenizerState = {
    args: [],
    current: "",
    hasToken: false,
    inSingleQuote: false,
    inDoubleQuote: false,
    escapeNext: false,
  };

  for (const char of command) {
    if (state.escapeNext) {
      state.current += char;
      state.hasToken = true;
      state.escapeNext = false;
      continue;
    }

    if (state.inSingleQuote) {
      if (char === "'") {
        state.inSingleQuote = false;
      } else {
        state.current += char;
      }
      continue;
    }

    if (char === "\\") {
      state.escapeNext = true;
      continue;
    }

    if (state.inDoubleQuote) {
      if (char === '"') {
        state.inDoubleQuote = false;
      } else {
        state.current += char;
      }
      continue;
    }

    if (char === "'") {
      state.inSingleQuote = true;
      state.hasToken = true;
      continue;
    }

    if (char === '"') {
      state.inDoubleQuote = true;
      state.hasToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (state.hasToken) {
        state.args.push(state.current);
        state.current = "";
        state.hasToken = false;
      }
      continue;
    }

    state.current += char;
    state.hasToken = true;
  }

  if (state.inSingleQuote || state.inDoubleQuote || state.escapeNext) {
    return null;
  }

  if (state.hasToken) {
    state.args.push(state.current);
  }
  return state.args;
}

export function buildShellArgs(
  command: string,
  shell: string,
  platform: NodeJS.Platform = process.platform
): { shell: string; args: string[] } {
  const configured = shell.trim();
  if (platform === "win32" && (configured === "" || configured === "bash")) {
    return { shell: GIT_BASH, args: ["-c", command] };
  }
  return { shell: configured || "bash", args: ["-c", command] };
}
