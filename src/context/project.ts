import { spawnSync } from "node:child_process";
import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, join, resolve } from "node:path";

export interface MakefileTarget {
  name: string;
  description: string;
}

// What the working directory looks like, as far as cheap checks can tell
export interface LocalProjectContext {
  projectType: string | null;   // "node", "python", "rust", ...
  virtualEnv: string | null;    // "active: name" or "inactive: dir"
  gitBranch: string | null;
  gitStatus: string | null;     // "clean" or "modified: 2 files, untracked: 1 file"
  keyFiles: string[];
  makefileTargets: MakefileTarget[];
}

export type GitRunner = (args: string[], cwd: string) => string | null;

export interface ProjectDetectorOptions {
  /** Detected contexts are reused for this long per directory and HEAD */
  cacheTtlMs?: number;
  env?: Record<string, string | undefined>;
  now?: () => number;
  runGit?: GitRunner;
}

const KEY_FILES = [
  "DESCRIPTION",
  "Makefile",
  "makefile",
  "docker-compose.yml",
  "docker-compose.yaml",
  "Dockerfile",
  ".dockerignore",
  "requirements.txt",
  "pyproject.toml",
  "setup.py",
  "package.json",
  "Cargo.toml",
  "go.mod",
  "Gemfile",
  "pom.xml",
  "build.gradle",
  "environment.yml",
  "environment.yaml",
  "CMakeLists.txt",
  ".gitlab-ci.yml",
  ".github/workflows",
] as const;

// First match wins
const PROJECT_MARKERS: ReadonlyArray<[string, readonly string[]]> = [
  ["python", ["requirements.txt", "setup.py", "pyproject.toml", "environment.yml", "environment.yaml"]],
  ["node", ["package.json"]],
  ["rust", ["Cargo.toml"]],
  ["go", ["go.mod"]],
  ["ruby", ["Gemfile"]],
  ["java", ["pom.xml", "build.gradle"]],
  ["r", ["DESCRIPTION"]],
];

const VENV_DIRS = ["venv", ".venv", "env"] as const;

const MODIFIED_PREFIXES = [" M", "M ", "MM", "AM", " T"] as const;

const GIT_TIMEOUT_MS = 2_000;

export const spawnGit: GitRunner = (args, cwd) => {
  const result = spawnSync("git", args, {
    cwd,
    encoding: "utf8",
    timeout: GIT_TIMEOUT_MS,
  });
  if (result.error || result.status !== 0) {
    return null;
  }
  return result.stdout ?? "";
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** Summarises `git status --short` output */
export function summarizeGitStatus(output: string): string {
  const lines = output.split("\n").filter((line) => line.trim() !== "");
  if (lines.length === 0) return "clean";

  const modified = lines.filter((line) => MODIFIED_PREFIXES.some((prefix) => line.startsWith(prefix))).length;
  const untracked = lines.filter((line) => line.startsWith("??")).length;

  const parts: string[] = [];
  if (modified > 0) parts.push(`modified: ${plural(modified, "file")}`);
  if (untracked > 0) parts.push(`untracked: ${plural(untracked, "file")}`);
  return parts.length > 0 ? parts.join(", ") : "clean";
}

/**
 * Lists Makefile targets with a description taken from an inline `# ...`
 * comment or, failing that, the comment line directly above the target.
 * Special targets (`.PHONY`, `$(VAR)`, `%.o`) are skipped.
 */
export function parseMakefileTargets(text: string): MakefileTarget[] {
  const targets: MakefileTarget[] = [];
  let pendingComment: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();

    if (stripped.startsWith("#")) {
      const comment = stripped.slice(1).trim();
      if (comment) pendingComment = comment;
      continue;
    }

    if (line.includes(":") && !line.startsWith("\t") && !line.startsWith(" ")) {
      const name = line.split(":")[0].trim();
      if (!name || name.startsWith(".") || name.startsWith("$") || name.startsWith("%")) {
        pendingComment = null;
        continue;
      }

      const hashAt = line.indexOf("#");
      const inline = hashAt >= 0 ? line.slice(hashAt + 1).trim() : "";
      targets.push({ name, description: inline || pendingComment || "" });
    }
    pendingComment = null;
  }

  return targets;
}

/**
 * Inspects a directory for project type, virtualenv, git state, key files and
 * Makefile targets. Every check is best-effort and yields null or an empty
 * list when it cannot tell.
 */
export class ProjectDetector {
  private readonly cacheTtlMs: number;
  private readonly env: Record<string, string | undefined>;
  private readonly now: () => number;
  private readonly runGit: GitRunner;
  private readonly cache = new Map<string, { context: LocalProjectContext; at: number }>();

  constructor(options: ProjectDetectorOptions = {}) {
    this.cacheTtlMs = options.cacheTtlMs ?? 30_000;
    this.env = options.env ?? process.env;
    this.now = options.now ?? Date.now;
    this.runGit = options.runGit ?? spawnGit;
  }

  detect(directory: string): LocalProjectContext {
    const dir = resolve(directory);
    const key = this.cacheKey(dir);
    const cached = this.cache.get(key);
    const now = this.now();
    if (cached && now - cached.at < this.cacheTtlMs) {
      return cached.context;
    }

    const inGitRepo = existsSync(join(dir, ".git"));
    const status = inGitRepo ? this.runGit(["status", "--short"], dir) : null;
    const context: LocalProjectContext = {
      projectType: detectProjectType(dir),
      virtualEnv: this.detectVirtualEnv(dir),
      gitBranch: inGitRepo ? this.runGit(["branch", "--show-current"], dir)?.trim() || null : null,
      gitStatus: status === null ? null : summarizeGitStatus(status),
      keyFiles: KEY_FILES.filter((file) => existsSync(join(dir, file))),
      makefileTargets: readMakefileTargets(dir),
    };

    this.cache.set(key, { context, at: now });
    return context;
  }

  clear(): void {
    this.cache.clear();
  }

  private cacheKey(dir: string): string {
    try {
      return `${dir}:${statSync(join(dir, ".git", "HEAD")).mtimeMs}`;
    } catch {
      return dir;
    }
  }

  private detectVirtualEnv(dir: string): string | null {
    const conda = this.env.CONDA_DEFAULT_ENV?.trim();
    if (conda) return `active: ${conda}`;

    const venv = this.env.VIRTUAL_ENV?.trim();
    if (venv) return `active: ${basename(venv)}`;

    for (const name of VENV_DIRS) {
      if (isDirectory(join(dir, name))) return `inactive: ${name}`;
    }
    return null;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function detectProjectType(dir: string): string | null {
  for (const [type, markers] of PROJECT_MARKERS) {
    if (markers.some((marker) => existsSync(join(dir, marker)))) {
      return type;
    }
  }
  return null;
}

function readMakefileTargets(dir: string): MakefileTarget[] {
  for (const name of ["Makefile", "makefile"]) {
    const path = join(dir, name);
    if (!existsSync(path)) continue;
    try {
      return parseMakefileTargets(readFileSync(path, "utf8"));
    } catch {
      return [];
    }
  }
  return [];
}
