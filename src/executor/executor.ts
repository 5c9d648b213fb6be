import { constants } from "node:os";
import { StringDecoder } from "node:string_decoder";
import type { Readable } from "node:stream";
import { MAX_TIMEOUT_MS } from "../config.js";
import type { ExecutionMode, ExecutionResult } from "../types.js";
import { buildShellArgs, isFullScreenTui, isSimpleCommand, splitCommandArgs } from "./shellArgs.js";
import { spawnLauncher, type Launcher, type ProcessChannel } from "./processChannel.js";

export const TIMEOUT_EXIT_CODE = 124;
export const TRUNCATION_MARKER = "[OUTPUT TRUNCATED]";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_OUTPUT_BYTES = 512 * 1024;
const DEFAULT_KILL_GRACE_MS = 2_000;
const DEFAULT_SETTLE_MS = 200;

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface InterruptSource {
  on(event: "SIGINT", listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: "SIGINT", listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ExecutorOptions {
  shell: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  killGraceMs?: number;
  /** How long to keep reading pipes after the child has exited */
  settleMs?: number;
  launcher?: Launcher;
  stdout?: OutputSink;
  stderr?: OutputSink;
  /**
   * Ctrl-C during execution never ends the CLI. A detached child gets it
   * forwarded; a child sharing the terminal receives it from the terminal.
   */
  interrupts?: InterruptSource | null;
  /**
   * Whether stdin is an interactive terminal. Children then stay in the
   * terminal's session so `/dev/tty` prompts (sudo, ssh, git) keep working.
   */
  terminal?: boolean;
  platform?: NodeJS.Platform;
}

export interface ExecuteOptions {
  cwd?: string;
  timeoutMs?: number;
}

type Attempt =
  | { kind: "spawn-failed"; error: NodeJS.ErrnoException; output: string }
  | { kind: "finished"; result: ExecutionResult };

function appendLine(text: string, line: string): string {
  if (text === "") return line;
  return text.endsWith("\n") ? text + line : `${text}\n${line}`;
}

function signalNumber(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? entry[1] : 0;
}

function spawnFailureExitCode(error: NodeJS.ErrnoException): number {
  if (error.code === "ENOENT") return 127;
  if (error.code === "EACCES") return 126;
  return 1;
}

function clampTimeout(ms: number): number {
  if (!Number.isFinite(ms)) return MAX_TIMEOUT_MS;
  return Math.min(Math.max(Math.round(ms), 1), MAX_TIMEOUT_MS);
}

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}

/**
 * Combined stdout+stderr capture with a byte ceiling.
 */
class CaptureBuffer {
  private readonly parts: string[] = [];
  private bytes = 0;
  private truncated = false;

  constructor(private readonly maxBytes: number) {}

  append(text: string): void {
    if (this.truncated || text === "") return;

    const size = Buffer.byteLength(text, "utf8");
    if (this.bytes + size <= this.maxBytes) {
      this.parts.push(text);
      this.bytes += size;
      return;
    }

    const room = this.maxBytes - this.bytes;
    // Decoding the cut slice drops a trailing partial character
    const head = new StringDecoder("utf8").write(Buffer.from(text, "utf8").subarray(0, room));
    this.parts.push(head);
    this.bytes += Buffer.byteLength(head, "utf8");
    this.truncated = true;
  }

  get isEmpty(): boolean {
    return this.bytes === 0;
  }

  text(): string {
    const joined = this.parts.join("");
    return this.truncated ? appendLine(joined, TRUNCATION_MARKER) : joined;
  }
}

/**
 * Runs one command with live output and a captured copy of it.
 *
 * Simple commands are started directly from an argument vector; anything
 * using shell syntax, or a direct start that fails with ENOENT, goes through
 * `<shell> -c`. Never rejects: spawn failures, timeouts and signals all map
 * to an exit code.
 */
export class Executor {
  private readonly shell: string;
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly killGraceMs: number;
  private readonly settleMs: number;
  private readonly launcher: Launcher;
  private readonly stdout: OutputSink;
  private readonly stderr: OutputSink;
  private readonly interrupts: InterruptSource | null;
  private readonly platform: NodeJS.Platform;
  private readonly terminal: boolean;

  constructor(options: ExecutorOptions) {
    this.shell = options.shell;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.launcher = options.launcher ?? spawnLauncher;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.interrupts = options.interrupts === undefined ? process : options.interrupts;
    this.platform = options.platform ?? process.platform;
    this.terminal = options.terminal ?? process.stdin.isTTY === true;
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const cwd = options.cwd ?? process.cwd();
    const timeoutMs = clampTimeout(options.timeoutMs ?? this.timeoutMs);
    const simple = isSimpleCommand(command);

    if (isFullScreenTui(command)) {
      const message =
        "Full-screen programs (editors, pagers, monitors) cannot run with captured output.\n" +
        `Run it directly in your terminal: ${command}\n`;
      this.stderr.write(message);
      return { exitCode: 1, output: message, timedOut: false, mode: simple ? "direct" : "shell" };
    }

    if (simple) {
      const argv = splitCommandArgs(command);
      if (argv && argv.length > 0) {
        const [file, ...args] = argv;
        const direct = await this.attempt(file, args, "direct", cwd, timeoutMs);
        if (direct.kind === "finished") {
          return direct.result;
        }
        if (direct.error.code !== "ENOENT" || direct.output !== "") {
          return this.spawnFailure(direct.error, direct.output, file, "direct");
        }
      }
    }

    const { shell, args } = buildShellArgs(command, this.shell, this.platform);
    const viaShell = await this.attempt(shell, args, "shell", cwd, timeoutMs);
    if (viaShell.kind === "finished") {
      return viaShell.result;
    }
    return this.spawnFailure(viaShell.error, viaShell.output, shell, "shell");
  }

  private spawnFailure(
    error: NodeJS.ErrnoException,
    output: string,
    file: string,
    mode: ExecutionMode
  ): ExecutionResult {
    const message = `Failed to start ${file}: ${error.message}`;
    this.stderr.write(message + "\n");
    return {
      exitCode: spawnFailureExitCode(error),
      output: appendLine(output, message),
      timedOut: false,
      mode,
    };
  }

  private attempt(
    file: string,
    args: string[],
    mode: ExecutionMode,
    cwd: string,
    timeoutMs: number
  ): Promise<Attempt> {
    return new Promise<Attempt>((resolve) => {
      const isolateGroup = !this.terminal;
      let channel: ProcessChannel;
      try {
        channel = this.launcher(file, args, { cwd, isolateGroup });
      } catch (err) {
        const error: NodeJS.ErrnoException = err instanceof Error ? err : new Error(String(err));
        resolve({ kind: "spawn-failed", error, output: "" });
        return;
      }

      const capture = new CaptureBuffer(this.maxOutputBytes);
      let settled = false;
      let exited = false;
      let timedOut = false;
      let exitCode = 0;
      let openStreams = 2;
      let timeoutTimer: NodeJS.Timeout | null = null;
      let killTimer: NodeJS.Timeout | null = null;
      let settleTimer: NodeJS.Timeout | null = null;

      const onInterrupt = (): void => {
        // A child sharing the terminal already got Ctrl-C from it
        if (isolateGroup) channel.signal("SIGINT");
      };
      this.interrupts?.on("SIGINT", onInterrupt);

      const cleanup = (): void => {
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        if (settleTimer) clearTimeout(settleTimer);
        this.interrupts?.removeListener("SIGINT", onInterrupt);
      };

      const finish = (): void => {
        if (settled) return;
        cleanup();
        // A background grandchild may still hold the pipes open
        channel.stdout.destroy();
        channel.stderr.destroy();

        let output = capture.text();
        if (timedOut) {
          output = appendLine(output, `[timed out after ${formatSeconds(timeoutMs)}]`);
        }
        resolve({
          kind: "finished",
          result: {
            exitCode: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
            output,
            timedOut,
            mode,
          },
        });
      };

      const pipe = (stream: Readable, sink: OutputSink): void => {
        const decoder = new StringDecoder("utf8");
        const emit = (text: string): void => {
          if (settled || text === "") return;
          sink.write(text);
          capture.append(text);
        };
        stream.on("data", (chunk: Buffer | string) => {
          emit(typeof chunk === "string" ? chunk : decoder.write(chunk));
        });
        stream.once("end", () => {
          emit(decoder.end());
          openStreams -= 1;
          if (exited && openStreams === 0) finish();
        });
        stream.once("error", () => {
          openStreams -= 1;
          if (exited && openStreams === 0) finish();
        });
      };

      pipe(channel.stdout, this.stdout);
      pipe(channel.stderr, this.stderr);

      channel.onError((error) => {
        if (settled) return;
        if (!exited) {
          cleanup();
          channel.stdout.destroy();
          channel.stderr.destroy();
          resolve({ kind: "spawn-failed", error, output: capture.text() });
        }
      });

      channel.onExit((code, signal) => {
        if (settled) return;
        exited = true;
        if (code !== null) {
          exitCode = code;
        } else if (signal !== null) {
          exitCode = 128 + signalNumber(signal);
        } else {
          exitCode = 1;
        }
        if (openStreams === 0) {
          finish();
          return;
        }
        settleTimer = setTimeout(finish, this.settleMs);
      });

      timeoutTimer = setTimeout(() => {
        if (settled || exited) return;
        timedOut = true;
        channel.signal("SIGTERM");
        killTimer = setTimeout(() => {
          channel.signal("SIGKILL");
        }, this.killGraceMs);
      }, timeoutMs);
    });
  }
}
