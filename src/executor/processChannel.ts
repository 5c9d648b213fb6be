import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

export interface LaunchOptions {
  cwd: string;
  /**
   * Start the child detached, in a new session with its own process group
   * (ignored on win32). A detached child has no controlling terminal, so
   * this is only requested when stdin is not a terminal.
   */
  isolateGroup: boolean;
}

/**
 * A running child as the executor sees it: two output streams, lifecycle
 * events and signal delivery. Signals reach the whole process group of a
 * detached child and only the child itself otherwise.
 */
export interface ProcessChannel {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: NodeJS.ErrnoException) => void): void;
  signal(sig: NodeJS.Signals): void;
}

export type Launcher = (file: string, args: string[], options: LaunchOptions) => ProcessChannel;

export const spawnLauncher: Launcher = (file, args, options) => {
  const detached = options.isolateGroup && process.platform !== "win32";
  const child = spawn(file, args, {
    cwd: options.cwd,
    stdio: ["inherit", "pipe", "pipe"],
    detached,
    windowsHide: true,
  });

  return {
    pid: child.pid,
    stdout: child.stdout,
    stderr: child.stderr,
    onExit(listener) {
      child.once("exit", listener);
    },
    onError(listener) {
      child.once("error", listener);
    },
    signal(sig) {
      if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      if (detached) {
        try {
          process.kill(-child.pid, sig);
          return;
        } catch {
          // Group already gone; fall through to the direct child
        }
      }
      child.kill(sig);
    },
  };
};
