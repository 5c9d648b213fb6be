import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Executor } from "../../../src/executor/executor.js";
import { spawnLauncher } from "../../../src/executor/processChannel.js";

// Real child processes; /proc is used to inspect sessions and liveness
const describeLinux = process.platform === "linux" ? describe : describe.skip;

interface ProcStat {
  state: string;
  session: number;
}

function parseStat(text: string): ProcStat {
  // Fields after the parenthesised command name: state ppid pgrp session ...
  const fields = text.slice(text.lastIndexOf(")") + 2).trim().split(/\s+/);
  return { state: fields[0], session: Number(fields[3]) };
}

function isAlive(pid: number): boolean {
  const path = `/proc/${pid}/stat`;
  if (!existsSync(path)) return false;
  try {
    return parseStat(readFileSync(path, "utf8")).state !== "Z";
  } catch {
    return false;
  }
}

function sink(): { write: (chunk: string) => void; text: () => string } {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}

function realExecutor(terminal: boolean, timeoutMs = 10_000) {
  const out = sink();
  const err = sink();
  const executor = new Executor({
    shell: "/bin/sh",
    timeoutMs,
    launcher: spawnLauncher,
    stdout: out,
    stderr: err,
    interrupts: null,
    terminal,
    platform: "linux",
    killGraceMs: 500,
  });
  return { executor, out, err };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describeLinux("spawnLauncher", () => {
  test("returns the shell's exit code", async () => {
    const { executor } = realExecutor(false);

    const result = await executor.execute("exit 7");

    expect(result.exitCode).toBe(7);
    expect(result.mode).toBe("shell");
  });

  test("shows and captures output exactly once", async () => {
    const { executor, out } = realExecutor(false);

    const result = await executor.execute("echo hello");

    expect(result).toEqual({ exitCode: 0, output: "hello\n", timedOut: false, mode: "direct" });
    expect(out.text()).toBe("hello\n");
  });

  test("times out a long-running command", async () => {
    const { executor } = realExecutor(false, 1000);
    const started = Date.now();

    const result = await executor.execute("sleep 60");

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(124);
    expect(result.output).toBe("[timed out after 1s]");
    expect(Date.now() - started).toBeLessThan(5000);
  });

  test("a timeout terminates background children of a detached command", async () => {
    const dir = mkdtempSync(join(tmpdir(), "djinn-exec-"));
    const pidFile = join(dir, "child.pid");
    const { executor } = realExecutor(false, 500);

    const result = await executor.execute(`sleep 30 & echo $! > '${pidFile}'; wait`);
    await delay(200);

    expect(result.timedOut).toBe(true);
    const pid = Number(readFileSync(pidFile, "utf8").trim());
    expect(pid).toBeGreaterThan(0);
    expect(isAlive(pid)).toBe(false);
  });

  test("a detached command runs in a session of its own", async () => {
    const parentSession = parseStat(readFileSync(`/proc/${process.pid}/stat`, "utf8")).session;
    const { executor } = realExecutor(false);

    const result = await executor.execute("cat /proc/$$/stat");

    expect(parseStat(result.output).session).not.toBe(parentSession);
  });

  test("with a terminal the command stays in the caller's session", async () => {
    const parentSession = parseStat(readFileSync(`/proc/${process.pid}/stat`, "utf8")).session;
    const { executor } = realExecutor(true);

    const result = await executor.execute("cat /proc/$$/stat");

    expect(result.exitCode).toBe(0);
    expect(parseStat(result.output).session).toBe(parentSession);
  });
});
