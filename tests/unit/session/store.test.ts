import { mkdtempSync, readFileSync, readdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { SessionStore } from "../../../src/session/store.js";
import { ConfigurationError } from "../../../src/errors.js";

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "code-djinn-sessions-"));
}

describe("SessionStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("round-trips the current record", () => {
    const store = new SessionStore({ dir });
    store.save("default", "ls", "a b c", 0);

    const current = store.loadCurrent("default");
    expect(current).not.toBeNull();
    expect(current?.command).toBe("ls");
    expect(current?.output).toBe("a b c");
    expect(current?.exitCode).toBe(0);
  });

  test("returns null for a session that was never saved", () => {
    expect(new SessionStore({ dir }).loadCurrent("default")).toBeNull();
    expect(new SessionStore({ dir }).loadHistory("default")).toEqual([]);
  });

  test("keeps only the most recent records, oldest first", () => {
    const store = new SessionStore({ dir, historySize: 5 });
    for (let i = 0; i < 10; i += 1) {
      store.save("default", `echo ${i}`, String(i), 0);
    }

    expect(store.loadHistory("default").map((record) => record.command)).toEqual([
      "echo 5",
      "echo 6",
      "echo 7",
      "echo 8",
      "echo 9",
    ]);
    expect(store.loadCurrent("default")?.command).toBe("echo 9");
  });

  test("writes the documented file shape", () => {
    const store = new SessionStore({ dir, now: () => new Date("2026-01-02T03:04:05.000Z") });
    store.save("work", "false", "", 1);

    const file = JSON.parse(readFileSync(join(dir, "work.json"), "utf8"));
    const record = { command: "false", output: "", exit_code: 1, timestamp: "2026-01-02T03:04:05.000Z" };
    expect(file).toEqual({ version: 1, current: record, history: [record] });
  });

  test("leaves no temp files behind", () => {
    const store = new SessionStore({ dir });
    store.save("default", "pwd", "/", 0);
    expect(readdirSync(dir)).toEqual(["default.json"]);
  });

  test("keeps sessions separate", () => {
    const store = new SessionStore({ dir });
    store.save("a", "echo a", "a", 0);
    store.save("b", "echo b", "b", 0);

    expect(store.loadCurrent("a")?.command).toBe("echo a");
    expect(store.loadCurrent("b")?.command).toBe("echo b");
  });

  test("clear removes the session file", () => {
    const store = new SessionStore({ dir });
    store.save("default", "ls", "x", 0);
    store.clear("default");

    expect(existsSync(join(dir, "default.json"))).toBe(false);
    expect(store.loadCurrent("default")).toBeNull();
  });

  test("clearing a missing session is not an error", () => {
    expect(() => new SessionStore({ dir }).clear("nothing-here")).not.toThrow();
  });

  test("treats unparseable files as no session", () => {
    writeFileSync(join(dir, "default.json"), "{not json", "utf8");
    const store = new SessionStore({ dir });

    expect(store.loadCurrent("default")).toBeNull();
    expect(store.loadHistory("default")).toEqual([]);
  });

  test("treats files with missing or mistyped fields as no session", () => {
    writeFileSync(
      join(dir, "default.json"),
      JSON.stringify({ version: 1, current: { command: "ls", output: "x", exit_code: "0", timestamp: "t" }, history: [] }),
      "utf8"
    );
    expect(new SessionStore({ dir }).loadCurrent("default")).toBeNull();
  });

  test("ignores unknown extra fields", () => {
    const record = { command: "ls", output: "x", exit_code: 0, timestamp: "2026-01-01T00:00:00.000Z", extra: true };
    writeFileSync(
      join(dir, "default.json"),
      JSON.stringify({ version: 1, current: record, history: [record], note: "hi" }),
      "utf8"
    );
    expect(new SessionStore({ dir }).loadCurrent("default")?.command).toBe("ls");
  });

  test("saving over a corrupt file starts a fresh history", () => {
    writeFileSync(join(dir, "default.json"), "garbage", "utf8");
    const store = new SessionStore({ dir });
    store.save("default", "ls", "x", 0);

    expect(store.loadHistory("default")).toHaveLength(1);
  });

  test("expires sessions older than the TTL", () => {
    let now = new Date("2026-01-01T00:00:00.000Z");
    const store = new SessionStore({ dir, ttlMs: 60_000, now: () => now });
    store.save("default", "ls", "x", 0);

    now = new Date("2026-01-01T00:00:30.000Z");
    expect(store.loadCurrent("default")?.command).toBe("ls");

    now = new Date("2026-01-01T00:02:00.000Z");
    expect(store.loadCurrent("default")).toBeNull();
    expect(existsSync(join(dir, "default.json"))).toBe(false);
  });

  test("never expires when the TTL is zero", () => {
    let now = new Date("2026-01-01T00:00:00.000Z");
    const store = new SessionStore({ dir, ttlMs: 0, now: () => now });
    store.save("default", "ls", "x", 0);

    now = new Date("2030-01-01T00:00:00.000Z");
    expect(store.loadCurrent("default")?.command).toBe("ls");
  });

  test("rejects session names that are not safe file names", () => {
    const store = new SessionStore({ dir });
    expect(() => store.save("../escape", "ls", "x", 0)).toThrow(ConfigurationError);
    expect(() => store.loadCurrent("a/b")).toThrow(ConfigurationError);
  });

  test("uses injected file operations", () => {
    const writes: Array<{ path: string; text: string }> = [];
    const store = new SessionStore({
      dir: "/virtual/sessions",
      readTextFile: () => {
        throw new Error("ENOENT");
      },
      writeTextFile: (path, text) => {
        writes.push({ path, text });
      },
    });

    store.save("default", "ls", "x", 0);

    expect(writes).toHaveLength(1);
    expect(writes[0].path).toBe(join("/virtual/sessions", "default.json"));
    expect(JSON.parse(writes[0].text).current.command).toBe("ls");
  });
});
