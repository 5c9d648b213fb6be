import { jest } from "@jest/globals";
import { AskMode, type AskRequest } from "../../../src/modes/askMode.js";
import type { SessionRepository } from "../../../src/modes/runMode.js";
import type { QuestionAnswerer } from "../../../src/llm/assistant.js";
import { GenerationError } from "../../../src/errors.js";
import type { CommandRecord } from "../../../src/types.js";

const previous: CommandRecord = {
  command: "npm test",
  output: "1 failing",
  exitCode: 1,
  timestamp: "2026-01-01T00:00:00.000Z",
};

function sessionsWith(current: CommandRecord | null) {
  const cleared: string[] = [];
  const saves: string[] = [];
  const sessions: SessionRepository = {
    loadCurrent: () => current,
    loadHistory: () => (current ? [current] : []),
    save: (session, command, output, exitCode) => {
      saves.push(command);
      return { command, output, exitCode, timestamp: "t" };
    },
    clear: (session) => {
      cleared.push(session);
    },
  };
  return { sessions, cleared, saves };
}

function setup(answer: string | Error, current: CommandRecord | null = previous) {
  const calls: Array<{ question: string; previous: CommandRecord | null; history: CommandRecord[] }> = [];
  const answerer: QuestionAnswerer = {
    async answer(question, _context, prev, history) {
      calls.push({ question, previous: prev, history });
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
  const store = sessionsWith(current);
  const send = jest.fn<(text: string) => void>();
  const sendError = jest.fn<(text: string) => void>();
  const mode = new AskMode(
    { answerer, sessions: store.sessions, io: { send, sendError } },
    { maxIntentLength: 50, osName: "Linux", shell: "zsh" }
  );
  return { mode, calls, send, sendError, ...store };
}

function request(overrides: Partial<AskRequest> = {}): AskRequest {
  return { question: "why did it fail?", session: "default", cwd: "/work", noContext: false, ...overrides };
}

describe("AskMode", () => {
  test("answers using the previous command as context", async () => {
    const { mode, calls, send } = setup("One test is failing in parser.test.ts.");

    const outcome = await mode.ask(request());

    expect(outcome).toEqual({ status: "answered", answer: "One test is failing in parser.test.ts.", exitCode: 0 });
    expect(calls).toEqual([{ question: "why did it fail?", previous, history: [previous] }]);
    expect(send).toHaveBeenCalledWith("One test is failing in parser.test.ts.");
  });

  test("never saves anything", async () => {
    const { mode, saves } = setup("fine");

    await mode.ask(request());

    expect(saves).toHaveLength(0);
  });

  test("--no-context clears the session and asks without it", async () => {
    const { mode, calls, cleared } = setup("no context");

    await mode.ask(request({ noContext: true, session: "work" }));

    expect(cleared).toEqual(["work"]);
    expect(calls[0].previous).toBeNull();
    expect(calls[0].history).toEqual([]);
  });

  test("model failures exit 1", async () => {
    const { mode, sendError } = setup(new GenerationError("LLM request failed: timeout"));

    const outcome = await mode.ask(request());

    expect(outcome).toEqual({ status: "failed", error: "LLM request failed: timeout", exitCode: 1 });
    expect(sendError).toHaveBeenCalledWith("Error: LLM request failed: timeout");
  });

  test("rejects an empty question", async () => {
    const { mode, calls } = setup("unused");

    const outcome = await mode.ask(request({ question: "" }));

    expect(outcome).toEqual({ status: "rejected", error: "Question cannot be empty", exitCode: 1 });
    expect(calls).toHaveLength(0);
  });
});
