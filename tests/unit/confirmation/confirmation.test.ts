import { PassThrough } from "node:stream";
import { ReadlineConfirmer, interpretAnswer } from "../../../src/confirmation.js";
import type { ConfirmationRequest } from "../../../src/types.js";

function terminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf8");
  });
  return { input, output, written: () => written };
}

const liteRequest: ConfirmationRequest = {
  command: "sudo apt update",
  level: "lite",
  reason: "Flagged by strict policy: matches 'sudo'",
};

const strictRequest: ConfirmationRequest = {
  command: "rm -r build",
  level: "strict",
  reason: "Flagged by strict policy: matches 'rm -r'",
};

describe("interpretAnswer()", () => {
  test.each(["", "y", "Y", "yes", " Yes "])("lite approves %p", (answer) => {
    expect(interpretAnswer("lite", answer)).toBe("approved");
  });

  test.each(["n", "no", "nope", "q"])("lite declines %p", (answer) => {
    expect(interpretAnswer("lite", answer)).toBe("declined");
  });

  test("strict approves only the exact text YES", () => {
    expect(interpretAnswer("strict", "YES")).toBe("approved");
    expect(interpretAnswer("strict", "yes")).toBe("declined");
    expect(interpretAnswer("strict", "y")).toBe("declined");
    expect(interpretAnswer("strict", "")).toBe("declined");
  });
});

describe("ReadlineConfirmer", () => {
  test("Enter approves a lite prompt", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(liteRequest);
    term.input.write("\n");

    await expect(pending).resolves.toBe("approved");
  });

  test("n declines a lite prompt", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(liteRequest);
    term.input.write("n\n");

    await expect(pending).resolves.toBe("declined");
  });

  test("strict prompts decline anything but YES", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(strictRequest);
    term.input.write("y\n");

    await expect(pending).resolves.toBe("declined");
  });

  test("strict prompts approve YES", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(strictRequest);
    term.input.write("YES\n");

    await expect(pending).resolves.toBe("approved");
  });

  test("end of input counts as interrupted", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(liteRequest);
    term.input.end();

    await expect(pending).resolves.toBe("interrupted");
  });

  test("shows the reason and the prompt for the level", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm(strictRequest);
    term.input.write("no\n");
    await pending;

    expect(term.written()).toContain("⚠️  Flagged by strict policy: matches 'rm -r'\n");
    expect(term.written()).toContain("Type YES to execute: ");
  });

  test("skips the reason line when there is none", async () => {
    const term = terminal();
    const confirmer = new ReadlineConfirmer({ input: term.input, output: term.output });

    const pending = confirmer.confirm({ command: "ls", level: "lite", reason: "" });
    term.input.write("y\n");
    await pending;

    expect(term.written()).toBe("Execute this command? [Y/n] ");
  });
});
