export interface TrimOptions {
  maxLines?: number;
  maxChars?: number;
}

const KEEP_FIRST = 15;
const KEEP_LAST = 10;
export const NO_OUTPUT = "(no output)";

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === "\n") count += 1;
  }
  return count;
}

function capChars(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const omitted = text.length - maxChars;
  return `${text.slice(0, maxChars)}\n\n(truncated - ${omitted} chars omitted)`;
}

/**
 * Shrinks command output before it is persisted for follow-up turns.
 *
 * Head and tail are kept over the middle. Output mentioning an error or
 * exception gets twice the character budget before anything is cut.
 */
export function trimOutput(output: string, options: TrimOptions = {}): string {
  const maxLines = options.maxLines ?? 30;
  const maxChars = options.maxChars ?? 2000;

  if (!output || output.trim() === "") {
    return NO_OUTPUT;
  }

  if (output.length <= maxChars && countNewlines(output) <= maxLines) {
    return output;
  }

  const lower = output.toLowerCase();
  if ((lower.includes("error") || lower.includes("exception")) && output.length <= maxChars * 2) {
    return output;
  }

  const lines = output.split("\n");
  if (lines.length <= maxLines) {
    return capChars(output, maxChars);
  }

  const omitted = lines.length - KEEP_FIRST - KEEP_LAST;
  const kept =
    omitted > 0
      ? [...lines.slice(0, KEEP_FIRST), `\n... (${omitted} lines omitted) ...\n`, ...lines.slice(-KEEP_LAST)]
      : lines;

  return capChars(kept.join("\n"), maxChars);
}
