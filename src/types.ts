import type { LocalProjectContext } from "./context/project.js";

// Policy outcome of a single assessment
export type PolicyDecision = "ALLOW" | "CONFIRM" | "DENY";

// How much friction a CONFIRM verdict asks for
export type ConfirmLevel = "lite" | "strict";

// Policy gate verdict, discriminated on decision
export type PolicyVerdict =
  | { decision: "ALLOW" }
  | { decision: "CONFIRM"; pattern: string; level: ConfirmLevel; reason: string }
  | { decision: "DENY"; pattern: string | null; reason: string };

// Confirm-list entry of a policy
export interface ConfirmRule {
  pattern: string;
  level: ConfirmLevel;
}

// One executed turn, as persisted
export interface CommandRecord {
  command: string;
  output: string;         // already trimmed
  exitCode: number;
  timestamp: string;      // ISO-8601
}

// Environment handed to the command generator
export interface ExecutionContext {
  cwd: string;
  osName: string;
  shell: string;
  project?: LocalProjectContext | null;
  recentCommands?: string[];
}

// Canonical shape every provider response is normalised into
export interface GeneratedCommand {
  command: string;
  explanation?: string;
}

export type ExecutionMode = "direct" | "shell";

export interface ExecutionResult {
  exitCode: number;
  output: string;
  timedOut: boolean;
  mode: ExecutionMode;
}

export type ConfirmationResult = "approved" | "declined" | "interrupted";

export interface ConfirmationRequest {
  command: string;
  level: ConfirmLevel;
  reason: string;
}

// Final state of one `run` invocation; exitCode is what the CLI returns
export type RunOutcome =
  | { status: "completed"; command: string; exitCode: number }
  | { status: "timed-out"; command: string; exitCode: number }
  | { status: "denied"; command: string; reason: string; exitCode: number }
  | { status: "cancelled"; command: string; exitCode: number }
  | { status: "rejected"; error: string; exitCode: number }
  | { status: "failed"; error: string; exitCode: number };

// Final state of one `ask` invocation
export type AskOutcome =
  | { status: "answered"; answer: string; exitCode: 0 }
  | { status: "rejected"; error: string; exitCode: number }
  | { status: "failed"; error: string; exitCode: number };
