import type { Confirmer } from "../confirmation.js";
import type { EnvironmentSource } from "../context/environment.js";
import { errorMessage } from "../errors.js";
import type { CommandGenerator } from "../llm/assistant.js";
import {
  logCommandResult,
  logConfirmation,
  logError,
  logGenerated,
  logIntent,
  logSessionCleared,
  logSessionSaved,
  logVerdict,
} from "../logger.js";
import type { PolicyEngine } from "../policy/engine.js";
import type { ModeIO } from "../runtime.js";
import { trimOutput, type TrimOptions } from "../session/outputTrimmer.js";
import type {
  CommandRecord,
  ConfirmationRequest,
  ExecutionContext,
  ExecutionResult,
  PolicyVerdict,
  RunOutcome,
} from "../types.js";
import { validateInputLength } from "../validators.js";

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

/** Persistence the modes need from a session store */
export interface SessionRepository {
  loadCurrent(sessionName: string): CommandRecord | null;
  loadHistory(sessionName: string): CommandRecord[];
  save(sessionName: string, command: string, output: string, exitCode: number): CommandRecord;
  clear(sessionName: string): void;
}

export interface CommandRunner {
  execute(command: string, options?: { cwd?: string; timeoutMs?: number }): Promise<ExecutionResult>;
}

export interface RunModeDeps {
  generator: CommandGenerator;
  policy: PolicyEngine;
  runner: CommandRunner;
  sessions: SessionRepository;
  confirmer: Confirmer;
  io: ModeIO;
  /** Project and shell-history context for the generator; omitted when absent */
  environment?: EnvironmentSource;
}

export interface RunModeSettings {
  alwaysConfirm: boolean;
  commandTimeoutMs: number;
  maxIntentLength: number;
  trim: TrimOptions;
  osName: string;
  shell: string;
}

export interface RunRequest {
  intent: string;
  session: string;
  cwd: string;
  noConfirm: boolean;
  noContext: boolean;
  verbose: boolean;
  timeoutMs?: number;
}

/**
 * Decides whether a verdict needs the user's consent, and at what level.
 * Returns null when the command may run straight away.
 */
export function confirmationFor(
  command: string,
  verdict: PolicyVerdict,
  settings: { alwaysConfirm: boolean; noConfirm: boolean }
): ConfirmationRequest | null {
  switch (verdict.decision) {
    case "DENY":
      return null;
    case "CONFIRM":
      if (verdict.level === "lite" && settings.noConfirm) return null;
      return { command, level: verdict.level, reason: verdict.reason };
    case "ALLOW":
      if (!settings.alwaysConfirm || settings.noConfirm) return null;
      return { command, level: "lite", reason: "" };
  }
}

/**
 * One `run` turn: generate a command for the intent, gate it through the
 * policy, ask for consent where needed, execute, and remember the result.
 */
export class RunMode {
  constructor(
    private readonly deps: RunModeDeps,
    private readonly settings: RunModeSettings
  ) {}

  async run(request: RunRequest): Promise<RunOutcome> {
    const { io, sessions } = this.deps;
    logIntent(request.intent, request.session);

    const validation = validateInputLength(request.intent, this.settings.maxIntentLength);
    if (!validation.valid) {
      const error = validation.error ?? "Invalid request";
      logError("validate", error);
      io.sendError(`Error: ${error}`);
      return { status: "rejected", error, exitCode: EXIT_FAILURE };
    }

    let previous: CommandRecord | null = null;
    let history: CommandRecord[] = [];
    if (request.noContext) {
      sessions.clear(request.session);
      logSessionCleared(request.session);
    } else {
      previous = sessions.loadCurrent(request.session);
      history = sessions.loadHistory(request.session);
    }

    const context: ExecutionContext = {
      cwd: request.cwd,
      osName: this.settings.osName,
      shell: this.settings.shell,
      ...this.deps.environment?.gather(request.cwd),
    };

    let command: string;
    try {
      const generated = await this.deps.generator.generate(request.intent, context, previous, history);
      logGenerated(generated);
      command = generated.command;
      io.send(`→ ${command}`);
      if (request.verbose && generated.explanation) {
        io.send(`  ${generated.explanation}`);
      }
    } catch (err) {
      const error = errorMessage(err);
      logError("generate", error);
      io.sendError(`Error: ${error}`);
      return { status: "failed", error, exitCode: EXIT_FAILURE };
    }

    const verdict = this.deps.policy.evaluate(command);
    logVerdict(command, this.deps.policy.name, verdict);

    if (verdict.decision === "DENY") {
      io.sendError(`⛔ ${verdict.reason}`);
      return { status: "denied", command, reason: verdict.reason, exitCode: EXIT_FAILURE };
    }

    const confirmation = confirmationFor(command, verdict, {
      alwaysConfirm: this.settings.alwaysConfirm,
      noConfirm: request.noConfirm,
    });
    if (confirmation) {
      const answer = await this.deps.confirmer.confirm(confirmation);
      logConfirmation(confirmation.level, answer);
      if (answer !== "approved") {
        io.sendError("Command cancelled.");
        return { status: "cancelled", command, exitCode: EXIT_CANCELLED };
      }
    }

    const timeoutMs = request.timeoutMs ?? this.settings.commandTimeoutMs;
    const result = await this.deps.runner.execute(command, { cwd: request.cwd, timeoutMs });
    logCommandResult(command, result);

    if (result.timedOut) {
      io.sendError(`⏱️  Command timed out after ${timeoutMs / 1000}s`);
    }

    if (!request.noContext) {
      this.persist(request.session, command, result);
    }

    return result.timedOut
      ? { status: "timed-out", command, exitCode: result.exitCode }
      : { status: "completed", command, exitCode: result.exitCode };
  }

  private persist(session: string, command: string, result: ExecutionResult): void {
    const output = trimOutput(result.output, this.settings.trim);
    try {
      this.deps.sessions.save(session, command, output, result.exitCode);
      logSessionSaved(session, output.length);
    } catch (err) {
      const error = errorMessage(err);
      logError("session", error);
      this.deps.io.sendError(`Warning: could not save session "${session}": ${error}`);
    }
  }
}
