import { errorMessage } from "../errors.js";
import type { QuestionAnswerer } from "../llm/assistant.js";
import { logAnswer, logError, logIntent, logSessionCleared } from "../logger.js";
import type { ModeIO } from "../runtime.js";
import type { AskOutcome, CommandRecord } from "../types.js";
import { validateInputLength } from "../validators.js";
import { EXIT_FAILURE, type SessionRepository } from "./runMode.js";

export interface AskModeDeps {
  answerer: QuestionAnswerer;
  sessions: SessionRepository;
  io: ModeIO;
}

export interface AskModeSettings {
  maxIntentLength: number;
  osName: string;
  shell: string;
}

export interface AskRequest {
  question: string;
  session: string;
  cwd: string;
  noContext: boolean;
}

/** Answers a question about the previous command. Never executes anything. */
export class AskMode {
  constructor(
    private readonly deps: AskModeDeps,
    private readonly settings: AskModeSettings
  ) {}

  async ask(request: AskRequest): Promise<AskOutcome> {
    const { io, sessions } = this.deps;
    logIntent(request.question, request.session);

    const validation = validateInputLength(request.question, this.settings.maxIntentLength, "Question");
    if (!validation.valid) {
      const error = validation.error ?? "Invalid question";
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

    try {
      const answer = await this.deps.answerer.answer(
        request.question,
        { cwd: request.cwd, osName: this.settings.osName, shell: this.settings.shell },
        previous,
        history
      );
      logAnswer(answer);
      io.send(answer);
      return { status: "answered", answer, exitCode: 0 };
    } catch (err) {
      const error = errorMessage(err);
      logError("answer", error);
      io.sendError(`Error: ${error}`);
      return { status: "failed", error, exitCode: EXIT_FAILURE };
    }
  }
}
