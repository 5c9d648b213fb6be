import { homedir } from "node:os";
import { basename } from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ReadlineConfirmer, type Confirmer } from "./confirmation.js";
import { MAX_TIMEOUT_MS, describeOs, isValidSessionName, redactSecret } from "./config.js";
import { LocalEnvironmentSource, type EnvironmentSource } from "./context/environment.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { Executor } from "./executor/executor.js";
import { OpenAIAssistant, validateOpenAIKey, type CommandGenerator, type QuestionAnswerer } from "./llm/assistant.js";
import { ClientCache, openAIClientFactory } from "./llm/clientCache.js";
import { initLogger, logError, logSessionCleared, logSessionEnd } from "./logger.js";
import { AskMode } from "./modes/askMode.js";
import { EXIT_FAILURE, RunMode, type CommandRunner } from "./modes/runMode.js";
import { auditDir, sessionsDir } from "./paths.js";
import { PolicyEngine } from "./policy/engine.js";
import type { ModeIO } from "./runtime.js";
import type { RuntimeConfig } from "./runtimeConfig.js";
import { DEFAULT_SESSION, SessionStore } from "./session/store.js";

type EnvMap = Record<string, string | undefined>;

export interface CliDeps {
  version: string;
  env: EnvMap;
  io: ModeIO;
  cwd: () => string;
  loadConfig: () => RuntimeConfig;
  createAssistant?: (config: RuntimeConfig, apiKey: string) => CommandGenerator & QuestionAnswerer;
  createRunner?: (config: RuntimeConfig) => CommandRunner;
  createEnvironment?: (config: RuntimeConfig) => EnvironmentSource;
  confirmer?: Confirmer;
  platform?: NodeJS.Platform;
}

interface RunCliOptions {
  verbose?: boolean;
  confirm: boolean;
  context: boolean;
  session: string;
  policy?: string;
  /** Milliseconds, converted while parsing */
  timeout?: number;
}

interface AskCliOptions {
  verbose?: boolean;
  context: boolean;
  session: string;
}

/** Parses `--timeout <seconds>` into milliseconds */
function parseTimeoutOption(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  const ms = Math.round(seconds * 1000);
  if (ms < 1) {
    throw new InvalidArgumentError("Timeout must be at least 0.001 seconds.");
  }
  if (ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Timeout must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds.`);
  }
  return ms;
}

function requireSessionName(name: string): string {
  if (!isValidSessionName(name)) {
    throw new ConfigurationError(
      `Invalid session name: "${name}"`,
      "Session names may only contain letters, digits, '-' and '_' (max 64 characters)."
    );
  }
  return name;
}

function requireApiKey(env: EnvMap): string {
  const key = env.OPENAI_API_KEY?.trim();
  const validation = validateOpenAIKey(key);
  if (!key || !validation.valid) {
    throw new ConfigurationError(
      validation.error ?? "OPENAI_API_KEY is not set",
      "Export OPENAI_API_KEY with your OpenAI API key (it starts with 'sk-')."
    );
  }
  return key;
}

function defaultAssistant(config: RuntimeConfig, apiKey: string): OpenAIAssistant {
  return new OpenAIAssistant({
    clients: new ClientCache(openAIClientFactory(config.llmTimeoutMs)),
    apiKey,
    model: config.model,
    maxTokens: config.maxTokens,
  });
}

function defaultRunner(config: RuntimeConfig): Executor {
  return new Executor({
    shell: config.shell,
    timeoutMs: config.commandTimeoutMs,
    maxOutputBytes: config.maxOutputBytes,
  });
}

function defaultEnvironment(config: RuntimeConfig): LocalEnvironmentSource {
  return new LocalEnvironmentSource({
    shell: config.shell,
    userHome: homedir(),
    historyCount: config.shellHistoryCount,
  });
}

function sessionStore(config: RuntimeConfig): SessionStore {
  return new SessionStore({
    dir: sessionsDir(config.homeDir),
    historySize: config.historySize,
    ttlMs: config.sessionTtlMs,
  });
}

function startAuditLog(deps: CliDeps, config: RuntimeConfig, mode: string): void {
  initLogger({
    version: deps.version,
    dir: auditDir(config.homeDir),
    mode,
    limits: { maxOut: config.loggerMaxOut, maxCmd: config.loggerMaxCmd, maxMsg: config.loggerMaxMsg },
  });
}

export function describePolicy(engine: PolicyEngine, activeName: string): string {
  const info = engine.describe();
  const lines = [
    `Policy: ${info.name}${info.name === activeName ? " (active)" : ""}`,
    info.description,
    "",
    "Denied patterns:",
    ...(info.denylist.length > 0 ? info.denylist.map((pattern) => `  - ${pattern}`) : ["  (none)"]),
    "",
    "Confirmation required:",
    ...(info.confirmList.length > 0
      ? info.confirmList.map((rule) => `  - ${rule.pattern} (${rule.level})`)
      : ["  (none)"]),
    "",
    `Available policies: ${PolicyEngine.availablePolicies().join(", ")}`,
  ];
  return lines.join("\n");
}

export function describeSettings(config: RuntimeConfig, env: EnvMap): string {
  const rows: Array<[string, string]> = [
    ["model", config.model],
    ["policy", config.policy],
    ["shell", config.shell],
    ["home", config.homeDir],
    ["always confirm", config.alwaysConfirm ? "yes" : "no"],
    ["command timeout", `${config.commandTimeoutMs / 1000}s`],
    ["llm timeout", `${config.llmTimeoutMs / 1000}s`],
    ["max tokens", String(config.maxTokens)],
    ["history size", String(config.historySize)],
    ["shell history", config.shellHistoryCount > 0 ? `last ${config.shellHistoryCount} commands` : "off"],
    ["session ttl", config.sessionTtlMs > 0 ? `${config.sessionTtlMs / 1000}s` : "never"],
    ["output trim", `${config.trimMaxLines} lines / ${config.trimMaxChars} chars`],
    ["captured output cap", `${config.maxOutputBytes} bytes`],
    ["OPENAI_API_KEY", redactSecret(env.OPENAI_API_KEY?.trim())],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`).join("\n");
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();
  const platform = deps.platform ?? process.platform;

  // Settings below are inherited by subcommands created after them
  program
    .name("code-djinn")
    .description("Turn natural-language requests into shell commands, safely")
    .version(deps.version)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.send(text.replace(/\n$/, "")),
      writeErr: (text) => deps.io.sendError(text.replace(/\n$/, "")),
    });

  program
    .command("run")
    .description("Generate a command for the request, check it against the policy and run it")
    .argument("<request...>", "what you want to do, in plain words")
    .option("-v, --verbose", "show the model's explanation and full error details")
    .option("--no-confirm", "skip the y/n prompt (high-risk commands still ask for YES)")
    .option("--no-context", "clear the session and do not use or save context")
    .option("-s, --session <name>", "session to read and write", DEFAULT_SESSION)
    .option("-p, --policy <name>", "safety policy for this run (loose, balanced, strict)")
    .option("-t, --timeout <seconds>", "command timeout in seconds", parseTimeoutOption)
    .action(async (request: string[], options: RunCliOptions) => {
      const config = deps.loadConfig();
      const session = requireSessionName(options.session);
      const policy = new PolicyEngine(options.policy ?? config.policy);
      const apiKey = requireApiKey(deps.env);

      startAuditLog(deps, config, "run");
      const mode = new RunMode(
        {
          generator: (deps.createAssistant ?? defaultAssistant)(config, apiKey),
          policy,
          runner: (deps.createRunner ?? defaultRunner)(config),
          sessions: sessionStore(config),
          confirmer: deps.confirmer ?? new ReadlineConfirmer(),
          io: deps.io,
          environment: (deps.createEnvironment ?? defaultEnvironment)(config),
        },
        {
          alwaysConfirm: config.alwaysConfirm,
          commandTimeoutMs: config.commandTimeoutMs,
          maxIntentLength: config.maxIntentLength,
          trim: { maxLines: config.trimMaxLines, maxChars: config.trimMaxChars },
          osName: describeOs(platform),
          shell: basename(config.shell),
        }
      );

      const outcome = await mode.run({
        intent: request.join(" ").trim(),
        session,
        cwd: deps.cwd(),
        noConfirm: !options.confirm,
        noContext: !options.context,
        verbose: options.verbose ?? false,
        timeoutMs: options.timeout,
      });
      logSessionEnd(outcome.exitCode);
      setExitCode(outcome.exitCode);
    });

  program
    .command("ask")
    .description("Ask a question about the previous command and its output")
    .argument("<question...>", "your question")
    .option("-v, --verbose", "show full error details")
    .option("--no-context", "clear the session and answer without it")
    .option("-s, --session <name>", "session to read", DEFAULT_SESSION)
    .action(async (question: string[], options: AskCliOptions) => {
      const config = deps.loadConfig();
      const session = requireSessionName(options.session);
      const apiKey = requireApiKey(deps.env);

      startAuditLog(deps, config, "ask");
      const mode = new AskMode(
        {
          answerer: (deps.createAssistant ?? defaultAssistant)(config, apiKey),
          sessions: sessionStore(config),
          io: deps.io,
        },
        {
          maxIntentLength: config.maxIntentLength,
          osName: describeOs(platform),
          shell: basename(config.shell),
        }
      );

      const outcome = await mode.ask({
        question: question.join(" ").trim(),
        session,
        cwd: deps.cwd(),
        noContext: !options.context,
      });
      logSessionEnd(outcome.exitCode);
      setExitCode(outcome.exitCode);
    });

  program
    .command("clear")
    .description("Forget the stored context of a session")
    .option("-s, --session <name>", "session to clear", DEFAULT_SESSION)
    .action((options: { session: string }) => {
      const config = deps.loadConfig();
      const session = requireSessionName(options.session);
      startAuditLog(deps, config, "clear");
      sessionStore(config).clear(session);
      logSessionCleared(session);
      deps.io.send(`Session "${session}" cleared.`);
      logSessionEnd(0);
      setExitCode(0);
    });

  program
    .command("policy")
    .description("Show the rules of the active or a named safety policy")
    .argument("[name]", "policy to describe")
    .action((name: string | undefined) => {
      const config = deps.loadConfig();
      const engine = new PolicyEngine(name ?? config.policy);
      deps.io.send(describePolicy(engine, config.policy));
      setExitCode(0);
    });

  const settings = program.command("settings").description("Inspect configuration");
  settings
    .command("show")
    .description("Print the effective configuration")
    .action(() => {
      deps.io.send(describeSettings(deps.loadConfig(), deps.env));
      setExitCode(0);
    });

  return program;
}

/**
 * Parses argv and runs one subcommand. Resolves to the process exit code;
 * never rejects.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const message = errorMessage(err);
    logError("cli", message);
    deps.io.sendError(`Error: ${message}`);
    if (err instanceof ConfigurationError && err.hint) {
      deps.io.sendError(`Hint: ${err.hint}`);
    }
    if ((argv.includes("-v") || argv.includes("--verbose")) && err instanceof Error && err.stack) {
      deps.io.sendError(err.stack);
    }
    logSessionEnd(EXIT_FAILURE);
    return EXIT_FAILURE;
  }
}
