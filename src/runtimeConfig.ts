import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import { MAX_TIMEOUT_MS, parseBoolFlag } from "./config.js";
import { DEFAULT_POLICY, POLICY_NAMES, isPolicyName, type PolicyName } from "./policy/policies.js";

type EnvMap = Record<string, string | undefined>;

export interface RuntimeConfig {
  model: string;
  maxTokens: number;
  llmTimeoutMs: number;
  policy: PolicyName;
  shell: string;
  homeDir: string;
  alwaysConfirm: boolean;
  commandTimeoutMs: number;
  historySize: number;
  trimMaxLines: number;
  trimMaxChars: number;
  maxIntentLength: number;
  maxOutputBytes: number;
  sessionTtlMs: number;
  shellHistoryCount: number;
  loggerMaxOut: number;
  loggerMaxCmd: number;
  loggerMaxMsg: number;
}

interface NumericOverride {
  name: string;
  defaultValue: number;
  min: number;
  max?: number;
}

const NUMERIC_OVERRIDES: NumericOverride[] = [
  { name: "CODE_DJINN_MAX_TOKENS", defaultValue: 512, min: 1 },
  { name: "CODE_DJINN_LLM_TIMEOUT_MS", defaultValue: 30_000, min: 1, max: MAX_TIMEOUT_MS },
  { name: "CODE_DJINN_TIMEOUT_MS", defaultValue: 30_000, min: 1, max: MAX_TIMEOUT_MS },
  { name: "CODE_DJINN_HISTORY_SIZE", defaultValue: 5, min: 1 },
  { name: "CODE_DJINN_TRIM_MAX_LINES", defaultValue: 30, min: 1 },
  { name: "CODE_DJINN_TRIM_MAX_CHARS", defaultValue: 2000, min: 1 },
  { name: "CODE_DJINN_MAX_INTENT_LENGTH", defaultValue: 4000, min: 1 },
  { name: "CODE_DJINN_MAX_OUTPUT_BYTES", defaultValue: 512 * 1024, min: 1 },
  { name: "CODE_DJINN_SESSION_TTL_MS", defaultValue: 0, min: 0 },
  { name: "CODE_DJINN_SHELL_HISTORY_COUNT", defaultValue: 15, min: 0 },
  { name: "CODE_DJINN_LOGGER_MAX_OUT", defaultValue: 500, min: 1 },
  { name: "CODE_DJINN_LOGGER_MAX_CMD", defaultValue: 200, min: 1 },
  { name: "CODE_DJINN_LOGGER_MAX_MSG", defaultValue: 300, min: 1 },
];

const DEFAULT_MODEL = "gpt-4o-mini";

function parseNonNegativeInteger(
  env: EnvMap,
  override: NumericOverride
): { value: number; error?: string } {
  const raw = env[override.name];
  if (raw === undefined || raw.trim() === "") {
    return { value: override.defaultValue };
  }

  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return {
      value: override.defaultValue,
      error: `${override.name} must be an integer >= ${override.min} (received: "${raw}").`,
    };
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < override.min) {
    return {
      value: override.defaultValue,
      error: `${override.name} must be >= ${override.min} (received: ${parsed}).`,
    };
  }

  if (override.max !== undefined && parsed > override.max) {
    return {
      value: override.defaultValue,
      error: `${override.name} must be <= ${override.max} (received: ${parsed}).`,
    };
  }

  return { value: parsed };
}

export function validateRuntimeConfigEnv(
  env: EnvMap = process.env
): string[] {
  const errors: string[] = [];

  const modelRaw = env.CODE_DJINN_MODEL;
  if (modelRaw !== undefined && modelRaw.trim() === "") {
    errors.push("CODE_DJINN_MODEL cannot be empty when set.");
  }

  const policyRaw = env.CODE_DJINN_POLICY;
  if (policyRaw !== undefined && !isPolicyName(policyRaw.trim().toLowerCase())) {
    errors.push(
      `CODE_DJINN_POLICY must be one of ${POLICY_NAMES.join(", ")} (received: "${policyRaw}").`
    );
  }

  if (!parseBoolFlag("CODE_DJINN_ALWAYS_CONFIRM", env).valid) {
    errors.push("CODE_DJINN_ALWAYS_CONFIRM must be a boolean flag (1/0, true/false, yes/no, on/off).");
  }

  for (const override of NUMERIC_OVERRIDES) {
    const parsed = parseNonNegativeInteger(env, override);
    if (parsed.error) {
      errors.push(parsed.error);
    }
  }

  return errors;
}

function getRequired(map: Map<string, number>, key: string): number {
  const value = map.get(key);
  if (value === undefined) {
    throw new Error(`Required runtime config key missing: ${key}`);
  }
  return value;
}

function resolvePolicy(raw: string | undefined): PolicyName {
  const normalized = raw?.trim().toLowerCase();
  return normalized && isPolicyName(normalized) ? normalized : DEFAULT_POLICY;
}

export function buildRuntimeConfig(
  env: EnvMap = process.env
): RuntimeConfig {
  const errors = validateRuntimeConfigEnv(env);
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid runtime configuration:\n- ${errors.join("\n- ")}`,
      "Fix or unset the listed environment variables."
    );
  }

  const values = new Map<string, number>();
  for (const override of NUMERIC_OVERRIDES) {
    values.set(override.name, parseNonNegativeInteger(env, override).value);
  }

  return {
    model: env.CODE_DJINN_MODEL?.trim() || DEFAULT_MODEL,
    maxTokens: getRequired(values, "CODE_DJINN_MAX_TOKENS"),
    llmTimeoutMs: getRequired(values, "CODE_DJINN_LLM_TIMEOUT_MS"),
    policy: resolvePolicy(env.CODE_DJINN_POLICY),
    shell: env.CODE_DJINN_SHELL?.trim() || env.SHELL?.trim() || "bash",
    homeDir: env.CODE_DJINN_HOME?.trim() || join(homedir(), ".config", "code-djinn"),
    alwaysConfirm: parseBoolFlag("CODE_DJINN_ALWAYS_CONFIRM", env).enabled,
    commandTimeoutMs: getRequired(values, "CODE_DJINN_TIMEOUT_MS"),
    historySize: getRequired(values, "CODE_DJINN_HISTORY_SIZE"),
    trimMaxLines: getRequired(values, "CODE_DJINN_TRIM_MAX_LINES"),
    trimMaxChars: getRequired(values, "CODE_DJINN_TRIM_MAX_CHARS"),
    maxIntentLength: getRequired(values, "CODE_DJINN_MAX_INTENT_LENGTH"),
    maxOutputBytes: getRequired(values, "CODE_DJINN_MAX_OUTPUT_BYTES"),
    sessionTtlMs: getRequired(values, "CODE_DJINN_SESSION_TTL_MS"),
    shellHistoryCount: getRequired(values, "CODE_DJINN_SHELL_HISTORY_COUNT"),
    loggerMaxOut: getRequired(values, "CODE_DJINN_LOGGER_MAX_OUT"),
    loggerMaxCmd: getRequired(values, "CODE_DJINN_LOGGER_MAX_CMD"),
    loggerMaxMsg: getRequired(values, "CODE_DJINN_LOGGER_MAX_MSG"),
  };
}

let cachedRuntimeConfig: RuntimeConfig | null = null;

export function getRuntimeConfig(): RuntimeConfig {
  if (!cachedRuntimeConfig) {
    cachedRuntimeConfig = buildRuntimeConfig();
  }
  return cachedRuntimeConfig;
}
