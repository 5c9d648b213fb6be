/**
 * Raised for missing or invalid settings. Always fatal for the invocation and
 * reported before any LLM call.
 */
export class ConfigurationError extends Error {
  readonly hint: string | null;

  constructor(message: string, hint: string | null = null) {
    super(message);
    this.name = "ConfigurationError";
    this.hint = hint;
  }
}

export class UnknownPolicyError extends ConfigurationError {
  readonly policyName: string;
  readonly available: readonly string[];

  constructor(policyName: string, available: readonly string[]) {
    super(
      `Unknown policy: ${policyName}. Available policies: ${available.join(", ")}`,
      "Set CODE_DJINN_POLICY or pass --policy with one of the listed names."
    );
    this.name = "UnknownPolicyError";
    this.policyName = policyName;
    this.available = available;
  }
}

/**
 * The LLM call failed or returned something that is not a usable command.
 * Never retried automatically.
 */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
