/**
 * Validates a natural-language request before it reaches the LLM
 */
export function validateInputLength(
  input: string,
  maxLen: number,
  label = "Request"
): { valid: boolean; error: string | null } {
  if (!input.trim()) {
    return { valid: false, error: `${label} cannot be empty` };
  }

  if (input.length > maxLen) {
    return {
      valid: false,
      error: `${label} too long (${input.length} characters, max ${maxLen}). Please keep it shorter.`,
    };
  }

  return { valid: true, error: null };
}
