import type { ConfirmRule } from "../types.js";

export type PolicyName = "loose" | "balanced" | "strict";

export interface PolicyDefinition {
  readonly name: PolicyName;
  readonly description: string;
  readonly denylist: readonly string[];
  readonly confirmList: readonly ConfirmRule[];
}

// Only the commands that destroy a system outright.
const LOOSE_DENYLIST = [
  "rm -rf /",
  "rm -fr /",
  "mkfs",
  "dd if=/dev/",
  "dd of=/dev/",
  ":(){ :|:& };:",
] as const;

const BALANCED_DENYLIST = [
  ...LOOSE_DENYLIST,
  "fdisk",
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
  "init 0",
  "init 6",
  "kill -9 1",
  "killall -9",
  "sudo rm",
  "chmod 777",
  "chmod -R 777",
] as const;

const STRICT_DENYLIST = [
  ...BALANCED_DENYLIST,
  "curl | sh",
  "wget | sh",
  "curl | bash",
  "wget | bash",
  "eval",
  "python -c",
  "perl -e",
  "> /dev/",
  "< /dev/",
  "chown -r",
  "chmod +x /tmp",
] as const;

/**
 * Built-in rulesets, keyed by name. Pipes, redirects and chaining are never
 * listed here: only specific high-risk verbs and targets escalate.
 */
export const POLICIES: { readonly [K in PolicyName]: PolicyDefinition & { readonly name: K } } = {
  loose: {
    name: "loose",
    description: "Minimal safety - only blocks system-destroying commands",
    denylist: LOOSE_DENYLIST,
    confirmList: [],
  },
  balanced: {
    name: "balanced",
    description: "Balanced safety - blocks dangerous commands, allows normal CLI workflows",
    denylist: BALANCED_DENYLIST,
    confirmList: [],
  },
  strict: {
    name: "strict",
    description: "Strict safety - extended denylist with confirmation for risky patterns",
    denylist: STRICT_DENYLIST,
    confirmList: [
      { pattern: "sudo", level: "lite" },
      { pattern: "rm -r", level: "strict" },
      { pattern: "rm -rf", level: "strict" },
    ],
  },
};

export const POLICY_NAMES: readonly PolicyName[] = ["loose", "balanced", "strict"];

export const DEFAULT_POLICY: PolicyName = "balanced";

export function isPolicyName(value: string): value is PolicyName {
  return POLICY_NAMES.some((name) => name === value);
}
