import { UnknownPolicyError } from "../errors.js";
import type { ConfirmRule, PolicyDecision, PolicyVerdict } from "../types.js";
import {
  DEFAULT_POLICY,
  POLICIES,
  POLICY_NAMES,
  isPolicyName,
  type PolicyDefinition,
  type PolicyName,
} from "./policies.js";

export interface PolicyDescription {
  name: PolicyName;
  description: string;
  denylist: string[];
  confirmList: ConfirmRule[];
}

export function loadPolicy(name: string): PolicyDefinition {
  const normalized = name.trim().toLowerCase();
  if (!isPolicyName(normalized)) {
    throw new UnknownPolicyError(name, POLICY_NAMES);
  }
  return POLICIES[normalized];
}

/**
 * Classifies command text against one named ruleset.
 *
 * Matching is case-insensitive substring containment; nothing is parsed, so a
 * command that merely mentions a denied phrase (in a comment, a quoted
 * argument, a longer word) is denied too.
 */
export class PolicyEngine {
  readonly policy: PolicyDefinition;

  constructor(name: string = DEFAULT_POLICY) {
    this.policy = loadPolicy(name);
  }

  static availablePolicies(): PolicyName[] {
    return [...POLICY_NAMES];
  }

  get name(): PolicyName {
    return this.policy.name;
  }

  assess(command: string): PolicyDecision {
    return this.evaluate(command).decision;
  }

  evaluate(command: string): PolicyVerdict {
    const normalized = command.trim().toLowerCase();
    if (!normalized) {
      return { decision: "DENY", pattern: null, reason: "Empty command" };
    }

    for (const pattern of this.policy.denylist) {
      if (normalized.includes(pattern.toLowerCase())) {
        return {
          decision: "DENY",
          pattern,
          reason: `Blocked by ${this.policy.name} policy: matches '${pattern}'`,
        };
      }
    }

    for (const rule of this.policy.confirmList) {
      if (normalized.includes(rule.pattern.toLowerCase())) {
        return {
          decision: "CONFIRM",
          pattern: rule.pattern,
          level: rule.level,
          reason: `Flagged by ${this.policy.name} policy: matches '${rule.pattern}'`,
        };
      }
    }

    return { decision: "ALLOW" };
  }

  describe(): PolicyDescription {
    return {
      name: this.policy.name,
      description: this.policy.description,
      denylist: [...this.policy.denylist],
      confirmList: this.policy.confirmList.map((rule) => ({ ...rule })),
    };
  }
}
