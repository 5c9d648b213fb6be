type EnvMap = Record<string, string | undefined>;

/** Longest delay a Node.js timer accepts; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function getEnv(name: string, env: EnvMap = process.env): string | undefined {
  const value = env[name];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseBoolFlag(name: string, env: EnvMap = process.env): { enabled: boolean; valid: boolean } {
  const raw = getEnv(name, env);
  if (!raw) return { enabled: false, valid: true };
  if (/^(1|true|yes|on)$/i.test(raw)) return { enabled: true, valid: true };
  if (/^(0|false|no|off)$/i.test(raw)) return { enabled: false, valid: true };
  return { enabled: false, valid: false };
}

/**
 * Session names become file names, so they are restricted to a safe alphabet.
 */
export function isValidSessionName(name: string): boolean {
  return /^[A-Za-z0-9_-]{1,64}$/.test(name);
}

export function redactSecret(value: string | undefined): string {
  if (!value) return "(not set)";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 3)}…${value.slice(-4)}`;
}

export function describeOs(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case "darwin":
      return "macOS";
    case "linux":
      return "Linux";
    case "win32":
      return "Windows";
    default:
      return platform;
  }
}
