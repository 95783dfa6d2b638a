type EnvSource = Record<string, string | undefined>;

function stripSurroundingQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length < 2) return trimmed;
  const startsWithDouble = trimmed.startsWith('"') && trimmed.endsWith('"');
  const startsWithSingle = trimmed.startsWith("'") && trimmed.endsWith("'");
  if (startsWithDouble || startsWithSingle) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

export function readEnv(name: string, fallback = '', env: EnvSource = process.env): string {
  const raw = env[name];
  if (raw == null) return fallback;
  const cleaned = stripSurroundingQuotes(raw);
  return cleaned.length > 0 ? cleaned : fallback;
}

export function readEnvBool(name: string, fallback = false, env: EnvSource = process.env): boolean {
  const raw = readEnv(name, '', env);
  if (!raw) return fallback;
  const normalized = raw.toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export function readEnvInt(
  name: string,
  fallback: number,
  min: number,
  env: EnvSource = process.env
): number {
  const parsed = Number.parseInt(readEnv(name, '', env), 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}
