export interface EvaluatorSettings {
  maxDepth: number;
  useColors: boolean;
}

export const defaultSettings: EvaluatorSettings = {
  maxDepth: 64,
  useColors: true,
};

export type SettingsEnv = Record<string, string | undefined>;

export function parsePositiveInteger(raw: string, source: string): number {
  const value = Number(raw.trim());
  if (!/^\s*\d+\s*$/.test(raw) || !Number.isSafeInteger(value) || value < 1) {
    throw new Error(`Invalid ${source}: expected a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Defaults, then SAFE_ARITH_MAX_DEPTH and NO_COLOR from the environment, then
 * explicit overrides.
 */
export function resolveSettings(
  env: SettingsEnv = process.env,
  overrides: Partial<EvaluatorSettings> = {}
): EvaluatorSettings {
  const settings: EvaluatorSettings = { ...defaultSettings };

  const maxDepth = env.SAFE_ARITH_MAX_DEPTH;
  if (maxDepth !== undefined && maxDepth !== '') {
    settings.maxDepth = parsePositiveInteger(maxDepth, 'SAFE_ARITH_MAX_DEPTH');
  }
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
    settings.useColors = false;
  }

  return { ...settings, ...overrides };
}
