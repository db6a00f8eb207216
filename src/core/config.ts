import { z } from "zod";

export const LogLevel = z.enum(["silent", "error", "warn", "info", "debug"]);

/**
 * Library-wide settings. Defaults come from the environment, then
 * `configure()` overrides them for the life of the process.
 */
export const Settings = z.object({
  logLevel: LogLevel,
  outlierFactor: z.number().nonnegative().finite(),
  compressionLevel: z.number().int().min(0).max(9),
  combinatoricsWarnThreshold: z.number().int().nonnegative()
});

export type LogLevelT = z.infer<typeof LogLevel>;
export type SettingsT = z.infer<typeof Settings>;

const EnvSettings = z.object({
  ARRAYKIT_LOG_LEVEL: LogLevel.default("warn"),
  ARRAYKIT_OUTLIER_FACTOR: z.coerce.number().nonnegative().finite().default(1.5),
  ARRAYKIT_COMPRESSION_LEVEL: z.coerce.number().int().min(0).max(9).default(6),
  ARRAYKIT_COMBINATORICS_WARN: z.coerce.number().int().nonnegative().default(10)
});

/**
 * Read settings from an environment map (defaults to `process.env`).
 * Invalid values fail loudly rather than falling back.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): SettingsT {
  const parsed = EnvSettings.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid arraykit environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    logLevel: e.ARRAYKIT_LOG_LEVEL,
    outlierFactor: e.ARRAYKIT_OUTLIER_FACTOR,
    compressionLevel: e.ARRAYKIT_COMPRESSION_LEVEL,
    combinatoricsWarnThreshold: e.ARRAYKIT_COMBINATORICS_WARN
  };
}

let current: SettingsT | undefined;

export function getConfig(): SettingsT {
  current ??= loadSettings();
  return current;
}

export function configure(overrides: Partial<SettingsT>): SettingsT {
  current = Settings.parse({ ...getConfig(), ...overrides });
  return current;
}

export function resetConfig(): void {
  current = undefined;
}
