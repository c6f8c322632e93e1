import { generatorConfigSchema } from '../../application/config-schema.js';
import type { GeneratorConfig } from '../../application/config-schema.js';
import { ConfigError } from '../../application/errors.js';
import { SETTINGS, settingId } from './settings.js';

/** Raw string values keyed by setting id (`rates.http_access`, `target`, …). */
export type RawSettings = ReadonlyMap<string, string>;

/** Reads every known environment variable. Empty values count as unset. */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Map<string, string> {
  const values = new Map<string, string>();
  for (const setting of SETTINGS) {
    const value = env[setting.env]?.trim();
    if (value) values.set(settingId(setting), value);
  }
  return values;
}

type Section = Record<string, string>;

/** Nests flat values into the shape `generatorConfigSchema` expects. */
function toConfigInput(values: RawSettings): Record<string, string | Section> {
  const input: Record<string, string | Section> = {};
  const sections = new Map<string, Section>();

  for (const setting of SETTINGS) {
    const value = values.get(settingId(setting));
    if (value === undefined) continue;

    if (setting.section === undefined) {
      input[setting.key] = value;
      continue;
    }

    let section = sections.get(setting.section);
    if (section === undefined) {
      section = {};
      sections.set(setting.section, section);
      input[setting.section] = section;
    }
    section[setting.key] = value;
  }

  return input;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** CLI values; they win over the environment. */
  overrides?: RawSettings;
}

/**
 * Loads configuration: defaults < environment < CLI flags.
 *
 * @throws ConfigError with every validation issue.
 */
export function loadConfig(sources: ConfigSources = {}): GeneratorConfig {
  const merged = new Map(settingsFromEnv(sources.env ?? process.env));
  for (const [id, value] of sources.overrides ?? []) {
    merged.set(id, value);
  }

  const parsed = generatorConfigSchema.safeParse(toConfigInput(merged));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}
