import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, loadEnvFile, parseEnv } from "./env.js";
export { env };

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function requireSetting(value: string | undefined, key: string): string {
  if (!value || value.trim().length === 0) {
    throw new ConfigurationError(`Configuration error: ${key} is missing.`);
  }
  return value;
}
