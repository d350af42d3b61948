import { logger } from "./logger";

export interface Config {
  redraw: boolean;
}

function getOptionalBooleanEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  logger.warn(`Invalid boolean for ${key}, using default: ${defaultValue}`);
  return defaultValue;
}

export function loadConfig(): Config {
  const config: Config = {
    redraw: getOptionalBooleanEnv("MENUTREE_REDRAW", true),
  };
  logger.debug({ event: "config.loaded", ...config });
  return config;
}
