import { type Config, getConfig } from "./config";

export function vlogIsOn(level: number, config: Config = getConfig()): boolean {
  return config.vlogLevel >= level;
}

/** Print `[tag] message` when the configured verbosity is at least `level`. */
export function vlog(
  level: number,
  tag: string,
  message: string | (() => string),
  config: Config = getConfig(),
): void {
  if (!vlogIsOn(level, config)) return;
  console.log(`[${tag}] ${typeof message === "function" ? message() : message}`);
}

/** Per-op tracing; only printed at verbosity 2 and above. */
export function debugLog(
  tag: string,
  message: string | (() => string),
  config: Config = getConfig(),
): void {
  vlog(2, tag, message, config);
}
