/**
 * Runtime configuration, read from `REPLICA_HOIST_*` environment variables:
 *
 * - REPLICA_HOIST_VLOG: verbosity; 1 dumps IR before/after each pass,
 *   2 adds per-op debug logging
 * - REPLICA_HOIST_DUMP_TO: directory for IR dumps (logged to stdout if unset)
 * - REPLICA_HOIST_VERIFY_EACH: "1" verifies the IR after every pass
 * - REPLICA_HOIST_CHECK_RESOURCE_WRITES: "1" keeps `tf.Shape` of a resource
 *   read when the resource is written earlier in the replicate body
 */

export type Config = {
  vlogLevel: number;
  dumpDir: string | null;
  verifyEach: boolean;
  checkResourceWrites: boolean;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: Config = {
  vlogLevel: 0,
  dumpDir: null,
  verifyEach: false,
  checkResourceWrites: false,
};

function parseLevel(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const level = parseInt(raw, 10);
  return Number.isNaN(level) || level < 0 ? 0 : level;
}

export function loadConfig(
  env: Env = typeof process !== "undefined" ? process.env : {},
): Config {
  const dumpDir = env.REPLICA_HOIST_DUMP_TO?.trim();
  return {
    vlogLevel: parseLevel(env.REPLICA_HOIST_VLOG),
    dumpDir: dumpDir ? dumpDir : null,
    verifyEach: env.REPLICA_HOIST_VERIFY_EACH === "1",
    checkResourceWrites: env.REPLICA_HOIST_CHECK_RESOURCE_WRITES === "1",
  };
}

let activeConfig: Config | null = null;

export function getConfig(): Config {
  if (!activeConfig) {
    activeConfig = loadConfig();
  }
  return activeConfig;
}

export function setConfig(config: Partial<Config>): Config {
  activeConfig = { ...getConfig(), ...config };
  return activeConfig;
}

/** Drop overrides; the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
  activeConfig = null;
}

export function withConfig<T>(config: Partial<Config>, fn: (config: Config) => T): T {
  const previous = activeConfig;
  const next = setConfig(config);
  try {
    return fn(next);
  } finally {
    activeConfig = previous;
  }
}
