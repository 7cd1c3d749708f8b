import { localTransportConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Local transport configuration with sensible defaults */
export interface LocalTransportConfig {
  // Timeouts
  commandTimeoutMs?: number; // default: 600000
  sessionResponseTimeoutMs?: number; // default: 600000

  // Session acquisition
  pipeConnectAttempts?: number; // default: 100
  pipeConnectIntervalMs?: number; // default: 100
  pipeNamePrefix?: string; // default: "localrun_"
  sessionEnabled?: boolean; // default: true

  // Windows scripting host
  scriptingHost?: string; // default: "powershell"
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<LocalTransportConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  commandTimeoutMs: 600_000,
  sessionResponseTimeoutMs: 600_000,
  pipeConnectAttempts: 100,
  pipeConnectIntervalMs: 100,
  pipeNamePrefix: "localrun_",
  sessionEnabled: true,
  scriptingHost: "powershell",
};

export function resolveConfig(config: LocalTransportConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = localTransportConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(validation.data)) {
    if (value !== undefined) Object.assign(resolved, { [key]: value });
  }
  return resolved;
}
