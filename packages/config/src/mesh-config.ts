import {
  ConnectorConfigSchema,
  SimpleMessagingConfigSchema,
  type ConnectorConfig,
  type SimpleMessagingConfig,
} from './schemas.js';

export const DEFAULT_CONNECTOR_CONFIG = {
  host: 'localhost',
  port: 8570,
  agentId: 'agent',
  metadata: {},
  connectTimeoutMs: 5000,
} as const;

export const DEFAULT_SIMPLE_MESSAGING_CONFIG = {
  maxHistorySize: 1000,
  historyTrimBatch: 100,
  storagePrefix: 'agent_mesh_files_',
} as const;

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Build a connector config from defaults, then environment, then explicit
 * overrides. Throws a ZodError when the result is invalid.
 */
export function loadConnectorConfig(
  overrides: Partial<ConnectorConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ConnectorConfig {
  return ConnectorConfigSchema.parse({
    ...DEFAULT_CONNECTOR_CONFIG,
    ...(env.AGENT_MESH_HOST ? { host: env.AGENT_MESH_HOST } : {}),
    ...(readInt(env.AGENT_MESH_PORT) !== undefined ? { port: readInt(env.AGENT_MESH_PORT) } : {}),
    ...(env.AGENT_MESH_AGENT_ID ? { agentId: env.AGENT_MESH_AGENT_ID } : {}),
    ...(readInt(env.AGENT_MESH_CONNECT_TIMEOUT_MS) !== undefined
      ? { connectTimeoutMs: readInt(env.AGENT_MESH_CONNECT_TIMEOUT_MS) }
      : {}),
    ...overrides,
  });
}

export function resolveSimpleMessagingConfig(
  overrides: Partial<SimpleMessagingConfig> = {}
): SimpleMessagingConfig {
  return SimpleMessagingConfigSchema.parse({ ...DEFAULT_SIMPLE_MESSAGING_CONFIG, ...overrides });
}
