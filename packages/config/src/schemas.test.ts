import { describe, it, expect } from 'vitest';
import { ConnectorConfigSchema, SimpleMessagingConfigSchema } from './schemas.js';
import {
  DEFAULT_CONNECTOR_CONFIG,
  DEFAULT_SIMPLE_MESSAGING_CONFIG,
  loadConnectorConfig,
  resolveSimpleMessagingConfig,
} from './mesh-config.js';

describe('config schemas', () => {
  it('validates connector defaults', () => {
    expect(ConnectorConfigSchema.parse(DEFAULT_CONNECTOR_CONFIG)).toEqual(DEFAULT_CONNECTOR_CONFIG);
  });

  it('validates simple messaging defaults', () => {
    expect(SimpleMessagingConfigSchema.parse(DEFAULT_SIMPLE_MESSAGING_CONFIG)).toEqual(
      DEFAULT_SIMPLE_MESSAGING_CONFIG
    );
  });

  it('rejects out-of-range ports', () => {
    expect(ConnectorConfigSchema.safeParse({ ...DEFAULT_CONNECTOR_CONFIG, port: 70000 }).success).toBe(false);
  });

  it('rejects a trim batch larger than the history', () => {
    const result = SimpleMessagingConfigSchema.safeParse({
      ...DEFAULT_SIMPLE_MESSAGING_CONFIG,
      maxHistorySize: 10,
      historyTrimBatch: 20,
    });
    expect(result.success).toBe(false);
  });
});

describe('loadConnectorConfig', () => {
  it('returns defaults with an empty environment', () => {
    expect(loadConnectorConfig({}, {})).toEqual(DEFAULT_CONNECTOR_CONFIG);
  });

  it('reads environment variables', () => {
    const cfg = loadConnectorConfig(
      {},
      {
        AGENT_MESH_HOST: 'mesh.internal',
        AGENT_MESH_PORT: '9001',
        AGENT_MESH_AGENT_ID: 'A1',
        AGENT_MESH_CONNECT_TIMEOUT_MS: '250',
      }
    );
    expect(cfg).toEqual({
      host: 'mesh.internal',
      port: 9001,
      agentId: 'A1',
      metadata: {},
      connectTimeoutMs: 250,
    });
  });

  it('prefers explicit overrides over the environment', () => {
    const cfg = loadConnectorConfig({ agentId: 'B2', metadata: { role: 'worker' } }, { AGENT_MESH_AGENT_ID: 'A1' });
    expect(cfg.agentId).toBe('B2');
    expect(cfg.metadata).toEqual({ role: 'worker' });
  });

  it('ignores a non-numeric port', () => {
    expect(loadConnectorConfig({}, { AGENT_MESH_PORT: 'abc' }).port).toBe(8570);
  });
});

describe('resolveSimpleMessagingConfig', () => {
  it('applies overrides', () => {
    expect(resolveSimpleMessagingConfig({ maxHistorySize: 50, historyTrimBatch: 5 })).toEqual({
      maxHistorySize: 50,
      historyTrimBatch: 5,
      storagePrefix: 'agent_mesh_files_',
    });
  });
});
