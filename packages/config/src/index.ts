export {
  ConnectorConfigSchema,
  SimpleMessagingConfigSchema,
  type ConnectorConfig,
  type SimpleMessagingConfig,
} from './schemas.js';

export {
  DEFAULT_CONNECTOR_CONFIG,
  DEFAULT_SIMPLE_MESSAGING_CONFIG,
  loadConnectorConfig,
  resolveSimpleMessagingConfig,
} from './mesh-config.js';
