export {
  createLogger,
  formatEntry,
  connectorLog,
  transportLog,
  networkLog,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';

export {
  MeshError,
  ConnectionError,
  TransportClosedError,
  NotConnectedError,
  TimeoutError,
  ProtocolRegistrationError,
  errorMessage,
} from './errors.js';
