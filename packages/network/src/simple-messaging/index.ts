export { SimpleMessagingProtocol, type SimpleMessagingOptions } from './protocol.js';
export { MessageHistory, type MessageHistoryOptions } from './message-history.js';
export { FileStore, decodeBase64, isValidFileId, type FileStoreOptions } from './file-store.js';
export {
  SIMPLE_MESSAGING_PROTOCOL,
  GET_FILE,
  DELETE_FILE,
  FILE_DOWNLOAD_RESPONSE,
  FILE_DELETION_RESPONSE,
  FILE_NOT_FOUND,
  type FileResponseAction,
  type FileResponseContent,
  type SimpleMessagingState,
} from './types.js';
