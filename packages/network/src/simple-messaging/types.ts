export const SIMPLE_MESSAGING_PROTOCOL = 'simple_messaging';

// Request actions
export const GET_FILE = 'get_file';
export const DELETE_FILE = 'delete_file';

// Response actions
export const FILE_DOWNLOAD_RESPONSE = 'file_download_response';
export const FILE_DELETION_RESPONSE = 'file_deletion_response';

export const FILE_NOT_FOUND = 'File not found';

export type FileResponseAction = typeof FILE_DOWNLOAD_RESPONSE | typeof FILE_DELETION_RESPONSE;

/**
 * Content of a file download/deletion response. `request_id` is the
 * message_id of the triggering request.
 */
export type FileResponseContent =
  | {
      action: FileResponseAction;
      success: true;
      file_id: string;
      /** Base64 file content, download responses only */
      content?: string;
      request_id: string;
    }
  | {
      action: FileResponseAction;
      success: false;
      error: string;
      request_id: string;
    };

export type SimpleMessagingState = {
  active_agents: number;
  message_history_size: number;
  stored_files: number;
  file_storage_path: string;
};
