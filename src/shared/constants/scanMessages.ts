export const SCAN_MESSAGES = {
  INFO: {
    SCAN_STARTED: (rootPath: string, concurrency: number) =>
      `🚀 Scanning ${rootPath} (concurrency ${concurrency})`,
    SCAN_FINISHED: (status: string, files: number, size: string, elapsed: string) =>
      `🎉 Scan ${status}: ${files} files, ${size} in ${elapsed}`,
    CANCEL_REQUESTED: (rootPath: string) =>
      `Cancellation requested for scan of ${rootPath}`,
    REPLACING_SCAN: (previous: string, next: string) =>
      `Cancelling running scan of ${previous} to start ${next}`,
    REPORT_WRITTEN: (outputPath: string) => `✅ Report written to ${outputPath}`,
  },
  DEBUG: {
    ENTRY_UNREADABLE: (path: string, code: string) =>
      `🔍 Unreadable entry ${path} (${code})`,
    LINK_UNREADABLE: (path: string) => `🔍 Could not read link target of ${path}`,
    CYCLE_SKIPPED: (path: string) =>
      `🔍 Not following ${path}: it points to one of its ancestors`,
    MOUNT_TABLE_UNREADABLE: (path: string, reason: string) =>
      `🔍 Could not read ${path}: ${reason}`,
    VOLUMES_DIR_UNREADABLE: (path: string, reason: string) =>
      `🔍 Could not list ${path}: ${reason}`,
  },
  ERRORS: {
    ROOT_NOT_FOUND: (rootPath: string) =>
      `Root path does not exist: ${rootPath}`,
    ROOT_NOT_DIRECTORY: (rootPath: string) =>
      `Root path is not a directory: ${rootPath}`,
    ROOT_INACCESSIBLE: (rootPath: string, reason: string) =>
      `Root path is not accessible: ${rootPath} (${reason})`,
    INTERNAL_FAULT: (rootPath: string, reason: string) =>
      `❌ Scan of ${rootPath} aborted by an internal fault: ${reason}`,
    SCAN_IN_PROGRESS: (rootPath: string) =>
      `A scan of ${rootPath} is already running on this engine`,
    LISTENER_FAILED: "A scan event listener threw an error",
    REPORT_WRITE_FAILED: (outputPath: string) =>
      `Failed to write report to ${outputPath}`,
    VOLUME_LIST_FAILED: "Could not enumerate mounted volumes",
    VOLUME_QUERY_FAILED: (mountPoint: string, reason: string) =>
      `Could not query volume ${mountPoint}: ${reason}`,
  },
} as const;
