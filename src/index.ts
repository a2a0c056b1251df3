export type {
  DirectoryInfo,
  EntryErrorKind,
  EntryKind,
  EntryScanError,
  FileInfo,
  LeafInfo,
} from "./domain/model/FileInfo";
export type {
  ScanResult,
  ScanStatus,
  ScanState,
  ScanSummary,
  ScanFailure,
  InvalidRootReason,
} from "./domain/model/ScanResult";
export type {
  ScanEvent,
  ScanEventListener,
  ScanProgress,
  ScanProgressEvent,
  ScanResultEvent,
} from "./domain/model/ScanEvent";
export type { DriveInfo } from "./domain/model/DriveInfo";

export type { ScanOptions } from "./application/ports/driving/ScanOptions";
export type { ScanHandle, ScanUseCase } from "./application/ports/driving/ScanUseCase";
export type {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "./application/ports/driven/FileSystemPort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";
export type { VolumePort, VolumeCapacity } from "./application/ports/driven/VolumePort";

export { ScanEngine } from "./application/use-cases/scan/ScanEngine";
export type {
  ConcurrentScanPolicy,
  ScanEngineSettings,
} from "./application/use-cases/scan/ScanEngine";
export {
  StatsAggregator,
  NO_EXTENSION_KEY,
} from "./application/services/stats/StatsAggregator";
export type {
  ExtensionStats,
  LargestItemsScope,
  TreeSummary,
} from "./application/services/stats/StatsAggregator";
export { ReportExporter } from "./application/services/export/ReportExporter";
export type { ReportFormat, JsonReport } from "./application/services/export/ReportExporter";
export { DriveEnumerator } from "./application/services/drives/DriveEnumerator";

export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export { VolumeAdapter } from "./adapters/secondary/volumes/VolumeAdapter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
export { createContainer } from "./adapters/primary/di/dependencyContainer";
export type { Container, ContainerOptions } from "./adapters/primary/di/dependencyContainer";

export {
  DEFAULT_SCAN_OPTIONS,
  loadScanConfiguration,
  resolveScanOptions,
} from "./shared/config/scanConfiguration";
export {
  ScanEngineError,
  ScanInProgressError,
  InvalidOptionsError,
} from "./shared/errors/scanErrors";
export { formatSize, formatDuration } from "./shared/utils/formatSize";
export { describeCompleteness } from "./shared/utils/scanResultUtils";
export type { ScanCompleteness } from "./shared/utils/scanResultUtils";
export {
  walkTree,
  flattenTree,
  findNode,
  countDirectories,
  findInconsistentDirectories,
} from "./shared/utils/treeAccessors";
