import { FileInfo } from "../../../domain/model/FileInfo";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { SCAN_MESSAGES } from "../../../shared/constants/scanMessages";
import { toCsv } from "../../../shared/utils/csv";
import { formatSize } from "../../../shared/utils/formatSize";
import { walkTree } from "../../../shared/utils/treeAccessors";
import { ExtensionStats, StatsAggregator } from "../stats/StatsAggregator";

export type ReportFormat = "json" | "csv" | "extensions-csv" | "largest-csv";

export const JSON_LARGEST_ITEMS = 50;
export const CSV_LARGEST_ITEMS = 100;

export interface JsonTreeNode {
  path: string;
  name: string;
  size: number;
  size_formatted: string;
  is_directory: boolean;
  extension: string;
  modified_time: number;
  modified_time_formatted: string;
  scan_error?: string;
  children: JsonTreeNode[];
}

export interface JsonReport {
  scan_timestamp: string;
  root_path: string;
  total_size: number;
  total_size_formatted: string;
  file_tree: JsonTreeNode;
  file_type_stats: Record<string, ExtensionStats>;
  largest_items: Array<{
    path: string;
    name: string;
    size: number;
    size_formatted: string;
    is_directory: boolean;
  }>;
}

/**
 * Genera informes JSON y CSV a partir de un árbol terminado,
 * sin volver a leer el sistema de archivos.
 */
export class ReportExporter {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    private readonly stats: StatsAggregator = new StatsAggregator(),
    private readonly now: () => Date = () => new Date()
  ) {}

  buildJsonReport(root: FileInfo): JsonReport {
    return {
      scan_timestamp: this.now().toISOString(),
      root_path: root.path,
      total_size: root.size,
      total_size_formatted: formatSize(root.size),
      file_tree: toJsonNode(root),
      file_type_stats: Object.fromEntries(this.stats.extensionBreakdown(root)),
      largest_items: this.stats
        .largestItems(root, JSON_LARGEST_ITEMS)
        .map((item) => ({
          path: item.path,
          name: item.name,
          size: item.size,
          size_formatted: formatSize(item.size),
          is_directory: item.isDirectory,
        })),
    };
  }

  toJson(root: FileInfo): string {
    return JSON.stringify(this.buildJsonReport(root), null, 2);
  }

  /** Lista completa de entradas en preorden */
  toFileListCsv(root: FileInfo): string {
    const rows: Array<Array<string | number>> = [];
    walkTree(root, (node, depth) => {
      rows.push([
        node.path,
        node.name,
        node.size,
        formatSize(node.size),
        node.isDirectory ? "Yes" : "No",
        node.extension,
        depth,
        formatTimestamp(node.modifiedTime),
      ]);
    });
    return toCsv(
      [
        "path",
        "name",
        "size",
        "size_formatted",
        "is_directory",
        "extension",
        "depth",
        "modified_time",
      ],
      rows
    );
  }

  toExtensionStatsCsv(root: FileInfo): string {
    const rows = [...this.stats.extensionBreakdown(root)].map(([ext, data]) => [
      ext,
      data.count,
      data.size,
      formatSize(data.size),
      `${(root.size > 0 ? (data.size / root.size) * 100 : 0).toFixed(2)}%`,
    ]);
    return toCsv(
      [
        "File Extension",
        "File Count",
        "Total Size (Bytes)",
        "Total Size (Formatted)",
        "Percentage of Total",
      ],
      rows
    );
  }

  toLargestItemsCsv(root: FileInfo, count: number = CSV_LARGEST_ITEMS): string {
    const rows = this.stats.largestItems(root, count).map((item, index) => [
      index + 1,
      item.path,
      item.name,
      item.size,
      formatSize(item.size),
      item.isDirectory ? "Directory" : "File",
    ]);
    return toCsv(
      ["Rank", "Path", "Name", "Size (Bytes)", "Size (Formatted)", "Type"],
      rows
    );
  }

  render(format: ReportFormat, root: FileInfo): string {
    switch (format) {
      case "json":
        return this.toJson(root);
      case "csv":
        return this.toFileListCsv(root);
      case "extensions-csv":
        return this.toExtensionStatsCsv(root);
      case "largest-csv":
        return this.toLargestItemsCsv(root);
    }
  }

  /**
   * Escribe el informe en disco.
   * @returns true si se escribió correctamente
   */
  async exportToFile(
    format: ReportFormat,
    root: FileInfo,
    outputPath: string
  ): Promise<boolean> {
    this.logger.startOperation("ReportExporter.exportToFile");
    try {
      await this.fsPort.writeFile(outputPath, this.render(format, root));
      this.logger.info(SCAN_MESSAGES.INFO.REPORT_WRITTEN(outputPath));
      return true;
    } catch (error) {
      this.logger.error(SCAN_MESSAGES.ERRORS.REPORT_WRITE_FAILED(outputPath), error);
      return false;
    } finally {
      this.logger.endOperation("ReportExporter.exportToFile");
    }
  }
}

function toJsonNode(node: FileInfo): JsonTreeNode {
  return {
    path: node.path,
    name: node.name,
    size: node.size,
    size_formatted: formatSize(node.size),
    is_directory: node.isDirectory,
    extension: node.extension,
    modified_time: node.modifiedTime,
    modified_time_formatted: formatTimestamp(node.modifiedTime),
    ...(node.scanError ? { scan_error: node.scanError.kind } : {}),
    children: node.isDirectory ? node.children.map(toJsonNode) : [],
  };
}

function formatTimestamp(epochMs: number): string {
  return epochMs > 0 ? new Date(epochMs).toISOString() : "";
}
