import { ReportExporter } from "../../../../../src/application/services/export/ReportExporter";
import { FileSystemPort } from "../../../../../src/application/ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../../../src/application/ports/driven/ProgressReporter";
import {
  createDirectoryInfo,
  createLeafInfo,
} from "../../../../../src/application/use-cases/scan/services/nodeBuilders";
import { createMockLogger } from "../../../../helpers/mockLogger";

const JAN_2 = Date.UTC(2024, 0, 2);

describe("ReportExporter", () => {
  let mockFileSystem: jest.Mocked<FileSystemPort>;
  let mockLogger: jest.Mocked<ProgressReporter>;
  let exporter: ReportExporter;

  const root = createDirectoryInfo("/r", 0, [
    createDirectoryInfo("/r/d", 0, [
      createLeafInfo("/r/d/x.log", { kind: "file", size: 10, modifiedTime: 0 }),
    ]),
    createLeafInfo("/r/a.txt", { kind: "file", size: 2048, modifiedTime: JAN_2 }),
  ]);

  beforeEach(() => {
    mockFileSystem = {
      listDirectoryEntries: jest.fn(),
      lstat: jest.fn(),
      stat: jest.fn(),
      readLink: jest.fn(),
      writeFile: jest.fn(),
    };
    mockLogger = createMockLogger();
    exporter = new ReportExporter(
      mockFileSystem,
      mockLogger,
      undefined,
      () => new Date(Date.UTC(2024, 5, 1, 12, 0, 0))
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe("JSON", () => {
    test("should describe the tree, extension stats and largest items", () => {
      const report = exporter.buildJsonReport(root);

      expect(report).toMatchObject({
        scan_timestamp: "2024-06-01T12:00:00.000Z",
        root_path: "/r",
        total_size: 2058,
        total_size_formatted: "2.0 KB",
        file_type_stats: {
          txt: { count: 1, size: 2048 },
          log: { count: 1, size: 10 },
        },
      });
      expect(report.largest_items.map((item) => item.path)).toEqual([
        "/r/a.txt",
        "/r/d",
        "/r/d/x.log",
      ]);
      expect(report.file_tree.children.map((child) => child.name)).toEqual(["d", "a.txt"]);
      expect(report.file_tree.children[1]).toEqual({
        path: "/r/a.txt",
        name: "a.txt",
        size: 2048,
        size_formatted: "2.0 KB",
        is_directory: false,
        extension: "txt",
        modified_time: JAN_2,
        modified_time_formatted: "2024-01-02T00:00:00.000Z",
        children: [],
      });
    });

    test("should mark unreadable nodes with their error kind", () => {
      const locked = createDirectoryInfo("/r", 0, [
        createDirectoryInfo("/r/locked", 0, [], {
          scanError: { kind: "permission-denied", code: "EACCES", message: "denied" },
        }),
      ]);

      const report = exporter.buildJsonReport(locked);

      expect(report.file_tree.children[0].scan_error).toBe("permission-denied");
      expect(report.file_tree.scan_error).toBeUndefined();
    });

    test("should serialise the same report with two-space indentation", () => {
      const json = exporter.toJson(root);

      expect(JSON.parse(json)).toEqual(exporter.buildJsonReport(root));
      expect(json.split("\n")[1]).toBe('  "scan_timestamp": "2024-06-01T12:00:00.000Z",');
    });
  });

  describe("CSV", () => {
    test("should list every entry in preorder with its depth", () => {
      expect(exporter.toFileListCsv(root)).toBe(
        [
          "path,name,size,size_formatted,is_directory,extension,depth,modified_time",
          "/r,r,2058,2.0 KB,Yes,,0,",
          "/r/d,d,10,10 B,Yes,,1,",
          "/r/d/x.log,x.log,10,10 B,No,log,2,",
          "/r/a.txt,a.txt,2048,2.0 KB,No,txt,1,2024-01-02T00:00:00.000Z",
          "",
        ].join("\n")
      );
    });

    test("should report extension shares of the total", () => {
      expect(exporter.toExtensionStatsCsv(root)).toBe(
        [
          "File Extension,File Count,Total Size (Bytes),Total Size (Formatted),Percentage of Total",
          "txt,1,2048,2.0 KB,99.51%",
          "log,1,10,10 B,0.49%",
          "",
        ].join("\n")
      );
    });

    test("should rank the largest items", () => {
      expect(exporter.toLargestItemsCsv(root, 2)).toBe(
        [
          "Rank,Path,Name,Size (Bytes),Size (Formatted),Type",
          "1,/r/a.txt,a.txt,2048,2.0 KB,File",
          "2,/r/d,d,10,10 B,Directory",
          "",
        ].join("\n")
      );
    });
  });

  describe("exportToFile", () => {
    test("should write the rendered report and log it", async () => {
      mockFileSystem.writeFile.mockResolvedValue(undefined);

      const ok = await exporter.exportToFile("extensions-csv", root, "/out/ext.csv");

      expect(ok).toBe(true);
      expect(mockFileSystem.writeFile).toHaveBeenCalledWith(
        "/out/ext.csv",
        exporter.toExtensionStatsCsv(root)
      );
      expect(mockLogger.info).toHaveBeenCalledWith("✅ Report written to /out/ext.csv");
      expect(mockLogger.endOperation).toHaveBeenCalledWith("ReportExporter.exportToFile");
    });

    test("should return false and log when writing fails", async () => {
      const failure = Object.assign(new Error("EACCES: denied"), { code: "EACCES" });
      mockFileSystem.writeFile.mockRejectedValue(failure);

      const ok = await exporter.exportToFile("json", root, "/out/report.json");

      expect(ok).toBe(false);
      expect(mockLogger.error).toHaveBeenCalledWith(
        "Failed to write report to /out/report.json",
        failure
      );
      expect(mockLogger.endOperation).toHaveBeenCalledWith("ReportExporter.exportToFile");
    });
  });
});
