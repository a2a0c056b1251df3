import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FsAdapter } from "../../../../../src/adapters/secondary/fs/FsAdapter";
import { ScanEngine } from "../../../../../src/application/use-cases/scan/ScanEngine";
import { findNode } from "../../../../../src/shared/utils/treeAccessors";
import { createMockLogger } from "../../../../helpers/mockLogger";

describe("FsAdapter", () => {
  let workDir: string;
  const adapter = new FsAdapter();

  beforeEach(async () => {
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "storage-scope-"));
    await fs.promises.mkdir(path.join(workDir, "nested"));
    await fs.promises.writeFile(path.join(workDir, "one.txt"), "12345");
    await fs.promises.writeFile(path.join(workDir, "nested", "two.md"), "abc");
  });

  afterEach(async () => {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  test("should list entries with their types", async () => {
    const entries = await adapter.listDirectoryEntries(workDir);
    const byName = new Map(entries.map((entry) => [entry.name, entry]));

    expect([...byName.keys()].sort()).toEqual(["nested", "one.txt"]);
    expect(byName.get("nested")?.isDirectory()).toBe(true);
    expect(byName.get("one.txt")?.isFile()).toBe(true);
  });

  test("should map stats to entry kinds", async () => {
    const fileStats = await adapter.lstat(path.join(workDir, "one.txt"));
    const dirStats = await adapter.stat(path.join(workDir, "nested"));

    expect(fileStats).toMatchObject({ kind: "file", size: 5 });
    expect(dirStats.kind).toBe("directory");
    expect(dirStats.ino).not.toBe(fileStats.ino);
  });

  test("should reject with the system error code", async () => {
    await expect(adapter.lstat(path.join(workDir, "missing"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  test("should create parent directories when writing", async () => {
    const target = path.join(workDir, "out", "deep", "report.csv");

    await adapter.writeFile(target, "a,b\n");

    await expect(fs.promises.readFile(target, "utf-8")).resolves.toBe("a,b\n");
  });

  test("should scan a real directory tree end to end", async () => {
    const engine = new ScanEngine(adapter, createMockLogger());

    const handle = await engine.start(workDir, { maxConcurrency: 2 });
    const result = await handle.result;

    expect(result.status).toBe("completed");
    expect(result.summary).toMatchObject({
      totalSize: 8,
      totalFiles: 2,
      totalDirectories: 2,
      unreadableEntries: 0,
    });
    expect(result.root && findNode(result.root, path.join(workDir, "nested", "two.md"))).toMatchObject(
      { size: 3, extension: "md" }
    );
  });

  if (process.platform !== "win32") {
    test("should read symbolic link targets", async () => {
      const link = path.join(workDir, "alias");
      await fs.promises.symlink("one.txt", link);

      expect(await adapter.readLink(link)).toBe("one.txt");
      expect((await adapter.lstat(link)).kind).toBe("symlink");
      expect((await adapter.stat(link)).kind).toBe("file");
    });
  }
});
