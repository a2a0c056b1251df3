import {
  createDirectoryInfo,
  createLeafInfo,
} from "../../../../../../src/application/use-cases/scan/services/nodeBuilders";
import { FileInfo } from "../../../../../../src/domain/model/FileInfo";

describe("nodeBuilders", () => {
  test("should build a leaf with its own size and a file count of one", () => {
    const leaf = createLeafInfo("/r/Photo.JPG", {
      kind: "file",
      size: 2048,
      modifiedTime: 42,
    });

    expect(leaf).toEqual({
      path: "/r/Photo.JPG",
      name: "Photo.JPG",
      isDirectory: false,
      kind: "file",
      size: 2048,
      fileCount: 1,
      unreadableCount: 0,
      modifiedTime: 42,
      extension: "jpg",
    });
  });

  test("should count an unreadable leaf", () => {
    const leaf = createLeafInfo("/r/x", {
      kind: "file",
      size: 0,
      modifiedTime: 0,
      scanError: { kind: "permission-denied", code: "EACCES", message: "denied" },
    });

    expect(leaf.unreadableCount).toBe(1);
    expect(leaf.scanError?.kind).toBe("permission-denied");
  });

  test("should sum children into a directory", () => {
    const children = [
      createLeafInfo("/r/d/a", { kind: "file", size: 3, modifiedTime: 1 }),
      createLeafInfo("/r/d/b", {
        kind: "file",
        size: 0,
        modifiedTime: 0,
        scanError: { kind: "io-error", message: "EIO" },
      }),
    ];

    const directory = createDirectoryInfo("/r/d", 7, children);

    expect(directory).toMatchObject({
      name: "d",
      isDirectory: true,
      kind: "directory",
      size: 3,
      fileCount: 2,
      unreadableCount: 1,
      modifiedTime: 7,
      extension: "",
    });
    expect(directory.children).toEqual(children);
    expect(Object.isFrozen(directory.children)).toBe(true);
  });

  test("should expose children only on directories", () => {
    const nodes: FileInfo[] = [
      createDirectoryInfo("/r", 0, [
        createLeafInfo("/r/a", { kind: "file", size: 1, modifiedTime: 0 }),
      ]),
      createLeafInfo("/r/b", { kind: "symlink", size: 2, modifiedTime: 0 }),
    ];

    const childCounts = nodes.map((node) =>
      node.isDirectory ? node.children.length : node.children
    );

    expect(childCounts).toEqual([1, undefined]);
    expect("children" in nodes[1]).toBe(false);
  });

  test("should name a filesystem root by its full path", () => {
    expect(createDirectoryInfo("/", 0, []).name).toBe("/");
  });
});
