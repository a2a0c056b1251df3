import {
  createDirectoryInfo,
  createLeafInfo,
} from "../../../../src/application/use-cases/scan/services/nodeBuilders";
import { FileInfo } from "../../../../src/domain/model/FileInfo";
import {
  countDirectories,
  findInconsistentDirectories,
  findNode,
  flattenTree,
  walkTree,
} from "../../../../src/shared/utils/treeAccessors";

const leaf = (path: string, size: number): FileInfo =>
  createLeafInfo(path, { kind: "file", size, modifiedTime: 1 });

describe("treeAccessors", () => {
  const root = createDirectoryInfo("/r", 1, [
    createDirectoryInfo("/r/d", 1, [leaf("/r/d/x", 2)]),
    leaf("/r/y", 3),
  ]);

  test("should walk in preorder with depths", () => {
    const visited: string[] = [];
    walkTree(root, (node, depth) => visited.push(`${depth}:${node.path}`));

    expect(visited).toEqual(["0:/r", "1:/r/d", "2:/r/d/x", "1:/r/y"]);
  });

  test("should flatten, find and count", () => {
    expect(flattenTree(root)).toHaveLength(4);
    expect(findNode(root, "/r/d/x")?.size).toBe(2);
    expect(findNode(root, "/r/missing")).toBeUndefined();
    expect(countDirectories(root)).toBe(2);
  });

  test("should report no inconsistencies for built trees", () => {
    expect(findInconsistentDirectories(root)).toEqual([]);
  });

  test("should report a directory whose size does not match its children", () => {
    const tampered: FileInfo = { ...root, size: 99 };

    expect(findInconsistentDirectories(tampered)).toEqual(["/r"]);
  });
});
