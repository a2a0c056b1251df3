import { ProgressTracker } from "../../../../../../src/application/use-cases/scan/services/ProgressTracker";
import { ScanProgress } from "../../../../../../src/domain/model/ScanEvent";

describe("ProgressTracker", () => {
  let now: number;
  let emitted: ScanProgress[];
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
    emitted = [];
  });

  test("should emit on every record when the interval is zero", () => {
    const tracker = new ProgressTracker("/root", 0, (p) => emitted.push(p), clock);

    tracker.recordEntry("/root/a", 10);
    tracker.recordEntry("/root/b", 5);
    tracker.recordDirectory("/root");

    expect(emitted).toEqual([
      { bytesDone: 10, filesDone: 1, directoriesDone: 0, currentPath: "/root/a", done: false },
      { bytesDone: 15, filesDone: 2, directoriesDone: 0, currentPath: "/root/b", done: false },
      { bytesDone: 15, filesDone: 2, directoriesDone: 1, currentPath: "/root", done: false },
    ]);
  });

  test("should coalesce records that fall within the interval", () => {
    const tracker = new ProgressTracker("/root", 100, (p) => emitted.push(p), clock);

    tracker.recordEntry("/root/a", 1);
    now += 50;
    tracker.recordEntry("/root/b", 2);
    now += 50;
    tracker.recordEntry("/root/c", 3);

    expect(emitted.map((p) => p.bytesDone)).toEqual([1, 6]);
  });

  test("should always emit a final done snapshot", () => {
    const tracker = new ProgressTracker("/root", 100, (p) => emitted.push(p), clock);

    tracker.recordEntry("/root/a", 4);
    tracker.recordEntry("/root/b", 4);
    tracker.finish();

    expect(emitted[emitted.length - 1]).toEqual({
      bytesDone: 8,
      filesDone: 2,
      directoriesDone: 0,
      currentPath: "/root/b",
      done: true,
    });
  });

  test("should start from the root path with zero counters", () => {
    const tracker = new ProgressTracker("/root", 0, (p) => emitted.push(p), clock);

    expect(tracker.snapshot()).toEqual({
      bytesDone: 0,
      filesDone: 0,
      directoriesDone: 0,
      currentPath: "/root",
      done: false,
    });
  });
});
