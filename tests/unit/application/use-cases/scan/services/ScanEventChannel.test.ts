import { ScanEventChannel } from "../../../../../../src/application/use-cases/scan/services/ScanEventChannel";
import { ProgressReporter } from "../../../../../../src/application/ports/driven/ProgressReporter";
import { ScanEvent, ScanProgressEvent, ScanResultEvent } from "../../../../../../src/domain/model/ScanEvent";
import { createMockLogger } from "../../../../../helpers/mockLogger";

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

function progress(bytesDone: number, done: boolean = false): ScanProgressEvent {
  return {
    type: "progress",
    bytesDone,
    filesDone: bytesDone,
    directoriesDone: 0,
    currentPath: "/r",
    done,
  };
}

const resultEvent: ScanResultEvent = {
  type: "result",
  result: {
    status: "failed",
    rootPath: "/r",
    failure: { kind: "invalid-root", reason: "not-found", message: "missing" },
  },
};

describe("ScanEventChannel", () => {
  let mockLogger: jest.Mocked<ProgressReporter>;
  let channel: ScanEventChannel;
  let received: ScanEvent[];

  beforeEach(() => {
    mockLogger = createMockLogger();
    channel = new ScanEventChannel(mockLogger);
    received = [];
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  test("should deliver asynchronously, never inside publish", async () => {
    channel.subscribe((event) => received.push(event));

    channel.publish(progress(1));
    expect(received).toEqual([]);

    await channel.drained();
    expect(received).toEqual([progress(1)]);
  });

  test("should merge consecutive undelivered progress events into the latest", async () => {
    channel.subscribe((event) => received.push(event));

    channel.publish(progress(1));
    channel.publish(progress(2));
    channel.publish(progress(3, true));
    channel.publish(resultEvent);
    await channel.drained();

    expect(received).toEqual([progress(3, true), resultEvent]);
  });

  test("should ignore events published after the result", async () => {
    channel.subscribe((event) => received.push(event));

    channel.publish(resultEvent);
    channel.publish(progress(9));
    await channel.drained();

    expect(received).toEqual([resultEvent]);
  });

  test("should replay the result to late subscribers exactly once", async () => {
    channel.publish(resultEvent);
    await channel.drained();

    channel.subscribe((event) => received.push(event));
    await nextTick();
    await nextTick();

    expect(received).toEqual([resultEvent]);
  });

  test("should stop delivering after unsubscribe", async () => {
    const unsubscribe = channel.subscribe((event) => received.push(event));

    channel.publish(progress(1));
    await channel.drained();
    unsubscribe();
    channel.publish(progress(2));
    await channel.drained();

    expect(received).toEqual([progress(1)]);
  });

  test("should isolate a throwing listener from the others", async () => {
    const failure = new Error("boom");
    channel.subscribe(() => {
      throw failure;
    });
    channel.subscribe((event) => received.push(event));

    channel.publish(progress(1));
    await channel.drained();

    expect(received).toEqual([progress(1)]);
    expect(mockLogger.error).toHaveBeenCalledWith(
      "A scan event listener threw an error",
      failure
    );
  });

  test("should resolve drained immediately when nothing is queued", async () => {
    await expect(channel.drained()).resolves.toBeUndefined();
  });
});
