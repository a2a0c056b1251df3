import {
  ConsoleProgressReporter,
  ConsoleSink,
} from "../../../../../src/adapters/secondary/reporting/ConsoleProgressReporter";

describe("ConsoleProgressReporter", () => {
  let sink: jest.Mocked<ConsoleSink>;

  beforeEach(() => {
    sink = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
      time: jest.fn(),
      timeEnd: jest.fn(),
    };
  });

  test("should hide debug output unless verbose", () => {
    const quiet = new ConsoleProgressReporter(false, false, sink);

    quiet.debug("details");
    quiet.info("🔍 trace");
    quiet.startOperation("op");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.time).not.toHaveBeenCalled();
  });

  test("should print everything with level prefixes when verbose", () => {
    const verbose = new ConsoleProgressReporter(true, true, sink);

    verbose.info("🔍 trace");
    verbose.debug("details", 1);
    verbose.startOperation("op");
    verbose.endOperation("op");

    expect(sink.log).toHaveBeenCalledWith("[INFO] 🔍 trace");
    expect(sink.debug).toHaveBeenCalledWith("[DEBUG] details", 1);
    expect(sink.time).toHaveBeenCalledWith("op");
    expect(sink.timeEnd).toHaveBeenCalledWith("op");
  });

  test("should always print warnings and errors", () => {
    const reporter = new ConsoleProgressReporter(false, true, sink);
    const failure = new Error("boom");

    reporter.warn("careful");
    reporter.error("broken", failure);
    reporter.error("no detail");

    expect(sink.warn).toHaveBeenCalledWith("[WARN] careful");
    expect(sink.error).toHaveBeenCalledWith("[ERROR] broken", failure);
    expect(sink.error).toHaveBeenCalledWith("[ERROR] no detail", "");
  });
});
