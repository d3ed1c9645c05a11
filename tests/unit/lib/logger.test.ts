import { describe, it, expect, jest, afterEach } from "@jest/globals";
import { Logger, SERVICE_NAME, configureLogger, getLogger } from "@/lib/logger";

function lines(spy: { mock: { calls: unknown[][] } }): Record<string, unknown>[] {
  return spy.mock.calls.map(call => JSON.parse(String(call[0])));
}

function captureConsole() {
  return {
    log: jest.spyOn(console, "log").mockImplementation(() => undefined),
    error: jest.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

describe("Logger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("writes one JSON line per entry tagged with the service", () => {
    const { log } = captureConsole();
    new Logger("info").info("Dataset generated", { users: 10 });

    expect(log).toHaveBeenCalledTimes(1);
    const [entry] = lines(log);
    expect(entry).toMatchObject({
      service: SERVICE_NAME,
      level: "info",
      message: "Dataset generated",
      context: { users: 10 },
    });
    expect(typeof entry.timestamp).toBe("string");
  });

  it("omits the context field when there is none", () => {
    const { log } = captureConsole();
    new Logger("info").info("plain");
    expect(Object.keys(lines(log)[0]).sort()).toEqual(["level", "message", "service", "timestamp"]);
  });

  it("drops entries below the minimum level", () => {
    const { log, error } = captureConsole();
    const logger = new Logger("error");
    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(lines(error)[0]).toMatchObject({ level: "error", message: "shown" });
  });

  it("keeps debug lines at debug level", () => {
    const { log } = captureConsole();
    new Logger("debug").debug("Event mix", { signup: 3 });
    expect(lines(log)[0]).toMatchObject({ level: "debug", context: { signup: 3 } });
  });

  it("routes errors to stderr with name, message and stack", () => {
    const { log, error } = captureConsole();
    new Logger("info").error("write failed", new TypeError("disk full"), { file: "users.csv" });

    expect(log).not.toHaveBeenCalled();
    const [entry] = lines(error);
    expect(entry).toMatchObject({
      level: "error",
      message: "write failed",
      error: { name: "TypeError", message: "disk full" },
      context: { file: "users.csv" },
    });
    expect(JSON.stringify(entry.error)).toContain("disk full");
  });

  it("lets call fields win over bound child fields", () => {
    const { log } = captureConsole();
    const child = new Logger("debug").child({ seed: 42, run: "a" }).child({ run: "b" });
    child.info("step", { seed: 7, done: 1 });

    expect(child.level).toBe("debug");
    expect(lines(log)[0].context).toEqual({ seed: 7, run: "b", done: 1 });
  });
});

describe("root logger", () => {
  it("is replaced by configureLogger", () => {
    const configured = configureLogger("error");
    expect(getLogger()).toBe(configured);
    expect(getLogger().level).toBe("error");
  });
});
