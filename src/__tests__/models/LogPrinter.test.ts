import { LogPrinter, type PrintableLog } from "../../models/LogPrinter";

describe("LogPrinter", () => {
  let logs: string[];
  let errs: string[];

  beforeEach(() => {
    logs = [];
    errs = [];
    LogPrinter.setWriters({
      log: (msg) => logs.push(msg),
      error: (msg) => errs.push(msg),
    });
  });

  afterEach(() => {
    LogPrinter.resetWriters();
  });

  const baseLog: PrintableLog = {
    level: "info",
    message: "hello",
    timestamp: new Date("2020-01-01T00:00:00.123Z"),
  };

  it("pretty prints the time, level and message on one line", () => {
    const p = new LogPrinter({ strategy: "plain", useColors: false });
    p.print({ ...baseLog, source: "mapper" });
    expect(logs).toEqual(["00:00:00.123 ● INFO    [mapper] hello"]);
    expect(errs).toHaveLength(0);
  });

  it("colors pretty output only, never plain output", () => {
    new LogPrinter({ strategy: "pretty", useColors: true }).print(baseLog);
    new LogPrinter({ strategy: "plain", useColors: true }).print(baseLog);
    expect(logs).toEqual([
      "\x1b[90m00:00:00.123\x1b[0m \x1b[32m● INFO   \x1b[0m hello",
      "00:00:00.123 ● INFO    hello",
    ]);
  });

  it("routes warn/error/critical to stderr", () => {
    const p = new LogPrinter({ strategy: "pretty", useColors: false });
    p.print({ ...baseLog, level: "warn" });
    p.print({ ...baseLog, level: "error" });
    p.print({ ...baseLog, level: "critical" });
    expect(errs).toHaveLength(3);
    expect(logs).toHaveLength(0);
  });

  it("prints json compact and pretty", () => {
    const p = new LogPrinter({ strategy: "json", useColors: false });
    p.print({ ...baseLog, message: { a: 1 } });
    expect(JSON.parse(logs[0])).toMatchObject({ level: "info", message: { a: 1 } });
    logs = [];
    const p2 = new LogPrinter({ strategy: "json_pretty", useColors: false });
    p2.print({ ...baseLog, message: { a: 1 } });
    expect(logs[0].includes("\n")).toBe(true);
  });

  it("handles none strategy as no-op", () => {
    const p = new LogPrinter({ strategy: "none", useColors: false });
    p.print({ ...baseLog });
    expect(logs.length + errs.length).toBe(0);
  });

  it("renders circular references, bigints and Maps in json output", () => {
    const p = new LogPrinter({ strategy: "json", useColors: false });
    const circ: Record<string, unknown> = { x: 1 };
    circ.self = circ;
    p.print({ ...baseLog, message: circ });
    expect(logs[0]).toContain("[Circular]");
    logs = [];
    p.print({ ...baseLog, message: { big: BigInt(10) } });
    expect(logs[0]).toContain('"10"');
    logs = [];
    p.print({ ...baseLog, data: { entries: new Map([["a", 1]]) } });
    expect(JSON.parse(logs[0]).data).toEqual({ entries: { a: 1 } });
  });

  it("prints error and data blocks under the main line", () => {
    const p = new LogPrinter({ strategy: "plain", useColors: false });
    p.print({
      ...baseLog,
      error: { name: "MapperError", message: "boom" },
      data: { field: "name" },
    });
    expect(logs).toEqual([
      "00:00:00.123 ● INFO    hello",
      "    ╰─ MapperError: boom",
      "    ╰─ data:",
      "       {",
      '         "field": "name"',
      "       }",
      "",
    ]);
  });

  it("resetWriters restores default console writers", () => {
    LogPrinter.resetWriters();
    const spyLog = jest.spyOn(console, "log").mockImplementation(() => {});
    const spyErr = jest.spyOn(console, "error").mockImplementation(() => {});

    try {
      const p = new LogPrinter({ strategy: "pretty", useColors: false });
      p.print({ ...baseLog, level: "info" });
      p.print({ ...baseLog, level: "warn" });
      expect(spyLog).toHaveBeenCalled();
      expect(spyErr).toHaveBeenCalled();
    } finally {
      spyLog.mockRestore();
      spyErr.mockRestore();
    }
  });
});
