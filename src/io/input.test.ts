import { describe, it, expect } from "vitest";
import type { ParseIssue } from "../core/errors";
import type { InputRecord } from "./input";
import { parseInteger, parseLine, readRecords } from "./input";

describe("parseInteger", () => {
  it("accepts signed decimal integers only", () => {
    expect(parseInteger("42")).toBe(42);
    expect(parseInteger("-3")).toBe(-3);
    expect(parseInteger("+7")).toBe(7);
    expect(parseInteger("1.5")).toBeUndefined();
    expect(parseInteger("x")).toBeUndefined();
  });
});

describe("parseLine", () => {
  it("reads a timestamp and several processes", () => {
    expect(parseLine("3 10 2 5   11 -1 4", 7)).toEqual({
      record: {
        line: 7,
        time: 3,
        arrivals: [
          { id: 10, priority: 2, executionTime: 5 },
          { id: 11, priority: -1, executionTime: 4 },
        ],
      },
      issues: [],
    });
  });

  it("accepts a timestamp with no processes", () => {
    expect(parseLine("  5  ", 1)).toEqual({
      record: { line: 1, time: 5, arrivals: [] },
      issues: [],
    });
  });

  it("drops a truncated tuple and keeps the rest", () => {
    expect(parseLine("0 1 0 2 7 0", 4)).toEqual({
      record: {
        line: 4,
        time: 0,
        arrivals: [{ id: 1, priority: 0, executionTime: 2 }],
      },
      issues: [{ line: 4, message: 'truncated process tuple "7 0" discarded' }],
    });
  });

  it("drops a tuple with a non-integer field", () => {
    const parsed = parseLine("0 1 a 3 2 0 1", 1);
    expect(parsed.record?.arrivals).toEqual([
      { id: 2, priority: 0, executionTime: 1 },
    ]);
    expect(parsed.issues).toEqual([
      { line: 1, message: 'non-integer field in process tuple "1 a 3" discarded' },
    ]);
  });

  it("drops a process with a negative id", () => {
    const parsed = parseLine("0 -1 0 2 3 0 1", 5);
    expect(parsed.record?.arrivals).toEqual([
      { id: 3, priority: 0, executionTime: 1 },
    ]);
    expect(parsed.issues).toEqual([
      { line: 5, message: "process id -1 is negative, discarded" },
    ]);
  });

  it("drops a process with no work", () => {
    const parsed = parseLine("0 4 0 0", 2);
    expect(parsed.record?.arrivals).toEqual([]);
    expect(parsed.issues).toEqual([
      { line: 2, message: "process 4 has execution time 0, discarded" },
    ]);
  });

  it("discards a line with a bad timestamp", () => {
    expect(parseLine("-1 1 0 1", 3)).toEqual({
      issues: [{ line: 3, message: 'invalid timestamp "-1", line discarded' }],
    });
  });
});

describe("readRecords", () => {
  it("stops at the first blank line", async () => {
    const records: Array<InputRecord | null> = [];
    for await (const record of readRecords(["0 1 0 1", "", "1 2 0 1"])) {
      records.push(record);
    }
    expect(records).toEqual([
      { line: 1, time: 0, arrivals: [{ id: 1, priority: 0, executionTime: 1 }] },
    ]);
  });

  it("reports issues with their line numbers", async () => {
    const issues: ParseIssue[] = [];
    const records: Array<InputRecord | null> = [];
    for await (const record of readRecords(["0", "bad 1 2 3", "2 1 1"], (i) =>
      issues.push(i)
    )) {
      records.push(record);
    }

    expect(records.map((r) => r?.time)).toEqual([0, undefined, 2]);
    expect(issues).toEqual([
      { line: 2, message: 'invalid timestamp "bad", line discarded' },
      { line: 3, message: 'truncated process tuple "1 1" discarded' },
    ]);
  });
});
