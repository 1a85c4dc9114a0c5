import { describe, it, expect } from "vitest";
import { main } from "./program";
import { USAGE } from "./config";

async function runCli(argv: string[], input: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const code = await main(argv, {
    input,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  });
  return { code, out, err };
}

describe("main", () => {
  it("prints one line per tick", async () => {
    expect(await runCli(["0", "2"], ["0 1 2 5", ""])).toEqual({
      code: 0,
      out: ["0 1 -1", "1 1 -1", "2 1 -1", "3 1 -1", "4 1 -1", "5 -1 -1"],
      err: [],
    });
  });

  it("fails before any tick without a method", async () => {
    expect(await runCli([], ["0 1 2 5", ""])).toEqual({
      code: 1,
      out: [],
      err: ["tickshed: missing schedule method", USAGE],
    });
  });

  it("fails on an unknown method", async () => {
    const { code, out, err } = await runCli(["9"], [""]);
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err[0]).toBe('tickshed: invalid schedule method "9"');
  });

  it("prints usage on --help", async () => {
    expect(await runCli(["--help"], [])).toEqual({
      code: 0,
      out: [USAGE],
      err: [],
    });
  });

  it("warns about malformed input", async () => {
    expect(await runCli(["0"], ["0 1 0 1 2", ""])).toEqual({
      code: 0,
      out: ["0 1", "1 -1"],
      err: ['warning: line 1: truncated process tuple "2" discarded'],
    });
  });

  it("stays silent with --quiet", async () => {
    const { err } = await runCli(["0", "--quiet"], ["0 1 0 1 2", ""]);
    expect(err).toEqual([]);
  });

  it("prints the run summary after the last tick", async () => {
    const { code, out, err } = await runCli(
      ["2", "--summary"],
      ["0 1 0 3", "1 2 0 1", ""]
    );
    expect(code).toBe(0);
    expect(out).toEqual(["0 1", "1 2", "2 1", "3 1", "4 -1"]);
    expect(err).toEqual([
      "ticks: 5",
      "admitted: 2",
      "completed: 2",
      "utilization: 80.0%",
      "throughput: 0.400 per tick",
      "avg turnaround: 2.50",
      "avg waiting: 0.50",
      "avg response: 0.00",
    ]);
  });

  it("leaves errors other than bad arguments to the caller", async () => {
    async function* brokenInput(): AsyncGenerator<string> {
      yield "0 1 0 2";
      throw new Error("input stream failed");
    }

    const out: string[] = [];
    await expect(
      main(["0"], {
        input: brokenInput(),
        out: (line) => out.push(line),
        err: () => {},
      })
    ).rejects.toThrow("input stream failed");
    expect(out).toEqual(["0 1"]);
  });
});
