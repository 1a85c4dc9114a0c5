#!/usr/bin/env node
import { createInterface } from "node:readline";
import { main } from "./program";

const input = createInterface({ input: process.stdin, crlfDelay: Infinity });

try {
  process.exitCode = await main(process.argv.slice(2), {
    input,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
} catch (error) {
  console.error(error);
  process.exitCode = 1;
} finally {
  input.close();
}
