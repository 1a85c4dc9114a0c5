import type { SimulationConfig } from "./core/state";
import { ConfigurationError } from "./core/errors";
import { isMethodId, POLICIES } from "./engine/policy";

export const USAGE = [
  "usage: tickshed <method> [unitCount=1] [sliceLength=1] [--summary] [--quiet]",
  "",
  "methods:",
  ...Object.values(POLICIES).map(
    (p) => `  ${p.id}  ${p.name.padEnd(14)} ${p.label}`
  ),
  "",
  "input:  t (id prio exec_t)* per line, blank line ends input",
  "output: t unit1 ... unitN per tick, -1 marks an idle unit",
].join("\n");

export type CliOptions =
  | { help: true }
  | {
      help: false;
      config: SimulationConfig;
      summary: boolean;
      quiet: boolean;
    };

const FLAGS = new Set(["--summary", "--quiet", "--help", "-h"]);

// decimal or 0x-prefixed hex
export function parseArgInteger(token: string): number | undefined {
  const match = /^([+-]?)(0x[0-9a-f]+|\d+)$/i.exec(token);
  if (match === null) return undefined;

  const magnitude = Number(match[2]);
  const value = match[1] === "-" ? -magnitude : magnitude;
  return Number.isSafeInteger(value) ? value : undefined;
}

function positiveArg(token: string | undefined, name: string): number {
  if (token === undefined) return 1;

  const value = parseArgInteger(token);
  if (value === undefined || value < 1) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${token}"`
    );
  }
  return value;
}

export function resolveConfig(argv: string[]): CliOptions {
  const flags = argv.filter((arg) => FLAGS.has(arg));
  const unknown = argv.find(
    (arg) => arg.startsWith("--") && !FLAGS.has(arg)
  );
  if (unknown !== undefined) {
    throw new ConfigurationError(`unknown option ${unknown}`);
  }

  if (flags.includes("--help") || flags.includes("-h")) {
    return { help: true };
  }

  const positional = argv.filter((arg) => !FLAGS.has(arg));
  if (positional.length > 3) {
    throw new ConfigurationError(
      `too many arguments: ${positional.slice(3).join(" ")}`
    );
  }

  const [methodArg, unitArg, sliceArg] = positional;
  if (methodArg === undefined) {
    throw new ConfigurationError("missing schedule method");
  }

  const method = parseArgInteger(methodArg);
  if (method === undefined || !isMethodId(method)) {
    throw new ConfigurationError(`invalid schedule method "${methodArg}"`);
  }

  const config: SimulationConfig = Object.freeze({
    method,
    unitCount: positiveArg(unitArg, "unit count"),
    sliceLength: positiveArg(sliceArg, "slice length"),
  });

  return {
    help: false,
    config,
    summary: flags.includes("--summary"),
    quiet: flags.includes("--quiet"),
  };
}
