import type { CliOptions } from "./config";
import type { ParseIssue } from "./core/errors";
import { resolveConfig, USAGE } from "./config";
import { ConfigurationError } from "./core/errors";
import { simulate } from "./simulate";
import { summarizeMetrics } from "./engine/metrics";
import { formatSummary, formatTick } from "./io/output";

export type CliIO = {
  input: AsyncIterable<string> | Iterable<string>;
  out: (line: string) => void;
  err: (line: string) => void;
};

/**
 * Runs one simulation from arguments to exit status. Configuration errors
 * return 1; an InvariantViolation is left to the caller.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = resolveConfig(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(`tickshed: ${error.message}`);
      io.err(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  const onIssue = options.quiet
    ? undefined
    : (issue: ParseIssue) =>
        io.err(`warning: line ${issue.line}: ${issue.message}`);

  const run = simulate(options.config, io.input, { onIssue });

  let step = await run.next();
  while (!step.done) {
    io.out(formatTick(step.value));
    step = await run.next();
  }

  if (options.summary) {
    formatSummary(summarizeMetrics(step.value)).forEach(io.err);
  }

  return 0;
}
