import type { Arrival } from "../core/process";
import type { ParseIssue } from "../core/errors";

export type InputRecord = {
  line: number;
  time: number;
  arrivals: Arrival[];
};

export type ParsedLine = {
  record?: InputRecord;
  issues: ParseIssue[];
};

const INTEGER = /^[+-]?\d+$/;

export function parseInteger(token: string): number | undefined {
  if (!INTEGER.test(token)) return undefined;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Parses `t (id prio exec_t)*`. Bad tuples are dropped with an issue, the
 * rest of the line is kept.
 */
export function parseLine(text: string, line: number): ParsedLine {
  const issues: ParseIssue[] = [];
  const [head, ...fields] = text.trim().split(/\s+/);

  const time = parseInteger(head);
  if (time === undefined || time < 0) {
    issues.push({ line, message: `invalid timestamp "${head}", line discarded` });
    return { issues };
  }

  const arrivals: Arrival[] = [];

  for (let i = 0; i < fields.length; i += 3) {
    const tuple = fields.slice(i, i + 3);

    if (tuple.length < 3) {
      issues.push({
        line,
        message: `truncated process tuple "${tuple.join(" ")}" discarded`,
      });
      break;
    }

    const [id, priority, executionTime] = tuple.map(parseInteger);
    if (id === undefined || priority === undefined || executionTime === undefined) {
      issues.push({
        line,
        message: `non-integer field in process tuple "${tuple.join(" ")}" discarded`,
      });
      continue;
    }

    // -1 is the idle marker on output
    if (id < 0) {
      issues.push({ line, message: `process id ${id} is negative, discarded` });
      continue;
    }

    if (executionTime <= 0) {
      issues.push({
        line,
        message: `process ${id} has execution time ${executionTime}, discarded`,
      });
      continue;
    }

    arrivals.push({ id, priority, executionTime });
  }

  return { record: { line, time, arrivals }, issues };
}

/**
 * Turns input lines into records, one per line, stopping at the first
 * blank line. A discarded line yields null.
 */
export async function* readRecords(
  lines: AsyncIterable<string> | Iterable<string>,
  onIssue: (issue: ParseIssue) => void = () => {}
): AsyncGenerator<InputRecord | null> {
  let line = 0;

  for await (const text of lines) {
    line += 1;
    if (text.trim() === "") return;

    const parsed = parseLine(text, line);
    parsed.issues.forEach(onIssue);
    yield parsed.record ?? null;
  }
}
