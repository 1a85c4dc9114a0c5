import type { SimulationConfig, SimulationState } from "./core/state";
import type { ParseIssue } from "./core/errors";
import type { TickRecord } from "./engine/tick";
import { createSimulation } from "./core/state";
import { admit, isFinished, tick } from "./engine/tick";
import { ArrivalFeed } from "./io/feed";
import { readRecords } from "./io/input";

export type SimulateOptions = {
  onIssue?: (issue: ParseIssue) => void;
};

export type SimulationResult = {
  ticks: TickRecord[];
  state: SimulationState;
};

/**
 * Runs the tick loop over the input lines, yielding one record per tick.
 * The generator's return value is the final state.
 */
export async function* simulate(
  config: SimulationConfig,
  lines: AsyncIterable<string> | Iterable<string>,
  options: SimulateOptions = {}
): AsyncGenerator<TickRecord, SimulationState> {
  const onIssue = options.onIssue ?? (() => {});
  const state = createSimulation(config);
  const feed = new ArrivalFeed(readRecords(lines, onIssue));

  while (!isFinished(state)) {
    if (!state.inputExhausted) {
      const record = await feed.takeDue(state.time);

      if (record !== undefined) {
        if (record.time < state.time) {
          onIssue({
            line: record.line,
            message: `timestamp ${record.time} is in the past, admitted at ${state.time}`,
          });
        }

        for (const { reason } of admit(state, record.arrivals)) {
          onIssue({ line: record.line, message: `${reason}, arrival discarded` });
        }
      }

      state.inputExhausted = feed.exhausted;
    }

    yield tick(state);
  }

  return state;
}

export async function runSimulation(
  config: SimulationConfig,
  lines: AsyncIterable<string> | Iterable<string>,
  options: SimulateOptions = {}
): Promise<SimulationResult> {
  const ticks: TickRecord[] = [];
  const run = simulate(config, lines, options);

  let step = await run.next();
  while (!step.done) {
    ticks.push(step.value);
    step = await run.next();
  }

  return { ticks, state: step.value };
}
