import type { SimulationState } from "../core/state";
import type { Arrival, Process, ProcessId } from "../core/process";
import { createProcess } from "../core/process";
import { allUnitsIdle, occupantId, IDLE } from "../core/unit";
import { InvariantViolation } from "../core/errors";
import { policyFor } from "./policy";
import { assignUnits } from "./assign";
import { recordTick, trackArrival } from "./metrics";

export type TickRecord = {
  time: number;
  units: Array<ProcessId | typeof IDLE>;
};

export type Rejection = {
  arrival: Arrival;
  reason: string;
};

/**
 * Appends arrivals to the ready list at the current tick. An arrival whose
 * id is already live is turned away.
 */
export function admit(state: SimulationState, arrivals: Arrival[]): Rejection[] {
  const rejected: Rejection[] = [];

  for (const arrival of arrivals) {
    if (state.ready.some((p) => p.id === arrival.id)) {
      rejected.push({
        arrival,
        reason: `process ${arrival.id} is already live`,
      });
      continue;
    }

    const process = createProcess(arrival, state.time);
    state.ready.push(process);
    trackArrival(state, process);
  }

  return rejected;
}

export function isFinished(state: SimulationState): boolean {
  return state.inputExhausted && allUnitsIdle(state.units);
}

export function tick(state: SimulationState): TickRecord {
  /* =========================================================
     1. ORDER THE READY LIST
     ========================================================= */

  policyFor(state.config.method).order(state);

  /* =========================================================
     2. PLACE ON UNITS
     ========================================================= */

  state.units = assignUnits(state.ready, state.config.unitCount);

  /* =========================================================
     3. EXECUTE ONE TICK OF WORK
     ========================================================= */

  const placed: Process[] = [];
  const completed: Process[] = [];

  for (const slot of state.units) {
    if (slot === null) continue;

    placed.push(slot);
    slot.remainingTime -= 1;

    if (slot.remainingTime === 0) {
      const index = state.ready.indexOf(slot);
      if (index === -1) {
        throw new InvariantViolation(
          `process ${slot.id} finished on a unit but is not in the ready list`
        );
      }
      state.ready.splice(index, 1);
      completed.push(slot);
    }
  }

  recordTick(state, placed, completed);

  const record: TickRecord = {
    time: state.time,
    units: state.units.map(occupantId),
  };

  state.time += 1;

  return record;
}
