import type { SimulationState } from "../core/state";
import { executedTime, isLive } from "../core/process";
import { InvariantViolation } from "../core/errors";

/**
 * Moves every running process whose time slice just ran out to the back
 * of the ready list. Units are visited in display order, so processes
 * expiring on the same tick queue up by ascending id.
 */
export function requeueExpiredSlices(state: SimulationState): void {
  const slice = state.config.sliceLength;

  for (const slot of state.units) {
    if (slot === null || !isLive(slot)) continue;

    const executed = executedTime(slot);
    if (executed === 0 || executed % slice !== 0) continue;

    const index = state.ready.indexOf(slot);
    if (index === -1) {
      throw new InvariantViolation(
        `process ${slot.id} occupies a unit but is not in the ready list`
      );
    }

    state.ready.splice(index, 1);
    state.ready.push(slot);
  }
}
