import type { SimulationState } from "../core/state";
import type { Process, ProcessComparator } from "../core/process";
import {
  byExecutionTime,
  byPriority,
  byRemainingTime,
  isLive,
} from "../core/process";
import { InvariantViolation } from "../core/errors";
import { requeueExpiredSlices } from "./slice";

export type MethodId = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export type PolicyName =
  | "FCFS"
  | "SJF"
  | "SRTF"
  | "RR"
  | "PRIORITY_FCFS"
  | "PRIORITY_SRTF"
  | "PRIORITY_NP";

export type Policy = {
  id: MethodId;
  name: PolicyName;
  label: string;
  preemptive: boolean;
  // reorders state.ready in place; the first unitCount entries get placed
  order: (state: SimulationState) => void;
};

export const METHOD_IDS: readonly MethodId[] = [0, 1, 2, 3, 4, 5, 6];

export function isMethodId(value: number): value is MethodId {
  return METHOD_IDS.some((id) => id === value);
}

/** Stable sort of `list[start..]`, leaving the head untouched. */
export function sortFrom(
  list: Process[],
  start: number,
  compare: ProcessComparator
): void {
  const tail = list.slice(start).sort(compare);
  list.splice(start, tail.length, ...tail);
}

/**
 * Length of the ready-list head that is still running from the previous
 * tick. Non-preemptive policies must not reorder it.
 */
export function executingPrefix(state: SimulationState): number {
  const occupants = state.units.filter(
    (slot): slot is Process => slot !== null && isLive(slot)
  );

  let cut = 0;
  for (const occupant of occupants) {
    const index = state.ready.indexOf(occupant);
    if (index === -1) {
      throw new InvariantViolation(
        `process ${occupant.id} occupies a unit but is not in the ready list`
      );
    }
    if (index >= occupants.length) {
      throw new InvariantViolation(
        `process ${occupant.id} occupies a unit but sits at ready position ${index}, behind waiting processes`
      );
    }
    cut++;
  }
  return cut;
}

export const POLICIES: Record<MethodId, Policy> = {
  0: {
    id: 0,
    name: "FCFS",
    label: "First Come First Serve",
    preemptive: false,
    // arrival order is already the ready order
    order: () => {},
  },
  1: {
    id: 1,
    name: "SJF",
    label: "Shortest Job First",
    preemptive: false,
    order: (state) =>
      sortFrom(state.ready, executingPrefix(state), byExecutionTime),
  },
  2: {
    id: 2,
    name: "SRTF",
    label: "Shortest Remaining Time First",
    preemptive: true,
    order: (state) => sortFrom(state.ready, 0, byRemainingTime),
  },
  3: {
    id: 3,
    name: "RR",
    label: "Round Robin",
    preemptive: true,
    order: (state) => requeueExpiredSlices(state),
  },
  4: {
    id: 4,
    name: "PRIORITY_FCFS",
    label: "Priority with preemption, FCFS among equals",
    preemptive: true,
    order: (state) => sortFrom(state.ready, 0, byPriority),
  },
  5: {
    id: 5,
    name: "PRIORITY_SRTF",
    label: "Priority with preemption, SRTF among equals",
    preemptive: true,
    order: (state) => {
      sortFrom(state.ready, 0, byRemainingTime);
      sortFrom(state.ready, 0, byPriority);
    },
  },
  6: {
    id: 6,
    name: "PRIORITY_NP",
    label: "Priority without preemption, FCFS among equals",
    preemptive: false,
    order: (state) =>
      sortFrom(state.ready, executingPrefix(state), byPriority),
  },
};

export function policyFor(method: MethodId): Policy {
  return POLICIES[method];
}
