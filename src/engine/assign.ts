import type { Process } from "../core/process";
import type { UnitSlot } from "../core/unit";
import { createUnits } from "../core/unit";

// ascending by id, sleeping units last
function compareSlots(a: UnitSlot, b: UnitSlot): number {
  if (a === null || b === null) {
    return (a === null ? 1 : 0) - (b === null ? 1 : 0);
  }
  return a.id - b.id;
}

/** Presentation order only; the slots themselves are not reassigned. */
export function displayOrder(units: UnitSlot[]): UnitSlot[] {
  return [...units].sort(compareSlots);
}

/**
 * Places the head of the (already ordered) ready list onto the units and
 * returns the slots in display order.
 */
export function assignUnits(ready: Process[], unitCount: number): UnitSlot[] {
  const units = createUnits(unitCount);

  ready.slice(0, unitCount).forEach((process, slot) => {
    units[slot] = process;
  });

  return displayOrder(units);
}
