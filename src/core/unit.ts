import type { Process, ProcessId } from "./process";

export const IDLE = -1;

/** A unit either runs a process this tick or sleeps. */
export type UnitSlot = Process | null;

export function createUnits(count: number): UnitSlot[] {
  return Array.from({ length: count }, () => null);
}

export function occupantId(slot: UnitSlot): ProcessId | typeof IDLE {
  return slot === null ? IDLE : slot.id;
}

export function allUnitsIdle(units: UnitSlot[]): boolean {
  return units.every((slot) => slot === null);
}
