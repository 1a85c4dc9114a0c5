import type { Process } from "./process";
import type { UnitSlot } from "./unit";
import type { ProcessStats, SimulationMetrics } from "./metrics";
import type { MethodId } from "../engine/policy";
import { createUnits } from "./unit";
import { createMetrics } from "./metrics";

export interface SimulationConfig {
  method: MethodId;
  unitCount: number;
  sliceLength: number;
}

export type SimulationState = {
  time: number;

  config: SimulationConfig;

  // live processes, in scheduling order
  ready: Process[];
  // last tick's placement, in display order
  units: UnitSlot[];

  inputExhausted: boolean;

  metrics: SimulationMetrics;
  stats: Map<Process, ProcessStats>;
};

export function createSimulation(config: SimulationConfig): SimulationState {
  return {
    time: 0,
    config,
    ready: [],
    units: createUnits(config.unitCount),
    inputExhausted: false,
    metrics: createMetrics(),
    stats: new Map(),
  };
}
