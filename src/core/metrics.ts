import type { ProcessId } from "./process";

export type ProcessStats = {
  id: ProcessId;
  arrivalTime: number;
  executionTime: number;
  ticksOnUnit: number;
  firstRunAt?: number;
  completedAt?: number; // tick during which the last unit of work ran
};

export type SimulationMetrics = {
  ticks: number;
  busyUnitTicks: number;
  admitted: number;
  completed: number;
  processes: ProcessStats[];
};

export type MetricsSummary = {
  ticks: number;
  admitted: number;
  completed: number;
  utilization: number;
  throughput: number;
  avgTurnaround: number;
  avgWaiting: number;
  avgResponse: number;
};

export function createMetrics(): SimulationMetrics {
  return {
    ticks: 0,
    busyUnitTicks: 0,
    admitted: 0,
    completed: 0,
    processes: [],
  };
}
