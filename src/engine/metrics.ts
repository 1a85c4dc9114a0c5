import type { SimulationState } from "../core/state";
import type { Process } from "../core/process";
import type { MetricsSummary, ProcessStats } from "../core/metrics";
import { InvariantViolation } from "../core/errors";

export function trackArrival(state: SimulationState, process: Process): void {
  const stats: ProcessStats = {
    id: process.id,
    arrivalTime: process.arrivalTime,
    executionTime: process.executionTime,
    ticksOnUnit: 0,
  };

  state.stats.set(process, stats);
  state.metrics.processes.push(stats);
  state.metrics.admitted += 1;
}

export function recordTick(
  state: SimulationState,
  placed: Process[],
  completed: Process[]
): void {
  const metrics = state.metrics;

  metrics.ticks += 1;
  metrics.busyUnitTicks += placed.length;

  for (const process of placed) {
    const stats = state.stats.get(process);
    if (stats === undefined) {
      throw new InvariantViolation(
        `process ${process.id} ran without being admitted`
      );
    }

    stats.ticksOnUnit += 1;
    if (stats.firstRunAt === undefined) {
      stats.firstRunAt = state.time;
    }
  }

  for (const process of completed) {
    const stats = state.stats.get(process);
    if (stats === undefined) continue;

    stats.completedAt = state.time;
    metrics.completed += 1;
    state.stats.delete(process);
  }
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function summarizeMetrics(state: SimulationState): MetricsSummary {
  const { ticks, busyUnitTicks, admitted, completed, processes } = state.metrics;
  const capacity = ticks * state.config.unitCount;

  const turnaround: number[] = [];
  const waiting: number[] = [];
  const response: number[] = [];

  for (const p of processes) {
    if (p.completedAt === undefined || p.firstRunAt === undefined) continue;

    // completedAt is the tick of the final unit of work, hence the +1
    const tat = p.completedAt + 1 - p.arrivalTime;
    turnaround.push(tat);
    waiting.push(tat - p.executionTime);
    response.push(p.firstRunAt - p.arrivalTime);
  }

  return {
    ticks,
    admitted,
    completed,
    utilization: capacity > 0 ? busyUnitTicks / capacity : 0,
    throughput: ticks > 0 ? completed / ticks : 0,
    avgTurnaround: average(turnaround),
    avgWaiting: average(waiting),
    avgResponse: average(response),
  };
}
