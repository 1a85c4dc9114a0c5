import type { TickRecord } from "../engine/tick";
import type { MetricsSummary } from "../core/metrics";

export function formatTick(record: TickRecord): string {
  return [record.time, ...record.units].join(" ");
}

export function formatSummary(summary: MetricsSummary): string[] {
  return [
    `ticks: ${summary.ticks}`,
    `admitted: ${summary.admitted}`,
    `completed: ${summary.completed}`,
    `utilization: ${(summary.utilization * 100).toFixed(1)}%`,
    `throughput: ${summary.throughput.toFixed(3)} per tick`,
    `avg turnaround: ${summary.avgTurnaround.toFixed(2)}`,
    `avg waiting: ${summary.avgWaiting.toFixed(2)}`,
    `avg response: ${summary.avgResponse.toFixed(2)}`,
  ];
}
