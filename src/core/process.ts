export type ProcessId = number;

export type Process = {
  id: ProcessId;
  priority: number; // lower number runs first
  executionTime: number;
  remainingTime: number;
  arrivalTime: number;
};

export type Arrival = {
  id: ProcessId;
  priority: number;
  executionTime: number;
};

export type ProcessComparator = (a: Process, b: Process) => number;

export function createProcess(arrival: Arrival, arrivalTime: number): Process {
  return {
    id: arrival.id,
    priority: arrival.priority,
    executionTime: arrival.executionTime,
    remainingTime: arrival.executionTime,
    arrivalTime,
  };
}

export function isLive(process: Process): boolean {
  return process.remainingTime > 0;
}

export function executedTime(process: Process): number {
  return process.executionTime - process.remainingTime;
}

export const byExecutionTime: ProcessComparator = (a, b) =>
  a.executionTime - b.executionTime;

export const byRemainingTime: ProcessComparator = (a, b) =>
  a.remainingTime - b.remainingTime;

export const byPriority: ProcessComparator = (a, b) => a.priority - b.priority;
