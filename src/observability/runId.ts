import os from "node:os";

export function createRunId(now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `run_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

export function createWorkerId(): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `worker_${os.hostname()}_${process.pid}_${suffix}`;
}
