import type { AlertCounters } from '../types.js';

export type PipelineStats = AlertCounters & {
  totalSuppressed: number;
  suppressionRate: number;
  pendingInBatch: number;
  activeMaintenanceWindows: number;
  registeredRules: number;
  alertsLastHour: number;
};

export type StatsContext = {
  pendingInBatch: number;
  activeMaintenanceWindows: number;
  registeredRules: number;
  alertsLastHour: number;
};

export function totalSuppressed(counters: AlertCounters): number {
  return (
    counters.suppressedDuplicate +
    counters.suppressedMaintenance +
    counters.suppressedRateLimit +
    counters.suppressedSeverity
  );
}

export function buildStats(counters: AlertCounters, context: StatsContext): PipelineStats {
  const suppressed = totalSuppressed(counters);
  return {
    ...counters,
    totalSuppressed: suppressed,
    suppressionRate: suppressed / Math.max(counters.totalReceived, 1),
    pendingInBatch: context.pendingInBatch,
    activeMaintenanceWindows: context.activeMaintenanceWindows,
    registeredRules: context.registeredRules,
    alertsLastHour: context.alertsLastHour
  };
}

export function mergeCounters(target: AlertCounters, saved: AlertCounters) {
  target.totalReceived += saved.totalReceived;
  target.totalSent += saved.totalSent;
  target.suppressedDuplicate += saved.suppressedDuplicate;
  target.suppressedMaintenance += saved.suppressedMaintenance;
  target.suppressedRateLimit += saved.suppressedRateLimit;
  target.suppressedSeverity += saved.suppressedSeverity;
  target.batched += saved.batched;
}
