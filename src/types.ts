export type AlertSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface AnomalyFeature {
  feature: string;
  value: number;
  expected: number;
  zScore: number;
}

export interface AnomalyEventData {
  jobName?: string;
  workflowName?: string;
  duration?: number;
  result?: string;
  failureCount?: number;
  [key: string]: unknown;
}

export interface AnomalyEvent {
  severity?: string;
  maxZScore?: number;
  anomalyFeatures?: AnomalyFeature[];
  data?: AnomalyEventData;
}

export type SuppressionReason =
  | 'maintenance_window'
  | 'duplicate'
  | 'rate_limit'
  | 'below_severity_threshold';

export type OutcomeReason = SuppressionReason | 'queued_in_batch' | 'batch_flushed';

export interface SubmitOutcome {
  sent: boolean;
  reason: OutcomeReason;
  jobName: string;
  severity: AlertSeverity;
}

export interface AlertRuleInput {
  name: string;
  jobPattern?: string | null;
  minSeverity?: string;
  channels?: string[];
  teamName?: string | null;
  destination?: string | null;
}

export interface MaintenanceWindowInput {
  name: string;
  start: Date | string | number;
  end: Date | string | number;
  affectedJobs?: string[] | null;
}

export interface AlertCounters {
  totalReceived: number;
  totalSent: number;
  suppressedDuplicate: number;
  suppressedMaintenance: number;
  suppressedRateLimit: number;
  suppressedSeverity: number;
  batched: number;
}

export interface StateSnapshot {
  fingerprints: Record<string, number>;
  alertTimestamps: number[];
  stats: AlertCounters;
}
