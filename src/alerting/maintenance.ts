import type { MaintenanceWindowInput } from '../types.js';

export interface MaintenanceWindow {
  name: string;
  start: number;
  end: number;
  affectedJobs: string[] | null;
}

export type WindowSummary = {
  name: string;
  start: string;
  end: string;
  affectedJobs: string[] | null;
};

function toTimestamp(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isFinite(time) ? time : null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Date.parse(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function normalizeMaintenanceWindow(input: MaintenanceWindowInput): MaintenanceWindow {
  const messages: string[] = [];
  const name = typeof input?.name === 'string' ? input.name.trim() : '';
  if (!name) {
    messages.push('maintenance window name must be a non-empty string');
  }
  const label = name || '<unnamed>';

  const start = toTimestamp(input?.start);
  if (start === null) {
    messages.push(`maintenance window "${label}" start must be a valid date`);
  }
  const end = toTimestamp(input?.end);
  if (end === null) {
    messages.push(`maintenance window "${label}" end must be a valid date`);
  }
  if (start !== null && end !== null && end < start) {
    messages.push(`maintenance window "${label}" end must not be before start`);
  }

  let affectedJobs: string[] | null = null;
  if (input?.affectedJobs !== undefined && input.affectedJobs !== null) {
    if (!Array.isArray(input.affectedJobs)) {
      messages.push(`maintenance window "${label}" affectedJobs must be an array of job names`);
    } else if (input.affectedJobs.some(job => typeof job !== 'string' || job.length === 0)) {
      messages.push(`maintenance window "${label}" affectedJobs must only contain non-empty strings`);
    } else {
      affectedJobs = [...input.affectedJobs];
    }
  }

  if (messages.length > 0 || start === null || end === null) {
    throw new Error(messages.join('; '));
  }

  return { name, start, end, affectedJobs };
}

export function isWindowActive(window: MaintenanceWindow, now: number): boolean {
  return window.start <= now && now <= window.end;
}

export function windowAffectsJob(window: MaintenanceWindow, jobName: string): boolean {
  return window.affectedJobs === null || window.affectedJobs.includes(jobName);
}

export function isInMaintenance(
  windows: readonly MaintenanceWindow[],
  jobName: string,
  now: number
): boolean {
  return windows.some(window => isWindowActive(window, now) && windowAffectsJob(window, jobName));
}

export function summarizeWindow(window: MaintenanceWindow): WindowSummary {
  return {
    name: window.name,
    start: new Date(window.start).toISOString(),
    end: new Date(window.end).toISOString(),
    affectedJobs: window.affectedJobs ? [...window.affectedJobs] : null
  };
}
