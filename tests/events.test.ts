import { describe, expect, it } from 'vitest';
import { parseAnomalyEvent, parseAnomalyEvents } from '../src/alerting/events.js';

describe('parseAnomalyEvents', () => {
  it('reads newline-delimited events with snake_case keys', () => {
    const contents = [
      JSON.stringify({
        max_z_score: 4.2,
        anomaly_features: [{ feature: 'duration', value: 300, expected: 120, z_score: 4.2 }],
        data: { job_name: 'build', failure_count: 2, duration: 300, result: 'FAILURE', branch: 'main' }
      }),
      '',
      JSON.stringify({ severity: 'critical', data: { workflowName: 'nightly' } }),
      ''
    ].join('\n');

    expect(parseAnomalyEvents(contents)).toEqual([
      {
        maxZScore: 4.2,
        anomalyFeatures: [{ feature: 'duration', value: 300, expected: 120, zScore: 4.2 }],
        data: { jobName: 'build', failureCount: 2, duration: 300, result: 'FAILURE', branch: 'main' }
      },
      { severity: 'critical', data: { workflowName: 'nightly' } }
    ]);
  });

  it('reads a JSON array', () => {
    expect(parseAnomalyEvents('[{"data": {"jobName": "a"}}, {"maxZScore": 3}]')).toEqual([
      { data: { jobName: 'a' } },
      { maxZScore: 3 }
    ]);
  });

  it('reads a single pretty-printed event', () => {
    const contents = JSON.stringify({ severity: 'high', data: { job_name: 'deploy-prod' } }, null, 2);
    expect(parseAnomalyEvents(contents)).toEqual([{ severity: 'high', data: { jobName: 'deploy-prod' } }]);
  });

  it('labels a single invalid event', () => {
    expect(() => parseAnomalyEvents('{\n  "severity": 3\n}')).toThrow('events[0].severity must be a string');
  });

  it('returns nothing for blank input', () => {
    expect(parseAnomalyEvents('  \n ')).toEqual([]);
  });

  it('names the line that is not JSON', () => {
    expect(() => parseAnomalyEvents('{"data": {}}\n{oops')).toThrow(/^line 2 is not valid JSON: /);
  });

  it('labels invalid events by position', () => {
    expect(() => parseAnomalyEvents('[{"data": {"jobName": "a"}}, {"severity": 3}]')).toThrow(
      'events[1].severity must be a string'
    );
  });
});

describe('parseAnomalyEvent', () => {
  it('lists every problem with an event', () => {
    expect(() =>
      parseAnomalyEvent({ maxZScore: 'high', anomalyFeatures: [{ feature: '' }], data: 'deploy' })
    ).toThrow(
      'event.maxZScore must be a finite number; ' +
        'event.anomalyFeatures[0].feature must be a non-empty string; ' +
        'event.data must be an object'
    );
  });

  it('rejects non-objects', () => {
    expect(() => parseAnomalyEvent(42)).toThrow('event must be an object');
  });

  it('defaults missing feature numbers to zero', () => {
    expect(parseAnomalyEvent({ anomalyFeatures: [{ feature: 'queue_time', value: 9 }] })).toEqual({
      anomalyFeatures: [{ feature: 'queue_time', value: 9, expected: 0, zScore: 0 }]
    });
  });
});
