import { describe, expect, it } from 'vitest';

import { ContextMetrics } from '../metrics.js';

describe('ContextMetrics', () => {
  it('counts registrations, picks and depth', () => {
    const metrics = new ContextMetrics();

    metrics.recordRegistration(true);
    metrics.recordRegistration(true);
    metrics.recordRegistration(false);
    metrics.recordPick(false);
    metrics.recordPick(true);
    metrics.recordPush(1);
    metrics.recordPush(3);
    metrics.recordPush(2);
    metrics.recordTruncation();

    expect(metrics.snapshotMetrics()).toEqual({
      instancesRegistered: 2,
      instancesDropped: 1,
      pooledPicks: 2,
      fallbackPicks: 1,
      framesPushed: 3,
      maxDepthObserved: 3,
      depthTruncations: 1,
    });
  });

  it('reports pool occupancy only in ci verbosity', () => {
    const metrics = new ContextMetrics();
    metrics.trackPoolSize('Node', 2);
    metrics.trackPoolSize('Node', 3);

    expect(metrics.snapshotMetrics().poolSizes).toBeUndefined();
    expect(metrics.snapshotMetrics({ verbosity: 'ci' }).poolSizes).toEqual({
      Node: 3,
    });

    metrics.setVerbosity('ci');
    expect(metrics.snapshotMetrics().poolSizes).toEqual({ Node: 3 });
  });

  it('ignores updates when disabled', () => {
    const metrics = new ContextMetrics({ enabled: false });
    metrics.recordRegistration(true);
    metrics.recordPush(4);

    expect(metrics.isEnabled()).toBe(false);
    expect(metrics.snapshotMetrics()).toMatchObject({
      instancesRegistered: 0,
      maxDepthObserved: 0,
    });
  });

  it('hands out frozen snapshots', () => {
    const snapshot = new ContextMetrics().snapshotMetrics();

    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
