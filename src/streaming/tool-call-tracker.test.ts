import { describe, it, expect } from 'vitest';
import { createToolCallTracker } from './tool-call-tracker.js';

describe('createToolCallTracker', () => {
  it('resolves a recorded call once', () => {
    const tracker = createToolCallTracker();
    tracker.recordStart('call_1', 'add', { first: 2, second: 2 });

    expect(tracker.resolve('call_1')).toEqual({ name: 'add', args: { first: 2, second: 2 } });
    expect(tracker.resolve('call_1')).toBeUndefined();
  });

  it('returns undefined for an unknown call', () => {
    expect(createToolCallTracker().resolve('missing')).toBeUndefined();
  });

  it('keeps the last start for a repeated id', () => {
    const tracker = createToolCallTracker();
    tracker.recordStart('call_1', 'add', { first: 1, second: 1 });
    tracker.recordStart('call_1', 'multiply', { first: 3, second: 3 });

    expect(tracker.pending()).toEqual(['call_1']);
    expect(tracker.resolve('call_1')).toEqual({ name: 'multiply', args: { first: 3, second: 3 } });
  });

  it('lists calls still in flight', () => {
    const tracker = createToolCallTracker();
    tracker.recordStart('a', 'add', {});
    tracker.recordStart('b', 'get_weather', { city: 'Paris' });
    tracker.resolve('a');

    expect(tracker.pending()).toEqual(['b']);
  });

  it('keeps trackers independent', () => {
    const first = createToolCallTracker();
    const second = createToolCallTracker();
    first.recordStart('a', 'add', {});

    expect(second.pending()).toEqual([]);
  });
});
