import { describe, expect, it } from 'vitest';
import { computeAdaptiveDelay, navigationBackoff, randomDelaySeconds } from '../src/utils/delay';

const half = () => 0.5;
const zero = () => 0;

describe('randomDelaySeconds', () => {
  it('draws from the range', () => {
    expect(randomDelaySeconds([5, 15], half)).toBe(10);
    expect(randomDelaySeconds([5, 15], zero)).toBe(5);
  });

  it('accepts a reversed range', () => {
    expect(randomDelaySeconds([15, 5], zero)).toBe(5);
  });
});

describe('computeAdaptiveDelay', () => {
  it('stretches sensitive actions by 1.5', () => {
    // 10 * 1.5 + 0.5 jitter
    expect(computeAdaptiveDelay('follow', true, [5, 15], half)).toBe(15.5);
  });

  it('doubles the delay after a failure', () => {
    // 10 * 2 + 0.5 jitter
    expect(computeAdaptiveDelay('like_posts', false, [5, 15], half)).toBe(20.5);
  });

  it('compounds both multipliers', () => {
    // 10 * 1.5 * 2 + 0.5 jitter
    expect(computeAdaptiveDelay('send_dm', false, [5, 15], half)).toBe(30.5);
  });

  it('applies the lowest jitter', () => {
    expect(computeAdaptiveDelay('view_stories', true, [5, 15], zero)).toBe(3);
  });

  it('never goes below one second', () => {
    expect(computeAdaptiveDelay('delay', true, [0, 0], zero)).toBe(1);
  });
});

describe('navigationBackoff', () => {
  it('grows with each attempt', () => {
    expect(navigationBackoff(0, half)).toBe(4.5);
    expect(navigationBackoff(1, half)).toBe(6.75);
    expect(navigationBackoff(2, half)).toBe(9);
  });
});
