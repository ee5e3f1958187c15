import { describe, expect, it } from 'vitest';
import { findBlockIndicator } from '../src/services/BlockDetector';
import { classifyProfileStatus, unreachableProfileStatus } from '../src/services/ProfileStatusClassifier';

describe('classifyProfileStatus', () => {
  it('reports an ordinary profile as available', () => {
    expect(classifyProfileStatus('alice 12 posts 340 followers')).toEqual({
      kind: 'available',
      blocked: false,
      private: false,
      notFound: false,
      suspended: false,
    });
  });

  it('detects a missing page', () => {
    const status = classifyProfileStatus("Sorry, this page isn't available. The link may be broken.");
    expect(status.kind).toBe('not_found');
    expect(status.notFound).toBe(true);
    expect(status.blocked).toBe(true);
    expect(status.reason).toBe('Page not found');
  });

  it('detects private accounts in either casing', () => {
    expect(classifyProfileStatus('This Account is Private').kind).toBe('private');
    expect(classifyProfileStatus('This account is private').private).toBe(true);
  });

  it('detects a missing user', () => {
    expect(classifyProfileStatus('User not found').reason).toBe('User not found');
  });

  it('detects suspended accounts case-insensitively', () => {
    const status = classifyProfileStatus('This profile is Temporarily Unavailable');
    expect(status.kind).toBe('suspended');
    expect(status.suspended).toBe(true);
  });

  it('applies the first matching rule', () => {
    const status = classifyProfileStatus("Sorry, this page isn't available. This account is private");
    expect(status.kind).toBe('not_found');
  });

  it('marks an unreadable page as blocked', () => {
    expect(unreachableProfileStatus('Target closed')).toEqual({
      kind: 'blocked',
      blocked: true,
      private: false,
      notFound: false,
      suspended: false,
      reason: 'Status check failed: Target closed',
    });
  });
});

describe('findBlockIndicator', () => {
  it('returns null on a clean page', () => {
    expect(findBlockIndicator('alice 12 posts', '')).toBeNull();
  });

  it('matches case-insensitively and returns the listed phrase', () => {
    expect(findBlockIndicator('ACTION BLOCKED')).toBe('Action Blocked');
  });

  it('looks at every text given', () => {
    expect(findBlockIndicator('profile', 'We noticed unusual activity on your account')).toBe('unusual activity');
  });

  it('prefers the earliest phrase in the list', () => {
    expect(findBlockIndicator('Action Blocked. Try Again Later')).toBe('Try Again Later');
  });
});
