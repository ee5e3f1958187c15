import { ProfileStatus, ProfileStatusKind } from '../models/Profile';

interface StatusRule {
  kind: Exclude<ProfileStatusKind, 'available' | 'blocked'>;
  reason: string;
  matches(pageText: string): boolean;
}

/** Checked in order; the first rule that matches decides the status */
const STATUS_RULES: readonly StatusRule[] = [
  {
    kind: 'not_found',
    reason: 'Page not found',
    matches: (text) => text.includes("Sorry, this page isn't available"),
  },
  {
    kind: 'private',
    reason: 'Private account',
    matches: (text) => text.includes('This Account is Private') || text.includes('This account is private'),
  },
  {
    kind: 'not_found',
    reason: 'User not found',
    matches: (text) => text.includes('User not found'),
  },
  {
    kind: 'suspended',
    reason: 'Account temporarily unavailable',
    matches: (text) => text.toLowerCase().includes('temporarily unavailable'),
  },
];

export function availableProfileStatus(): ProfileStatus {
  return { kind: 'available', blocked: false, private: false, notFound: false, suspended: false };
}

/**
 * Classifies a loaded profile page from its rendered text. Every outcome other
 * than `available` has `blocked` set, meaning the chain must not run.
 */
export function classifyProfileStatus(pageText: string): ProfileStatus {
  const rule = STATUS_RULES.find((candidate) => candidate.matches(pageText));
  if (!rule) {
    return availableProfileStatus();
  }

  return {
    kind: rule.kind,
    blocked: true,
    private: rule.kind === 'private',
    notFound: rule.kind === 'not_found',
    suspended: rule.kind === 'suspended',
    reason: rule.reason,
  };
}

/**
 * Status used when the page text could not be read at all
 */
export function unreachableProfileStatus(reason: string): ProfileStatus {
  return {
    kind: 'blocked',
    blocked: true,
    private: false,
    notFound: false,
    suspended: false,
    reason: `Status check failed: ${reason}`,
  };
}
