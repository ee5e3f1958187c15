export const BLOCK_INDICATORS: readonly string[] = [
  'Try Again Later',
  'Please wait a few minutes',
  'temporarily blocked',
  'unusual activity',
  'We restrict certain activity',
  'Action Blocked',
  'temporary ban',
];

/**
 * Returns the first platform rate-limit / restriction phrase found in any of
 * the given texts (case-insensitive), or null when none is present.
 */
export function findBlockIndicator(...texts: string[]): string | null {
  const haystacks = texts.map((text) => text.toLowerCase());
  for (const indicator of BLOCK_INDICATORS) {
    const needle = indicator.toLowerCase();
    if (haystacks.some((haystack) => haystack.includes(needle))) {
      return indicator;
    }
  }
  return null;
}
