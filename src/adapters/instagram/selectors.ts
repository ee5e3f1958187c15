/**
 * Instagram selectors
 * Note: These selectors may need to be updated as Instagram changes its UI
 */
export const instagramSelectors = {
  // Login
  usernameInput: "input[name='username']",
  passwordInput: "input[name='password']",
  loginButton: "button[type='submit']",
  notNowButton: 'text=Not Now',

  // Profile header
  profileStats: 'main ul li',
  verifiedBadge: '[aria-label*="Verified"]',
  bioText: 'main article div div span',

  // Follow
  followButton: 'button:text-is("Follow")',
  followingButton: 'button:text-is("Following")',

  // Posts
  postLinks: "article a[href*='/p/']",
  postLikeButton: "[aria-label='Like']",
  postUnlikeButton: "[aria-label='Unlike']",
  postCloseButton: "[aria-label='Close']",

  // Stories
  storyRing: 'canvas',
  storyViewer: "[role='dialog']",
  storyLikeButton: "[aria-label='Like']",
  storyReplyField: "textarea[placeholder*='message']",
  storySendButton: "button[type='submit']",
  storyNextButton: "[aria-label='Next']",
  storyCloseButton: "[aria-label='Close']",

  // Direct
  directSearchInput: "input[placeholder*='Search']",
  directNextButton: 'text=Next',
  directMessageField: "textarea[placeholder*='Message']",
  directSendButton: "button[type='submit']",

  // General
  dialog: '[role="dialog"]',
  dismissButtons: '[aria-label="Close"], [aria-label="Закрити"]',
};

export const INSTAGRAM_BASE_URL = 'https://www.instagram.com';

/** Search result row for a handle in the new-conversation flow */
export function directSearchResult(handle: string): string {
  return `text=${handle}`;
}
