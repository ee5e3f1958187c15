import { describe, expect, it } from 'vitest';
import { InstagramAdapter, parseCompactCount } from '../src/adapters/instagram/InstagramAdapter';
import { instagramSelectors as selectors } from '../src/adapters/instagram/selectors';
import { LoginFailedError } from '../src/utils/errors';
import { FakeElement, FakePage, createAccount, createControl, testConfig } from './helpers/fakes';

function setup(): { page: FakePage; adapter: InstagramAdapter } {
  const page = new FakePage();
  const adapter = new InstagramAdapter({ page, config: testConfig, control: createControl() });
  return { page, adapter };
}

describe('parseCompactCount', () => {
  it.each([
    ['1,234 posts', 1234],
    ['12.5K followers', 12500],
    ['3M', 3000000],
    ['87 following', 87],
    ['no digits', 0],
  ])('parses %j', (text, expected) => {
    expect(parseCompactCount(text)).toBe(expected);
  });
});

describe('InstagramAdapter', () => {
  describe('session', () => {
    it('is logged in on an instagram page without a login form', async () => {
      const { page, adapter } = setup();
      page.currentUrl = 'https://www.instagram.com/';
      expect(await adapter.isLoggedIn()).toBe(true);

      page.set(selectors.usernameInput, new FakeElement());
      expect(await adapter.isLoggedIn()).toBe(false);
    });

    it('is not logged in on the login page', async () => {
      const { page, adapter } = setup();
      page.currentUrl = 'https://www.instagram.com/accounts/login/';
      expect(await adapter.isLoggedIn()).toBe(false);
    });

    it('fills the login form and submits', async () => {
      const { page, adapter } = setup();
      const username = new FakeElement();
      const password = new FakeElement();
      const submit = new FakeElement('', () => {
        page.currentUrl = 'https://www.instagram.com/';
      });
      page.set(selectors.usernameInput, username);
      page.set(selectors.passwordInput, password);
      page.set(selectors.loginButton, submit);

      await adapter.login(createAccount('alice'));

      expect(page.visited).toEqual(['https://www.instagram.com/accounts/login/']);
      expect(username.filled).toEqual(['alice']);
      expect(password.filled).toEqual(['test-secret']);
      expect(submit.clicks).toBe(1);
    });

    it('fails when the login page stays open', async () => {
      const { page, adapter } = setup();
      page.set(selectors.usernameInput, new FakeElement());
      page.set(selectors.passwordInput, new FakeElement());
      page.set(selectors.loginButton, new FakeElement());

      const attempt = adapter.login(createAccount('alice'));
      await expect(attempt).rejects.toBeInstanceOf(LoginFailedError);
      await expect(attempt).rejects.toThrow('Login failed for account alice');
    });

    it('refuses to log in without a password', async () => {
      const { adapter } = setup();
      await expect(adapter.login(createAccount('alice', { password: '' }))).rejects.toThrow(
        'Username or password missing'
      );
    });
  });

  describe('profile page', () => {
    it('accepts a profile page by its title', async () => {
      const { page, adapter } = setup();
      page.pageTitle = 'Alice (@alice) • Instagram photos and videos';

      expect(await adapter.openProfile('alice')).toEqual({
        loaded: true,
        title: 'Alice (@alice) • Instagram photos and videos',
      });
      expect(page.visited).toEqual(['https://www.instagram.com/alice/']);
    });

    it('rejects an unrelated title', async () => {
      const { page, adapter } = setup();
      page.pageTitle = 'Error';
      expect((await adapter.openProfile('alice')).loaded).toBe(false);
    });

    it('gathers header counters, stories, badge and bio', async () => {
      const { page, adapter } = setup();
      page.set(
        selectors.profileStats,
        new FakeElement('1,234 posts'),
        new FakeElement('12.5K followers'),
        new FakeElement('87 following')
      );
      page.set(selectors.storyRing, new FakeElement());
      page.set(selectors.verifiedBadge, new FakeElement());
      page.set(selectors.bioText, new FakeElement('Coffee and cameras'));

      expect(await adapter.gatherProfileInfo('alice')).toEqual({
        username: 'alice',
        postsCount: 1234,
        followersCount: 12500,
        followingCount: 87,
        hasStories: true,
        isVerified: true,
        bioText: 'Coffee and cameras',
      });
    });

    it('reads the text of every open dialog', async () => {
      const { page, adapter } = setup();
      page.set(selectors.dialog, new FakeElement('Action Blocked'), new FakeElement('Try Again Later'));
      expect(await adapter.readDialogText()).toBe('Action Blocked\nTry Again Later');
    });

    it('counts dismissed dialogs', async () => {
      const { page, adapter } = setup();
      const first = new FakeElement();
      const second = new FakeElement();
      page.set(selectors.dismissButtons, first, second);

      expect(await adapter.dismissDialogs()).toBe(2);
      expect(first.clicks + second.clicks).toBe(2);
    });
  });

  describe('follow', () => {
    it('clicks Follow', async () => {
      const { page, adapter } = setup();
      const button = new FakeElement();
      page.set(selectors.followButton, button);

      expect(await adapter.follow('alice')).toEqual({ success: true, details: { alreadyFollowing: false } });
      expect(button.clicks).toBe(1);
    });

    it('treats an existing follow as success without clicking', async () => {
      const { page, adapter } = setup();
      const following = new FakeElement();
      page.set(selectors.followingButton, following);

      expect(await adapter.follow('alice')).toEqual({ success: true, details: { alreadyFollowing: true } });
      expect(following.clicks).toBe(0);
    });

    it('fails when neither control is present', async () => {
      const { adapter } = setup();
      expect(await adapter.follow('alice')).toEqual({
        success: false,
        error: 'Follow control not found',
        details: {},
      });
    });
  });

  describe('likePosts', () => {
    it('likes up to count posts and closes each one', async () => {
      const { page, adapter } = setup();
      const posts = [new FakeElement(), new FakeElement(), new FakeElement()];
      const like = new FakeElement();
      const close = new FakeElement();
      page.set(selectors.postLinks, ...posts);
      page.set(selectors.postLikeButton, like);
      page.set(selectors.postCloseButton, close);

      const result = await adapter.likePosts('alice', 2);

      expect(result).toEqual({ success: true, details: { liked: 2, alreadyLiked: 0, attempted: 2 } });
      expect(posts.map((post) => post.clicks)).toEqual([1, 1, 0]);
      expect(like.clicks).toBe(2);
      expect(close.clicks).toBe(2);
    });

    it('does not unlike posts that are already liked', async () => {
      const { page, adapter } = setup();
      const like = new FakeElement();
      page.set(selectors.postLinks, new FakeElement(), new FakeElement());
      page.set(selectors.postLikeButton, like);
      page.set(selectors.postUnlikeButton, new FakeElement());

      const result = await adapter.likePosts('alice', 2);

      expect(result).toEqual({
        success: false,
        error: 'No post was liked',
        details: { liked: 0, alreadyLiked: 2, attempted: 2 },
      });
      expect(like.clicks).toBe(0);
      expect(page.pressed).toEqual(['Escape', 'Escape']);
    });

    it('reports a profile without posts', async () => {
      const { adapter } = setup();
      expect(await adapter.likePosts('alice', 2)).toEqual({
        success: false,
        error: 'No posts found',
        details: { liked: 0, attempted: 0 },
      });
    });

    it('keeps going when a post never shows its like control', async () => {
      const { page, adapter } = setup();
      page.set(selectors.postLinks, new FakeElement());

      const result = await adapter.likePosts('alice', 1);

      expect(result.success).toBe(false);
      expect(result.details).toEqual({ liked: 0, alreadyLiked: 0, attempted: 1 });
      expect(page.pressed).toEqual(['Escape']);
    });
  });

  describe('stories', () => {
    function withStoryViewer(page: FakePage): { next: FakeElement; close: FakeElement } {
      const next = new FakeElement();
      const close = new FakeElement();
      page.set(selectors.storyRing, new FakeElement());
      page.set(selectors.storyViewer, new FakeElement());
      page.set(selectors.storyNextButton, next);
      page.set(selectors.storyCloseButton, close);
      return { next, close };
    }

    it('views count frames', async () => {
      const { page, adapter } = setup();
      const { next, close } = withStoryViewer(page);

      expect(await adapter.viewStories('alice', 3)).toEqual({ success: true, details: { viewed: 3 } });
      expect(next.clicks).toBe(2);
      expect(close.clicks).toBe(1);
    });

    it('stops at the last frame', async () => {
      const { page, adapter } = setup();
      withStoryViewer(page);
      page.remove(selectors.storyNextButton);

      expect(await adapter.viewStories('alice', 3)).toEqual({ success: true, details: { viewed: 1 } });
    });

    it('reports a profile without stories', async () => {
      const { adapter } = setup();
      expect(await adapter.viewStories('alice', 3)).toEqual({
        success: false,
        error: 'No active stories',
        details: { viewed: 0 },
      });
    });

    it('closes a viewer that never finishes loading', async () => {
      const { page, adapter } = setup();
      const { close } = withStoryViewer(page);
      page.remove(selectors.storyViewer);

      await expect(adapter.viewStories('alice', 3)).rejects.toThrow(`Timeout waiting for ${selectors.storyViewer}`);
      expect(close.clicks).toBe(1);
    });

    it('presses Escape when the half-open viewer has no close control', async () => {
      const { page, adapter } = setup();
      withStoryViewer(page);
      page.remove(selectors.storyViewer);
      page.remove(selectors.storyCloseButton);

      await expect(adapter.likeStories('alice', 2)).rejects.toThrow(`Timeout waiting for ${selectors.storyViewer}`);
      expect(page.pressed).toEqual(['Escape']);
    });

    it('likes frames up to the limit', async () => {
      const { page, adapter } = setup();
      withStoryViewer(page);
      const like = new FakeElement();
      page.set(selectors.storyLikeButton, like);

      expect(await adapter.likeStories('alice', 2)).toEqual({ success: true, details: { liked: 2 } });
      expect(like.clicks).toBe(2);
    });

    it('replies to a story', async () => {
      const { page, adapter } = setup();
      withStoryViewer(page);
      const field = new FakeElement();
      const send = new FakeElement();
      page.set(selectors.storyReplyField, field);
      page.set(selectors.storySendButton, send);

      expect(await adapter.replyToStory('alice', 'Nice shot')).toEqual({
        success: true,
        details: { message: 'Nice shot' },
      });
      expect(field.filled).toEqual(['Nice shot']);
      expect(send.clicks).toBe(1);
    });
  });

  describe('sendDirectMessage', () => {
    it('walks the new-conversation flow', async () => {
      const { page, adapter } = setup();
      const search = new FakeElement();
      const result = new FakeElement();
      const message = new FakeElement();
      page.set(selectors.directSearchInput, search);
      page.set('text=alice', result);
      page.set(selectors.directNextButton, new FakeElement());
      page.set(selectors.directMessageField, message);
      page.set(selectors.directSendButton, new FakeElement());

      expect(await adapter.sendDirectMessage('alice', 'Hello there')).toEqual({
        success: true,
        details: { message: 'Hello there' },
      });
      expect(page.visited).toEqual(['https://www.instagram.com/direct/new/']);
      expect(search.filled).toEqual(['alice']);
      expect(result.clicks).toBe(1);
      expect(message.filled).toEqual(['Hello there']);
    });

    it('fails when the recipient is not found', async () => {
      const { page, adapter } = setup();
      page.set(selectors.directSearchInput, new FakeElement());

      expect(await adapter.sendDirectMessage('alice', 'Hello there')).toEqual({
        success: false,
        error: 'No search result for alice',
        details: {},
      });
    });
  });
});
