import { BaseAdapter } from '../base/BaseAdapter';
import { ProfileNavigationOutcome } from '../interfaces/IPlatformAdapter';
import { Account } from '../../models/Account';
import { ActionResult, actionFailed, actionSucceeded } from '../../models/ActionResult';
import { ProfileInfo, emptyProfileInfo } from '../../models/Profile';
import { LoginFailedError, describeError } from '../../utils/errors';
import {
  INSTAGRAM_BASE_URL,
  directSearchResult,
  instagramSelectors as selectors,
} from './selectors';

/**
 * Parses a header counter such as "1,234 posts", "12.5K followers" or "3M"
 * into an integer. Unparseable text yields 0.
 */
export function parseCompactCount(text: string): number {
  const digits = text.replace(/[^\d,.]/g, '').replace(/,/g, '');
  const value = Number.parseFloat(digits);
  if (!Number.isFinite(value)) {
    return 0;
  }

  const upper = text.toUpperCase();
  if (upper.includes('K')) {
    return Math.trunc(value * 1000);
  }
  if (upper.includes('M')) {
    return Math.trunc(value * 1000000);
  }
  return Math.trunc(value);
}

export class InstagramAdapter extends BaseAdapter {
  readonly platform = 'instagram' as const;

  getHomeUrl(): string {
    return `${INSTAGRAM_BASE_URL}/`;
  }

  getProfileUrl(target: string): string {
    return `${INSTAGRAM_BASE_URL}/${target}/`;
  }

  async isLoggedIn(): Promise<boolean> {
    const url = this.page.url();
    if (!url.includes('instagram.com') || url.includes('/accounts/login')) {
      return false;
    }
    const loginField = await this.page.query(selectors.usernameInput);
    return loginField === null;
  }

  async login(account: Account): Promise<void> {
    if (!account.username || !account.password) {
      throw new LoginFailedError(account.username, 'Username or password missing');
    }

    this.logger.info(`Logging in as ${account.username}`);

    await this.page.goto(`${INSTAGRAM_BASE_URL}/accounts/login/`, {
      waitUntil: 'networkidle',
      timeout: this.config.timeouts.navigation,
    });
    await this.humanPause(this.config.actionDelays.pageLoad);

    const usernameField = await this.waitForElement(selectors.usernameInput, 15000);
    await this.humanType(usernameField, account.username);

    const passwordField = await this.waitForElement(selectors.passwordInput);
    await this.humanType(passwordField, account.password);

    const submit = await this.waitForElement(selectors.loginButton);
    await submit.click();
    await this.humanPause([3, 5]);

    const url = this.page.url();
    if (!url.includes('instagram.com') || url.includes('login')) {
      throw new LoginFailedError(account.username);
    }

    await this.dismissPostLoginPrompts();
    this.logger.info(`Instagram login successful for ${account.username}`);
  }

  /**
   * "Save your login info?" and "Turn on notifications" prompts; both optional
   */
  private async dismissPostLoginPrompts(): Promise<void> {
    for (const prompt of ['save login info', 'notifications']) {
      try {
        const notNow = await this.page.waitForSelector(selectors.notNowButton, 3000);
        await notNow.click();
        await this.control.sleepSeconds(1);
      } catch {
        this.logger.debug(`No "${prompt}" prompt after login`);
      }
    }
  }

  async openProfile(target: string): Promise<ProfileNavigationOutcome> {
    const { timeouts } = this.config;
    await this.page.goto(this.getProfileUrl(target), {
      waitUntil: 'networkidle',
      timeout: timeouts.navigation,
    });
    await this.page.waitForLoadState('domcontentloaded', timeouts.domContentLoaded);

    const title = await this.page.title();
    return {
      loaded: title.includes('Instagram') || title.includes(target),
      title,
    };
  }

  async readPageText(): Promise<string> {
    return this.page.textContent();
  }

  async readDialogText(): Promise<string> {
    const dialogs = await this.page.queryAll(selectors.dialog);
    const texts: string[] = [];
    for (const dialog of dialogs) {
      texts.push(await dialog.innerText());
    }
    return texts.join('\n');
  }

  async gatherProfileInfo(target: string): Promise<ProfileInfo> {
    const info = emptyProfileInfo(target);

    try {
      const stats = await this.page.queryAll(selectors.profileStats);
      if (stats.length >= 3) {
        info.postsCount = parseCompactCount(await stats[0].innerText());
        info.followersCount = parseCompactCount(await stats[1].innerText());
        info.followingCount = parseCompactCount(await stats[2].innerText());
      }
    } catch (error) {
      this.logger.debug(`Could not read profile counters for ${target}: ${describeError(error)}`);
    }

    try {
      info.hasStories = await this.hasActiveStories();
    } catch (error) {
      this.logger.debug(`Could not check stories for ${target}: ${describeError(error)}`);
    }

    try {
      info.isVerified = (await this.page.query(selectors.verifiedBadge)) !== null;
    } catch (error) {
      this.logger.debug(`Could not check verification for ${target}: ${describeError(error)}`);
    }

    try {
      const bio = await this.page.query(selectors.bioText);
      if (bio) {
        info.bioText = await bio.innerText();
      }
    } catch (error) {
      this.logger.debug(`Could not read bio for ${target}: ${describeError(error)}`);
    }

    return info;
  }

  async hasActiveStories(): Promise<boolean> {
    return (await this.page.query(selectors.storyRing)) !== null;
  }

  async dismissDialogs(): Promise<number> {
    const closeButtons = await this.page.queryAll(selectors.dismissButtons);
    let clicked = 0;
    for (const button of closeButtons) {
      try {
        await button.click();
        clicked++;
        await this.control.sleepSeconds(1);
      } catch (error) {
        this.logger.debug(`Close control not clickable: ${describeError(error)}`);
      }
    }
    return clicked;
  }

  async follow(target: string): Promise<ActionResult> {
    const followButton = await this.page.query(selectors.followButton);
    if (followButton) {
      await followButton.click();
      await this.humanPause(this.config.actionDelays.follow);
      this.logger.info(`Followed ${target}`);
      return actionSucceeded({ alreadyFollowing: false });
    }

    const followingButton = await this.page.query(selectors.followingButton);
    if (followingButton) {
      this.logger.info(`Already following ${target}`);
      return actionSucceeded({ alreadyFollowing: true });
    }

    return actionFailed('Follow control not found');
  }

  async likePosts(target: string, count: number): Promise<ActionResult> {
    const postLinks = await this.page.queryAll(selectors.postLinks);
    if (postLinks.length === 0) {
      return actionFailed('No posts found', { liked: 0, attempted: 0 });
    }

    const attempted = Math.min(count, postLinks.length);
    let liked = 0;
    let alreadyLiked = 0;

    for (let i = 0; i < attempted; i++) {
      if (this.control.isStopped) {
        break;
      }
      try {
        await postLinks[i].click();
        await this.humanPause(this.config.actionDelays.pageLoad);
        await this.page.waitForSelector(selectors.postLikeButton, this.config.timeouts.element);

        if (await this.page.query(selectors.postUnlikeButton)) {
          alreadyLiked++;
          this.logger.info(`Post ${i + 1} of ${target} already liked`);
          continue;
        }

        if (await this.clickIfPresent(selectors.postLikeButton)) {
          liked++;
          this.logger.info(`Liked post ${i + 1} of ${target}`);
        }
        await this.humanPause(this.config.actionDelays.likePost);
      } catch (error) {
        this.logger.warn(`Failed to like post ${i + 1} of ${target}: ${describeError(error)}`);
      } finally {
        await this.closeOverlay(selectors.postCloseButton, 'post');
      }
    }

    this.logger.info(`Liked ${liked}/${attempted} posts of ${target}`);
    const details = { liked, alreadyLiked, attempted };
    return liked > 0 ? actionSucceeded(details) : actionFailed('No post was liked', details);
  }

  /**
   * Opens the story viewer from the profile's story ring. Returns false when
   * the profile shows no ring; a viewer that never loads is closed again.
   */
  private async openStoryViewer(): Promise<boolean> {
    if (!(await this.clickIfPresent(selectors.storyRing))) {
      return false;
    }
    try {
      await this.humanPause(this.config.actionDelays.pageLoad);
      await this.page.waitForSelector(selectors.storyViewer, this.config.timeouts.element);
    } catch (error) {
      await this.closeOverlay(selectors.storyCloseButton, 'story viewer');
      throw error;
    }
    return true;
  }

  private async nextStoryFrame(): Promise<boolean> {
    if (!(await this.clickIfPresent(selectors.storyNextButton))) {
      return false;
    }
    await this.humanPause([1, 2]);
    return true;
  }

  async viewStories(target: string, count: number): Promise<ActionResult> {
    if (!(await this.openStoryViewer())) {
      return actionFailed('No active stories', { viewed: 0 });
    }

    let viewed = 0;
    try {
      for (let i = 0; i < count; i++) {
        if (this.control.isStopped) {
          break;
        }
        await this.humanPause(this.config.actionDelays.viewStory);
        viewed++;
        this.logger.debug(`Viewed story ${viewed} of ${target}`);
        if (i < count - 1 && !(await this.nextStoryFrame())) {
          break;
        }
      }
    } finally {
      await this.closeOverlay(selectors.storyCloseButton, 'story viewer');
    }

    this.logger.info(`Viewed ${viewed} stories of ${target}`);
    return viewed > 0 ? actionSucceeded({ viewed }) : actionFailed('No story frame was viewed', { viewed });
  }

  async likeStories(target: string, maxFrames: number): Promise<ActionResult> {
    if (!(await this.openStoryViewer())) {
      return actionFailed('No active stories', { liked: 0 });
    }

    let liked = 0;
    try {
      for (let i = 0; i < maxFrames; i++) {
        if (this.control.isStopped) {
          break;
        }
        if (await this.clickIfPresent(selectors.storyLikeButton)) {
          liked++;
          await this.humanPause(this.config.actionDelays.likeStory);
        }
        if (i < maxFrames - 1 && !(await this.nextStoryFrame())) {
          break;
        }
      }
    } finally {
      await this.closeOverlay(selectors.storyCloseButton, 'story viewer');
    }

    this.logger.info(`Liked ${liked} stories of ${target}`);
    return liked > 0 ? actionSucceeded({ liked }) : actionFailed('Story like control not found', { liked });
  }

  async replyToStory(target: string, text: string): Promise<ActionResult> {
    if (!(await this.openStoryViewer())) {
      return actionFailed('No active stories');
    }

    try {
      const replyField = await this.page.query(selectors.storyReplyField);
      if (!replyField) {
        return actionFailed('Story reply field not found');
      }
      await this.humanType(replyField, text);

      if (!(await this.clickIfPresent(selectors.storySendButton))) {
        return actionFailed('Story reply send control not found');
      }
      await this.humanPause(this.config.actionDelays.replyStory);
      this.logger.info(`Replied to story of ${target}`);
      return actionSucceeded({ message: text });
    } finally {
      await this.closeOverlay(selectors.storyCloseButton, 'story viewer');
    }
  }

  async sendDirectMessage(target: string, text: string): Promise<ActionResult> {
    await this.page.goto(`${INSTAGRAM_BASE_URL}/direct/new/`, {
      waitUntil: 'domcontentloaded',
      timeout: this.config.timeouts.navigation,
    });
    await this.humanPause(this.config.actionDelays.pageLoad);

    const searchField = await this.page.query(selectors.directSearchInput);
    if (!searchField) {
      return actionFailed('Direct search field not found');
    }
    await this.humanType(searchField, target);

    const steps: Array<[string, string]> = [
      [directSearchResult(target), `No search result for ${target}`],
      [selectors.directNextButton, 'Direct "Next" control not found'],
    ];
    for (const [selector, failure] of steps) {
      if (!(await this.clickIfPresent(selector))) {
        return actionFailed(failure);
      }
      await this.humanPause([1, 2]);
    }

    const messageField = await this.page.query(selectors.directMessageField);
    if (!messageField) {
      return actionFailed('Direct message field not found');
    }
    await this.humanType(messageField, text);

    if (!(await this.clickIfPresent(selectors.directSendButton))) {
      return actionFailed('Direct message send control not found');
    }
    await this.humanPause(this.config.actionDelays.sendDm);
    this.logger.info(`Sent direct message to ${target}`);
    return actionSucceeded({ message: text });
  }
}
