import { IPageDriver, IElementDriver } from '../interfaces/IPageDriver';
import {
  IPlatformAdapter,
  Platform,
  ProfileNavigationOutcome,
} from '../interfaces/IPlatformAdapter';
import { Account } from '../../models/Account';
import { ActionResult } from '../../models/ActionResult';
import { DelayRange, EngineConfig } from '../../models/EngineConfig';
import { ProfileInfo } from '../../models/Profile';
import { RunControl } from '../../workers/RunControl';
import { Logger, logger as rootLogger } from '../../utils/logger';
import { describeError } from '../../utils/errors';

export interface AdapterOptions {
  page: IPageDriver;
  config: EngineConfig;
  control: RunControl;
  logger?: Logger;
}

export abstract class BaseAdapter implements IPlatformAdapter {
  abstract readonly platform: Platform;

  readonly page: IPageDriver;
  protected readonly config: EngineConfig;
  protected readonly control: RunControl;
  protected readonly logger: Logger;

  constructor(options: AdapterOptions) {
    this.page = options.page;
    this.config = options.config;
    this.control = options.control;
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Human-like pause drawn from a [min, max] seconds range. Returns early on stop.
   */
  protected async humanPause(range: DelayRange): Promise<void> {
    await this.control.pauseBetween(range);
  }

  /**
   * Human-like typing: focus the field, settle, then fill
   */
  protected async humanType(element: IElementDriver, text: string): Promise<void> {
    await element.click();
    await this.humanPause([0.3, 0.8]);
    await element.fill(text);
    await this.humanPause([1, 2]);
  }

  /**
   * Wait for element with retries
   */
  protected async waitForElement(
    selector: string,
    timeout: number = this.config.timeouts.element,
    retries: number = 1
  ): Promise<IElementDriver> {
    let lastError: unknown;
    for (let i = 0; i < retries; i++) {
      try {
        return await this.page.waitForSelector(selector, timeout);
      } catch (error) {
        lastError = error;
        if (i < retries - 1) {
          await this.humanPause([1, 2]);
        }
      }
    }
    throw lastError instanceof Error ? lastError : new Error(`Element not found: ${selector}`);
  }

  /**
   * Clicks the first element matching `selector`. Returns false when nothing matched.
   */
  protected async clickIfPresent(selector: string): Promise<boolean> {
    const element = await this.page.query(selector);
    if (!element) {
      return false;
    }
    await element.click();
    return true;
  }

  /**
   * Closes an overlay through its close control, falling back to Escape.
   * Never throws: a failed close is logged and the page is left as is.
   */
  protected async closeOverlay(closeSelector: string, what: string): Promise<void> {
    try {
      const clicked = await this.clickIfPresent(closeSelector);
      if (!clicked) {
        await this.page.press('Escape');
      }
      await this.control.sleepSeconds(1);
    } catch (error) {
      this.logger.warn(`Failed to close ${what}: ${describeError(error)}`);
    }
  }

  abstract getHomeUrl(): string;
  abstract getProfileUrl(target: string): string;
  abstract isLoggedIn(): Promise<boolean>;
  abstract login(account: Account): Promise<void>;
  abstract openProfile(target: string): Promise<ProfileNavigationOutcome>;
  abstract readPageText(): Promise<string>;
  abstract readDialogText(): Promise<string>;
  abstract gatherProfileInfo(target: string): Promise<ProfileInfo>;
  abstract hasActiveStories(): Promise<boolean>;
  abstract dismissDialogs(): Promise<number>;
  abstract follow(target: string): Promise<ActionResult>;
  abstract likePosts(target: string, count: number): Promise<ActionResult>;
  abstract viewStories(target: string, count: number): Promise<ActionResult>;
  abstract likeStories(target: string, maxFrames: number): Promise<ActionResult>;
  abstract replyToStory(target: string, text: string): Promise<ActionResult>;
  abstract sendDirectMessage(target: string, text: string): Promise<ActionResult>;

  async close(): Promise<void> {
    try {
      await this.page.close();
      this.logger.info('Page closed');
    } catch (error) {
      this.logger.error('Error closing page:', error);
    }
  }
}
