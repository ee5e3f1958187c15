import { Account } from '../../models/Account';
import { ActionResult } from '../../models/ActionResult';
import { ProfileInfo } from '../../models/Profile';
import { IPageDriver } from './IPageDriver';

export type Platform = 'instagram';

export interface ProfileNavigationOutcome {
  loaded: boolean;
  title: string;
}

/**
 * Platform-specific page work. Methods returning an ActionResult report
 * business outcomes (control missing, nothing to like) as `success: false`;
 * anything unexpected is thrown and handled by the chain runner's recovery.
 */
export interface IPlatformAdapter {
  readonly platform: Platform;
  readonly page: IPageDriver;

  getHomeUrl(): string;
  getProfileUrl(target: string): string;

  // Session
  isLoggedIn(): Promise<boolean>;
  login(account: Account): Promise<void>;

  // Profile page
  openProfile(target: string): Promise<ProfileNavigationOutcome>;
  readPageText(): Promise<string>;
  /** Text of every open modal dialog, empty when none is open */
  readDialogText(): Promise<string>;
  gatherProfileInfo(target: string): Promise<ProfileInfo>;
  hasActiveStories(): Promise<boolean>;
  /** Clicks every visible close control; returns how many were clicked */
  dismissDialogs(): Promise<number>;

  // Interactions
  follow(target: string): Promise<ActionResult>;
  likePosts(target: string, count: number): Promise<ActionResult>;
  viewStories(target: string, count: number): Promise<ActionResult>;
  likeStories(target: string, maxFrames: number): Promise<ActionResult>;
  replyToStory(target: string, text: string): Promise<ActionResult>;
  sendDirectMessage(target: string, text: string): Promise<ActionResult>;

  close(): Promise<void>;
}
