import { IPageDriver } from '../adapters/interfaces/IPageDriver';

export type BrowserType = 'chrome' | 'dolphin';

/**
 * Handle for one account's isolated browser identity (cookies, fingerprint, proxy)
 */
export interface AccountSession {
  username: string;
  provider: BrowserType;
  createdAt: Date;
}

export interface ISessionProvider {
  readonly kind: BrowserType;
  /** @throws SessionUnavailableError when no session can be opened */
  createSession(username: string, proxy?: string): Promise<AccountSession>;
  createPage(session: AccountSession): Promise<IPageDriver>;
  /** No-op for an unknown username */
  closeSession(username: string): Promise<void>;
  shutdown(): Promise<void>;
}
