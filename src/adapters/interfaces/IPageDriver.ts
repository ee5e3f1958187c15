export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigationOptions {
  timeout?: number;
  waitUntil?: LoadState;
}

export interface IElementDriver {
  click(): Promise<void>;
  fill(text: string): Promise<void>;
  innerText(): Promise<string>;
}

/**
 * Browser capability the engine drives. Every call is asynchronous and bounded
 * by its own timeout; a timeout surfaces as a rejected promise.
 */
export interface IPageDriver {
  goto(url: string, options?: NavigationOptions): Promise<void>;
  waitForLoadState(state: LoadState, timeout?: number): Promise<void>;
  reload(options?: NavigationOptions): Promise<void>;
  /** Rendered text of the whole document */
  textContent(): Promise<string>;
  title(): Promise<string>;
  url(): string;
  query(selector: string): Promise<IElementDriver | null>;
  queryAll(selector: string): Promise<IElementDriver[]>;
  /** Rejects when nothing matches within the timeout */
  waitForSelector(selector: string, timeout?: number): Promise<IElementDriver>;
  press(key: string): Promise<void>;
  close(): Promise<void>;
}
