import { ElementHandle, Page } from 'playwright';
import { IElementDriver, IPageDriver, LoadState, NavigationOptions } from '../interfaces/IPageDriver';

class PlaywrightElementDriver implements IElementDriver {
  constructor(private readonly handle: ElementHandle) {}

  async click(): Promise<void> {
    await this.handle.click();
  }

  async fill(text: string): Promise<void> {
    await this.handle.fill(text);
  }

  async innerText(): Promise<string> {
    return this.handle.innerText();
  }
}

/**
 * IPageDriver backed by a playwright Page
 */
export class PlaywrightPageDriver implements IPageDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string, options: NavigationOptions = {}): Promise<void> {
    await this.page.goto(url, { timeout: options.timeout, waitUntil: options.waitUntil });
  }

  async waitForLoadState(state: LoadState, timeout?: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout });
  }

  async reload(options: NavigationOptions = {}): Promise<void> {
    await this.page.reload({ timeout: options.timeout, waitUntil: options.waitUntil });
  }

  async textContent(): Promise<string> {
    return this.page.locator('body').innerText();
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  url(): string {
    return this.page.url();
  }

  async query(selector: string): Promise<IElementDriver | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightElementDriver(handle) : null;
  }

  async queryAll(selector: string): Promise<IElementDriver[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElementDriver(handle));
  }

  async waitForSelector(selector: string, timeout?: number): Promise<IElementDriver> {
    const handle = await this.page.waitForSelector(selector, { timeout, state: 'attached' });
    if (!handle) {
      throw new Error(`waiting for selector "${selector}" returned no element`);
    }
    return new PlaywrightElementDriver(handle);
  }

  async press(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
