import { Browser, BrowserContext, Page, Route, chromium } from 'playwright';
import * as fs from 'fs';
import * as path from 'path';
import { IPageDriver } from '../adapters/interfaces/IPageDriver';
import { PlaywrightPageDriver } from '../adapters/playwright/PlaywrightPageDriver';
import { Settings } from '../config/settings';
import { EngineConfig } from '../models/EngineConfig';
import { SessionUnavailableError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { RandomSource, defaultRandom, pickRandom, uniform } from '../utils/random';
import { releaseQuietly } from './cleanup';
import { parseProxy, toPlaywrightProxy } from './proxy';
import { AccountSession, BrowserType, ISessionProvider } from './types';
import { DolphinSessionProvider } from './dolphinSession';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-blink-features=AutomationControlled',
  '--disable-features=VizDisplayCompositor',
  '--disable-extensions-file-access-check',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--disable-field-trial-config',
  '--disable-back-forward-cache',
  '--enable-features=NetworkService,NetworkServiceInProcess',
  '--disable-ipc-flooding-protection',
  '--disable-dev-shm-usage',
  '--no-first-run',
  '--no-default-browser-check',
  '--disable-default-apps',
  '--disable-popup-blocking',
];

/** Runs in the page before any site script */
export const STEALTH_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
const originalQuery = window.navigator.permissions.query;
window.navigator.permissions.query = (parameters) =>
  parameters.name === 'notifications'
    ? Promise.resolve({ state: Notification.permission })
    : originalQuery(parameters);
Object.defineProperty(navigator, 'plugins', {
  get: () => ({ length: 3, 0: { name: 'Chrome PDF Plugin' }, 1: { name: 'Chrome PDF Viewer' }, 2: { name: 'Native Client' } }),
});
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
if (window.chrome) { delete window.chrome.runtime; }
Object.defineProperty(screen, 'availHeight', { get: () => window.innerHeight });
Object.defineProperty(screen, 'availWidth', { get: () => window.innerWidth });
`;

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'font', 'media']);
const TRACKING_URL_PATTERN = /ads|analytics|tracking/;

/**
 * Drops third-party images, fonts and media plus ad / analytics requests
 */
export function shouldBlockRequest(resourceType: string, url: string): boolean {
  if (BLOCKED_RESOURCE_TYPES.has(resourceType) && !url.includes('instagram')) {
    return true;
  }
  return TRACKING_URL_PATTERN.test(url);
}

/**
 * Gets the Chrome executable path based on the operating system
 * Falls back to playwright's bundled Chromium when nothing is found
 */
function getChromeExecutablePath(configured?: string): string | undefined {
  if (configured) {
    if (fs.existsSync(configured)) {
      return configured;
    }
    logger.warn(`CHROME_EXECUTABLE_PATH set to ${configured} but file does not exist`);
  }

  const platform = process.platform;
  let chromePaths: string[] = [];

  if (platform === 'darwin') {
    chromePaths = [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
    ];
  } else if (platform === 'linux') {
    chromePaths = [
      '/usr/bin/google-chrome',
      '/usr/bin/google-chrome-stable',
      '/usr/bin/chromium',
      '/usr/bin/chromium-browser',
      '/snap/bin/chromium',
    ];
  } else if (platform === 'win32') {
    const programFiles = process.env['ProgramFiles'] || 'C:\\Program Files';
    const programFilesX86 = process.env['ProgramFiles(x86)'] || 'C:\\Program Files (x86)';
    chromePaths = [
      path.join(programFiles, 'Google', 'Chrome', 'Application', 'chrome.exe'),
      path.join(programFilesX86, 'Google', 'Chrome', 'Application', 'chrome.exe'),
      path.join(process.env.LOCALAPPDATA || '', 'Google', 'Chrome', 'Application', 'chrome.exe'),
    ];
  }

  const found = chromePaths.find((chromePath) => fs.existsSync(chromePath));
  if (found) {
    logger.info(`Found Chrome at: ${found}`);
  }
  return found;
}

interface ChromeAccountSession extends AccountSession {
  context: BrowserContext;
}

export interface ChromeSessionOptions {
  headless: boolean;
  executablePath?: string;
  config: EngineConfig;
  random?: RandomSource;
}

/**
 * One shared Chrome process, one isolated mobile-emulating context per account
 */
export class ChromeSessionProvider implements ISessionProvider {
  readonly kind = 'chrome' as const;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly sessions = new Map<string, ChromeAccountSession>();
  private readonly random: RandomSource;

  constructor(private readonly options: ChromeSessionOptions) {
    this.random = options.random ?? defaultRandom;
  }

  private async getBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    const executablePath = getChromeExecutablePath(this.options.executablePath);
    logger.info(`Launching Chrome${executablePath ? ` from: ${executablePath}` : ' (bundled Chromium)'}`);

    this.browser = await chromium.launch({
      executablePath,
      headless: this.options.headless,
      args: LAUNCH_ARGS,
    });
    logger.info('Chrome browser launched successfully');
    return this.browser;
  }

  async createSession(username: string, proxy?: string): Promise<AccountSession> {
    const existing = this.sessions.get(username);
    if (existing) {
      return existing;
    }

    const { config } = this.options;
    const [width, height] = pickRandom(config.screenResolutions, this.random) ?? [375, 812];
    const proxySettings = proxy ? parseProxy(proxy) : null;
    if (proxy && !proxySettings) {
      logger.warn(`Ignoring malformed proxy for ${username}`);
    }

    try {
      const browser = await this.getBrowser();
      const context = await browser.newContext({
        userAgent: pickRandom(config.userAgents, this.random),
        viewport: { width, height },
        locale: pickRandom(['en-US', 'en-GB'], this.random),
        deviceScaleFactor: uniform(1, 2, this.random),
        isMobile: true,
        hasTouch: true,
        proxy: proxySettings ? toPlaywrightProxy(proxySettings) : undefined,
        extraHTTPHeaders: {
          'Accept-Language': 'en-US,en;q=0.9',
          'Cache-Control': 'no-cache',
        },
      });
      try {
        await context.addInitScript({ content: STEALTH_SCRIPT });
      } catch (error) {
        await releaseQuietly(`Chrome context for ${username}`, () => context.close());
        throw error;
      }

      const session: ChromeAccountSession = {
        username,
        provider: 'chrome',
        createdAt: new Date(),
        context,
      };
      this.sessions.set(username, session);
      logger.info(`Created Chrome context for ${username}${proxySettings ? ' behind proxy' : ''}`);
      return session;
    } catch (error) {
      throw new SessionUnavailableError(username, `Could not open Chrome context: ${describeError(error)}`);
    }
  }

  async createPage(session: AccountSession): Promise<IPageDriver> {
    const owned = this.sessions.get(session.username);
    if (!owned) {
      throw new SessionUnavailableError(session.username, 'No open Chrome context for this account');
    }

    const page: Page = await owned.context.newPage();
    page.setDefaultTimeout(this.options.config.timeouts.navigation);
    await page.route('**/*', (route: Route) => {
      const request = route.request();
      const handled = shouldBlockRequest(request.resourceType(), request.url())
        ? route.abort()
        : route.continue();
      return handled.catch((error: unknown) => {
        logger.debug(`Route handling failed for ${request.url()}: ${describeError(error)}`);
      });
    });
    return new PlaywrightPageDriver(page);
  }

  async closeSession(username: string): Promise<void> {
    const session = this.sessions.get(username);
    if (!session) {
      return;
    }
    this.sessions.delete(username);
    try {
      await session.context.close();
      logger.info(`Closed Chrome context for ${username}`);
    } catch (error) {
      logger.warn(`Error closing Chrome context for ${username}:`, error);
    }
  }

  async shutdown(): Promise<void> {
    for (const username of [...this.sessions.keys()]) {
      await this.closeSession(username);
    }
    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        logger.warn('Error closing browser:', error);
      }
      this.browser = null;
    }
    logger.info('Chrome session provider shut down');
  }
}

/**
 * Picks the session provider for the configured browser type
 */
export function createSessionProvider(
  settings: Settings,
  config: EngineConfig,
  browserType: BrowserType = settings.BROWSER_TYPE
): ISessionProvider {
  if (browserType === 'dolphin') {
    if (!settings.DOLPHIN_TOKEN) {
      throw new Error('DOLPHIN_TOKEN environment variable is required for Dolphin mode');
    }
    return new DolphinSessionProvider({
      apiUrl: settings.DOLPHIN_API_URL,
      token: settings.DOLPHIN_TOKEN,
      config,
    });
  }

  return new ChromeSessionProvider({
    headless: settings.HEADLESS,
    executablePath: settings.CHROME_EXECUTABLE_PATH,
    config,
  });
}
