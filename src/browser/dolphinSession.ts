import axios, { AxiosInstance } from 'axios';
import { Browser, BrowserContext, chromium } from 'playwright';
import { z } from 'zod';
import { IPageDriver } from '../adapters/interfaces/IPageDriver';
import { PlaywrightPageDriver } from '../adapters/playwright/PlaywrightPageDriver';
import { EngineConfig } from '../models/EngineConfig';
import { SessionUnavailableError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { RandomSource, defaultRandom, pickRandom } from '../utils/random';
import { releaseQuietly } from './cleanup';
import { ProxySettings, parseProxy } from './proxy';
import { AccountSession, ISessionProvider } from './types';

const ProfileListSchema = z.object({
  data: z.array(z.object({ id: z.union([z.string(), z.number()]), name: z.string() }).passthrough()).default([]),
});

const CreatedProfileSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  browserProfileId: z.union([z.string(), z.number()]).optional(),
});

const StartResponseSchema = z.object({
  automation: z
    .object({
      port: z.number().int(),
      wsEndpoint: z.string(),
    })
    .optional(),
  ws: z.string().optional(),
});

interface DolphinProxy {
  mode: 'new';
  type: 'http';
  host: string;
  port: number;
  login?: string;
  password?: string;
}

export function toDolphinProxy(settings: ProxySettings): DolphinProxy {
  const proxy: DolphinProxy = { mode: 'new', type: 'http', host: settings.host, port: settings.port };
  if (settings.username && settings.password) {
    proxy.login = settings.username;
    proxy.password = settings.password;
  }
  return proxy;
}

export function dolphinProfileName(username: string): string {
  return `InstagramBot_${username}`;
}

interface DolphinAccountSession extends AccountSession {
  profileId: string;
  browser: Browser;
  context: BrowserContext;
}

export interface DolphinSessionOptions {
  apiUrl: string;
  token: string;
  config: EngineConfig;
  random?: RandomSource;
  /** Injected in tests */
  client?: AxiosInstance;
  connect?: (wsEndpoint: string) => Promise<Browser>;
}

/**
 * Sessions backed by Dolphin Anty browser profiles: one profile per account,
 * started through the local API and driven over CDP
 */
export class DolphinSessionProvider implements ISessionProvider {
  readonly kind = 'dolphin' as const;
  private readonly client: AxiosInstance;
  private readonly sessions = new Map<string, DolphinAccountSession>();
  private readonly random: RandomSource;
  private readonly connect: (wsEndpoint: string) => Promise<Browser>;

  constructor(private readonly options: DolphinSessionOptions) {
    if (!options.token) {
      throw new Error('Dolphin API token is required');
    }
    this.random = options.random ?? defaultRandom;
    this.connect = options.connect ?? ((wsEndpoint) => chromium.connectOverCDP(wsEndpoint));
    this.client =
      options.client ??
      axios.create({
        baseURL: options.apiUrl,
        headers: {
          Authorization: `Bearer ${options.token}`,
          'Content-Type': 'application/json',
        },
        timeout: 30000,
      });
  }

  async checkConnection(): Promise<boolean> {
    try {
      const response = await this.client.get('/browser_profiles', { timeout: 10000 });
      return response.status === 200;
    } catch (error) {
      logger.error(`Dolphin API unreachable: ${describeError(error)}`);
      return false;
    }
  }

  async findProfileId(name: string): Promise<string | null> {
    const response = await this.client.get('/browser_profiles');
    const { data } = ProfileListSchema.parse(response.data);
    const profile = data.find((candidate) => candidate.name === name);
    return profile ? String(profile.id) : null;
  }

  /**
   * Reuses the account's profile when one exists (re-pointing its proxy),
   * otherwise creates a mobile profile for it
   */
  async getOrCreateProfile(username: string, proxy?: string): Promise<string> {
    const name = dolphinProfileName(username);
    const proxySettings = proxy ? parseProxy(proxy) : null;
    const existingId = await this.findProfileId(name);

    if (existingId) {
      if (proxySettings) {
        await this.client.patch(`/browser_profiles/${existingId}`, { proxy: toDolphinProxy(proxySettings) });
        logger.info(`Updated proxy of Dolphin profile ${existingId}`);
      }
      return existingId;
    }

    const { config } = this.options;
    const response = await this.client.post('/browser_profiles', {
      name,
      tags: ['instagram', 'automation', username],
      platform: 'android',
      browserType: 'anty',
      mainWebsite: 'instagram.com',
      useragent: { mode: 'manual', value: pickRandom(config.userAgents, this.random) },
      screen: { mode: 'manual', resolution: (pickRandom(config.screenResolutions, this.random) ?? [375, 812]).join('x') },
      webrtc: { mode: 'altered' },
      timezone: { mode: 'auto' },
      locale: { mode: 'auto' },
      geolocation: { mode: 'auto' },
      proxy: proxySettings ? toDolphinProxy(proxySettings) : undefined,
      notes: `Automation profile for ${username}`,
    });

    const created = CreatedProfileSchema.parse(response.data);
    const id = created.browserProfileId ?? created.id;
    if (id === undefined) {
      throw new Error(`Dolphin did not return an id for profile ${name}`);
    }
    logger.info(`Created Dolphin profile ${id} for ${username}`);
    return String(id);
  }

  async startProfile(profileId: string): Promise<string> {
    const response = await this.client.get(`/browser_profiles/${profileId}/start`, {
      params: { automation: 1 },
    });
    const started = StartResponseSchema.parse(response.data);
    if (started.automation) {
      return `ws://127.0.0.1:${started.automation.port}${started.automation.wsEndpoint}`;
    }
    if (started.ws) {
      return started.ws;
    }
    throw new Error(`Dolphin profile ${profileId} started without an automation endpoint`);
  }

  async stopProfile(profileId: string): Promise<void> {
    await this.client.get(`/browser_profiles/${profileId}/stop`);
  }

  async createSession(username: string, proxy?: string): Promise<AccountSession> {
    const existing = this.sessions.get(username);
    if (existing) {
      return existing;
    }

    let startedProfileId: string | null = null;
    let browser: Browser | null = null;
    try {
      const profileId = await this.getOrCreateProfile(username, proxy);
      startedProfileId = profileId;
      const wsEndpoint = await this.startProfile(profileId);
      logger.info(`Dolphin profile ${profileId} started, connecting over CDP`);

      browser = await this.connect(wsEndpoint);
      const contexts = browser.contexts();
      const context = contexts.length > 0 ? contexts[0] : await browser.newContext();

      const session: DolphinAccountSession = {
        username,
        provider: 'dolphin',
        createdAt: new Date(),
        profileId,
        browser,
        context,
      };
      this.sessions.set(username, session);
      return session;
    } catch (error) {
      const connected = browser;
      if (connected) {
        await releaseQuietly(`CDP connection for ${username}`, () => connected.close());
      }
      const profileId = startedProfileId;
      if (profileId) {
        await releaseQuietly(`Dolphin profile ${profileId}`, () => this.stopProfile(profileId));
      }
      throw new SessionUnavailableError(username, `Could not open Dolphin profile: ${describeError(error)}`);
    }
  }

  async createPage(session: AccountSession): Promise<IPageDriver> {
    const owned = this.sessions.get(session.username);
    if (!owned) {
      throw new SessionUnavailableError(session.username, 'No open Dolphin profile for this account');
    }
    const page = await owned.context.newPage();
    page.setDefaultTimeout(this.options.config.timeouts.navigation);
    await page.addInitScript({ content: "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });" });
    return new PlaywrightPageDriver(page);
  }

  async closeSession(username: string): Promise<void> {
    const session = this.sessions.get(username);
    if (!session) {
      return;
    }
    this.sessions.delete(username);

    try {
      await session.browser.close();
    } catch (error) {
      logger.warn(`Error disconnecting from Dolphin profile ${session.profileId}:`, error);
    }
    try {
      await this.stopProfile(session.profileId);
      logger.info(`Stopped Dolphin profile ${session.profileId} for ${username}`);
    } catch (error) {
      logger.warn(`Error stopping Dolphin profile ${session.profileId}:`, error);
    }
  }

  async shutdown(): Promise<void> {
    for (const username of [...this.sessions.keys()]) {
      await this.closeSession(username);
    }
  }
}
