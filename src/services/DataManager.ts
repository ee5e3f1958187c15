import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Account, CreateAccountParams } from '../models/Account';
import { ActionChainStep } from '../models/ActionChain';
import { TextPool, TextPoolType, emptyTextPool } from '../models/TextPool';
import { AutomationRunConfig } from '../models/Worker';
import { getSettings } from '../config/settings';
import { DuplicateEntryError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { RawChainSchema, normalizeTarget, toActionChain, validateAccount, validateTarget } from './ChainValidator';

const AccountSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
  proxy: z.string().optional(),
  status: z.enum(['active', 'disabled']).default('active'),
  addedAt: z.string(),
  lastUsed: z.string().optional(),
  totalActions: z.number().int().nonnegative().default(0),
  successRate: z.number().min(0).max(100).default(0),
});

const AccountsFileSchema = z.array(AccountSchema);
const TargetsFileSchema = z.array(z.string());
const TextsFileSchema = z.object({
  storyReplies: z.array(z.string()).default([]),
  directMessages: z.array(z.string()).default([]),
});

const FILES = {
  accounts: 'accounts.json',
  targets: 'targets.json',
  actionChain: 'action_chain.json',
  texts: 'texts.json',
} as const;

/**
 * Accounts, targets, the action chain and text pools, persisted as JSON
 * files in one data directory. Every mutation rewrites its file.
 */
export class DataManager {
  private accounts: Account[] = [];
  private targets: string[] = [];
  private actionChain: ActionChainStep[] = [];
  private texts: TextPool = emptyTextPool();
  /** Pending write per file; writes of one file never overlap */
  private readonly writes = new Map<string, Promise<void>>();

  constructor(private readonly dataDir: string) {}

  /**
   * Loads every file; missing files start empty, malformed ones are an error
   */
  async load(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });

    this.accounts = AccountsFileSchema.parse(await this.readJson(FILES.accounts, []));
    this.targets = TargetsFileSchema.parse(await this.readJson(FILES.targets, []));
    const rawChain = RawChainSchema.parse(await this.readJson(FILES.actionChain, []));
    this.actionChain = toActionChain(rawChain);
    if (this.actionChain.length < rawChain.length) {
      logger.warn(`Dropped ${rawChain.length - this.actionChain.length} chain step(s) of unknown type`);
    }
    this.texts = TextsFileSchema.parse(await this.readJson(FILES.texts, {}));

    logger.info(
      `Loaded ${this.accounts.length} account(s), ${this.targets.length} target(s), ${this.actionChain.length} chain step(s)`
    );
  }

  // Accounts

  getAccounts(): Account[] {
    return this.accounts.map((account) => ({ ...account }));
  }

  getActiveAccounts(): Account[] {
    return this.getAccounts().filter((account) => account.status === 'active');
  }

  async addAccount(params: CreateAccountParams): Promise<Account> {
    const report = validateAccount(params);
    if (!report.valid) {
      throw new ValidationError('Invalid account', report.errors);
    }
    if (this.accounts.some((account) => account.username === params.username)) {
      throw new DuplicateEntryError('Account', params.username);
    }
    report.warnings.forEach((warning) => logger.warn(`Account ${params.username}: ${warning}`));

    const account: Account = {
      username: params.username,
      password: params.password,
      status: 'active',
      addedAt: new Date().toISOString(),
      totalActions: 0,
      successRate: 0,
    };
    if (params.proxy) {
      account.proxy = params.proxy;
    }

    this.accounts.push(account);
    await this.save(FILES.accounts, this.accounts);
    logger.info(`Added account ${account.username}`);
    return { ...account };
  }

  async removeAccount(username: string): Promise<boolean> {
    const before = this.accounts.length;
    this.accounts = this.accounts.filter((account) => account.username !== username);
    if (this.accounts.length === before) {
      return false;
    }
    await this.save(FILES.accounts, this.accounts);
    logger.info(`Removed account ${username}`);
    return true;
  }

  async setAccountStatus(username: string, status: Account['status']): Promise<boolean> {
    const account = this.accounts.find((candidate) => candidate.username === username);
    if (!account) {
      return false;
    }
    account.status = status;
    await this.save(FILES.accounts, this.accounts);
    return true;
  }

  async updateAccountStats(username: string, actions: number, successRate: number): Promise<void> {
    const account = this.accounts.find((candidate) => candidate.username === username);
    if (!account) {
      logger.warn(`Cannot update stats of unknown account ${username}`);
      return;
    }
    account.lastUsed = new Date().toISOString();
    account.totalActions += actions;
    account.successRate = successRate;
    await this.save(FILES.accounts, this.accounts);
  }

  // Targets

  getTargets(): string[] {
    return [...this.targets];
  }

  /**
   * @returns false when the target is already in the list
   */
  async addTarget(target: string): Promise<boolean> {
    const handle = normalizeTarget(target);
    if (!validateTarget(handle)) {
      throw new ValidationError(`Invalid target handle: ${target}`);
    }
    if (this.targets.includes(handle)) {
      return false;
    }
    this.targets.push(handle);
    await this.save(FILES.targets, this.targets);
    logger.info(`Added target ${handle}`);
    return true;
  }

  /**
   * Adds every valid, new handle; returns how many were added
   */
  async bulkAddTargets(targets: readonly string[]): Promise<number> {
    let added = 0;
    for (const target of targets) {
      const handle = normalizeTarget(target);
      if (!handle || !validateTarget(handle) || this.targets.includes(handle)) {
        continue;
      }
      this.targets.push(handle);
      added++;
    }
    if (added > 0) {
      await this.save(FILES.targets, this.targets);
      logger.info(`Added ${added} target(s)`);
    }
    return added;
  }

  async removeTarget(target: string): Promise<boolean> {
    const handle = normalizeTarget(target);
    const index = this.targets.indexOf(handle);
    if (index === -1) {
      return false;
    }
    this.targets.splice(index, 1);
    await this.save(FILES.targets, this.targets);
    return true;
  }

  // Action chain

  getActionChain(): ActionChainStep[] {
    return this.actionChain.map(cloneStep);
  }

  async setActionChain(chain: readonly ActionChainStep[]): Promise<void> {
    this.actionChain = chain.map(cloneStep);
    await this.save(FILES.actionChain, this.actionChain);
    logger.info(`Saved action chain with ${chain.length} step(s)`);
  }

  // Texts

  getTexts(): TextPool {
    return { storyReplies: [...this.texts.storyReplies], directMessages: [...this.texts.directMessages] };
  }

  /**
   * @returns false when the same text is already in the pool
   */
  async addText(type: TextPoolType, text: string): Promise<boolean> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ValidationError('Text must not be empty');
    }
    const pool = this.texts[type];
    if (pool.includes(trimmed)) {
      return false;
    }
    pool.push(trimmed);
    await this.save(FILES.texts, this.texts);
    return true;
  }

  async removeText(type: TextPoolType, index: number): Promise<boolean> {
    const pool = this.texts[type];
    if (!Number.isInteger(index) || index < 0 || index >= pool.length) {
      return false;
    }
    pool.splice(index, 1);
    await this.save(FILES.texts, this.texts);
    return true;
  }

  /**
   * Everything a run needs, as currently stored
   */
  getRunConfig(workersCount: number): AutomationRunConfig {
    return {
      accounts: this.getAccounts(),
      targets: this.getTargets(),
      actionChain: this.getActionChain(),
      texts: this.getTexts(),
      workersCount,
    };
  }

  private async readJson(file: string, fallback: unknown): Promise<unknown> {
    const filePath = path.join(this.dataDir, file);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      if (isFileMissing(error)) {
        return fallback;
      }
      logger.error(`Failed to read ${filePath}:`, error);
      throw error;
    }
  }

  private save(file: string, data: unknown): Promise<void> {
    const content = JSON.stringify(data, null, 2);
    const previous = this.writes.get(file) ?? Promise.resolve();
    // A failed write was already reported to its own caller
    const write = previous.catch(() => undefined).then(() => this.writeFile(file, content));
    this.writes.set(file, write);
    return write;
  }

  private async writeFile(file: string, content: string): Promise<void> {
    const filePath = path.join(this.dataDir, file);
    const tmpPath = `${filePath}.tmp`;
    try {
      await fs.writeFile(tmpPath, content, 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      logger.error(`Failed to write ${filePath}:`, error);
      throw error;
    }
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function cloneStep(step: ActionChainStep): ActionChainStep {
  return structuredClone(step);
}

let dataManager: DataManager | null = null;

export function getDataManager(): DataManager {
  if (!dataManager) {
    dataManager = new DataManager(getSettings().DATA_DIR);
  }
  return dataManager;
}
