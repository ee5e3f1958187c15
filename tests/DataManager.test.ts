import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DataManager } from '../src/services/DataManager';
import { DuplicateEntryError, ValidationError } from '../src/utils/errors';

describe('DataManager', () => {
  let dataDir: string;
  let manager: DataManager;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'data-manager-'));
    manager = new DataManager(dataDir);
    await manager.load();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function reload(): Promise<DataManager> {
    const fresh = new DataManager(dataDir);
    await fresh.load();
    return fresh;
  }

  it('starts empty without files', () => {
    expect(manager.getAccounts()).toEqual([]);
    expect(manager.getTargets()).toEqual([]);
    expect(manager.getActionChain()).toEqual([]);
    expect(manager.getTexts()).toEqual({ storyReplies: [], directMessages: [] });
  });

  describe('accounts', () => {
    it('adds and persists an account', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret', proxy: '10.0.0.1:8080' });

      const [account] = (await reload()).getAccounts();
      expect(account.username).toBe('alice');
      expect(account.proxy).toBe('10.0.0.1:8080');
      expect(account.status).toBe('active');
      expect(account.totalActions).toBe(0);
    });

    it('rejects duplicates', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret' });
      await expect(manager.addAccount({ username: 'alice', password: 'test-secret' })).rejects.toBeInstanceOf(
        DuplicateEntryError
      );
    });

    it('rejects invalid input with the reasons', async () => {
      const attempt = manager.addAccount({ username: 'bad name', password: 'test-secret' });
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({ details: ['Username has an invalid format'] });
    });

    it('accumulates run totals', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret' });
      await manager.updateAccountStats('alice', 4, 75);
      await manager.updateAccountStats('alice', 2, 50);

      const [account] = (await reload()).getAccounts();
      expect(account.totalActions).toBe(6);
      expect(account.successRate).toBe(50);
      expect(account.lastUsed).toBeDefined();
    });

    it('keeps both updates when two workers report at once', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret' });
      await manager.addAccount({ username: 'bob', password: 'test-secret' });

      for (let round = 0; round < 5; round++) {
        const outcomes = await Promise.allSettled([
          manager.updateAccountStats('alice', 1, 100),
          manager.updateAccountStats('bob', 2, 50),
        ]);
        expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'fulfilled']);
      }

      const accounts = (await reload()).getAccounts();
      expect(accounts.map((account) => [account.username, account.totalActions])).toEqual([
        ['alice', 5],
        ['bob', 10],
      ]);
    });

    it('filters disabled accounts out of the active list', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret' });
      await manager.addAccount({ username: 'bob', password: 'test-secret' });
      await manager.setAccountStatus('bob', 'disabled');

      expect(manager.getActiveAccounts().map((account) => account.username)).toEqual(['alice']);
    });

    it('removes an account', async () => {
      await manager.addAccount({ username: 'alice', password: 'test-secret' });
      expect(await manager.removeAccount('alice')).toBe(true);
      expect(await manager.removeAccount('alice')).toBe(false);
    });
  });

  describe('targets', () => {
    it('normalizes and deduplicates handles', async () => {
      expect(await manager.addTarget('@alice')).toBe(true);
      expect(await manager.addTarget('alice')).toBe(false);
      await expect(manager.addTarget('not a handle')).rejects.toBeInstanceOf(ValidationError);
      expect(manager.getTargets()).toEqual(['alice']);
    });

    it('bulk adds only new valid handles', async () => {
      await manager.addTarget('alice');
      const added = await manager.bulkAddTargets(['alice', '@bob', ' carol ', 'bad handle', '', 'bob']);

      expect(added).toBe(2);
      expect((await reload()).getTargets()).toEqual(['alice', 'bob', 'carol']);
    });

    it('removes a target given with an @', async () => {
      await manager.addTarget('alice');
      expect(await manager.removeTarget('@alice')).toBe(true);
      expect(manager.getTargets()).toEqual([]);
    });
  });

  describe('action chain', () => {
    it('round-trips through the file', async () => {
      await manager.setActionChain([
        { type: 'view_stories', name: 'Watch', enabled: true, settings: { count: 3 } },
        { type: 'follow', name: 'follow', enabled: false },
      ]);

      expect((await reload()).getActionChain()).toEqual([
        { type: 'view_stories', name: 'Watch', enabled: true, settings: { count: 3 } },
        { type: 'follow', name: 'follow', enabled: false },
      ]);
    });

    it('drops steps of unknown type on load', async () => {
      await fs.writeFile(
        path.join(dataDir, 'action_chain.json'),
        JSON.stringify([{ type: 'comment' }, { type: 'like_posts', settings: { count: 1 } }])
      );

      expect((await reload()).getActionChain()).toEqual([
        { type: 'like_posts', name: 'like_posts', enabled: true, settings: { count: 1 } },
      ]);
    });

    it('hands out copies', async () => {
      await manager.setActionChain([{ type: 'like_posts', name: 'like', enabled: true, settings: { count: 1 } }]);
      const chain = manager.getActionChain();
      chain[0].enabled = false;

      expect(manager.getActionChain()[0].enabled).toBe(true);
    });
  });

  describe('texts', () => {
    it('adds trimmed texts once and removes by index', async () => {
      expect(await manager.addText('storyReplies', '  Nice shot ')).toBe(true);
      expect(await manager.addText('storyReplies', 'Nice shot')).toBe(false);
      await manager.addText('directMessages', 'Hello there');

      expect((await reload()).getTexts()).toEqual({ storyReplies: ['Nice shot'], directMessages: ['Hello there'] });
      expect(await manager.removeText('storyReplies', 3)).toBe(false);
      expect(await manager.removeText('storyReplies', 0)).toBe(true);
      expect(manager.getTexts().storyReplies).toEqual([]);
    });

    it('rejects blank texts', async () => {
      await expect(manager.addText('directMessages', '   ')).rejects.toThrow('Text must not be empty');
    });
  });

  it('fails loudly on a malformed file', async () => {
    await fs.writeFile(path.join(dataDir, 'targets.json'), '{not json');
    await expect(reload()).rejects.toThrow();
  });
});
