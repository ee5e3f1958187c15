import { describe, expect, it } from 'vitest';
import { logger } from '../src/utils/logger';
import { ErrorRecovery } from '../src/workers/ErrorRecovery';
import { StubAdapter, createControl, testConfig } from './helpers/fakes';

describe('ErrorRecovery', () => {
  it('re-opens the profile on a settled page', async () => {
    const adapter = new StubAdapter();
    const outcome = await new ErrorRecovery(testConfig, createControl()).recover(adapter, 'alice', logger);

    expect(outcome).toEqual({ recovered: true, reloaded: false, dialogsClosed: 0 });
    expect(adapter.page.reloads).toBe(0);
    expect(adapter.calls).toEqual(['openProfile:alice']);
  });

  it('reloads a stuck page and closes open dialogs', async () => {
    const adapter = new StubAdapter();
    adapter.page.loadStateError = new Error('Timeout 5000ms exceeded');
    adapter.dialogsOpen = 2;

    const outcome = await new ErrorRecovery(testConfig, createControl()).recover(adapter, 'alice', logger);

    expect(outcome).toEqual({ recovered: true, reloaded: true, dialogsClosed: 2 });
    expect(adapter.page.reloads).toBe(1);
  });

  it('fails after the recovery navigation attempts run out', async () => {
    const adapter = new StubAdapter();
    adapter.unreachable.add('alice');

    const outcome = await new ErrorRecovery(testConfig, createControl()).recover(adapter, 'alice', logger);

    expect(outcome).toEqual({ recovered: false, reloaded: false, dialogsClosed: 0, error: 'Navigation timeout' });
    expect(adapter.calls).toEqual(['openProfile:alice', 'openProfile:alice']);
  });
});
