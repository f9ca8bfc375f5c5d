import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { CombinationLedger } from '../../src/ledger/combination-ledger.js';
import { AuditLog } from '../../src/protocol/confirmation-handler.js';
import { FormProtocolClient } from '../../src/protocol/wager-client.js';
import { BatchRunner, type BatchRunnerOptions } from '../../src/runner/batch-runner.js';
import { OperatorControls } from '../../src/runner/operator-controls.js';
import type { RunResult } from '../../src/runner/types.js';
import { Authenticator } from '../../src/session/authenticator.js';
import { SessionStore } from '../../src/session/session-store.js';
import type { RunState } from '../../src/shared/constants.js';
import {
  FakeSite,
  GAME_URL,
  LOGIN_PATH,
  PASSWORD,
  SITE_ROOT,
  USERNAME,
} from '../helpers/fake-site.js';
import { combinationRows, makeTempDir, removeDir, writeWorkbook } from '../helpers/workbook.js';

interface Harness {
  runner: BatchRunner;
  controls: OperatorControls;
  states: RunState[];
  slept: number[];
  run: (password?: string) => Promise<RunResult>;
}

describe('BatchRunner', () => {
  let dir: string;
  let file: string;
  let site: FakeSite;
  let onSleep: (() => void) | undefined;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = await writeWorkbook(join(dir, 'combinations.xlsx'), combinationRows(12));
    site = new FakeSite();
    onSleep = undefined;
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function harness(delaySeconds = 0, options: BatchRunnerOptions = {}): Harness {
    const store = new SessionStore(join(dir, 'session.json'));
    const authenticator = new Authenticator(store, site, {
      siteRootUrl: SITE_ROOT,
      loginPath: LOGIN_PATH,
      retryBaseDelayMs: 1,
    });
    const auditLog = new AuditLog(join(dir, 'audit.html'));
    const controls = new OperatorControls({ minSeconds: delaySeconds, maxSeconds: delaySeconds });
    const slept: number[] = [];
    const runner = new BatchRunner(
      {
        authenticator,
        sessionStore: store,
        createPlacer: (session, gameUrl) => new FormProtocolClient(session, gameUrl, { auditLog }),
        controls,
        pacing: controls,
        sink: controls,
      },
      {
        pausePollMs: 5_000,
        errorLogDir: dir,
        sleep: async (ms) => {
          slept.push(ms);
          onSleep?.();
        },
        ...options,
      },
    );
    const states: RunState[] = [];
    runner.on('run:state', (state) => states.push(state));

    return {
      runner,
      controls,
      states,
      slept,
      run: (password = PASSWORD) =>
        runner.run({
          credentials: { username: USERNAME, password, gameUrl: GAME_URL },
          spreadsheetPath: file,
        }),
    };
  }

  it('places every pending batch and reports progress after each commit', async () => {
    file = await writeWorkbook(join(dir, 'combinations.xlsx'), combinationRows(13));
    const h = harness();
    const progress: Array<[number, number]> = [];
    const processed: number[] = [];
    h.controls.on('progress', (p) => progress.push([p.total, p.completed]));
    h.controls.on('processed', (n) => processed.push(n));

    const result = await h.run();

    expect(result).toMatchObject({
      runId: h.runner.runId,
      outcome: 'completed',
      progress: { total: 13, completed: 13 },
      processed: 13,
    });
    expect(result.error).toBeUndefined();
    expect(progress).toEqual([[13, 6], [13, 12], [13, 13]]);
    expect(processed).toEqual([6, 12, 13]);
    expect(site.submissions).toHaveLength(3);
    expect(h.states).toEqual(['authenticating', 'running', 'completed']);
    expect(h.runner.currentState).toBe('completed');
  });

  it('sleeps the inter-batch delay in poll-sized slices, skipping it after the last batch', async () => {
    const h = harness(12);

    await h.run();

    expect(h.slept).toEqual([5_000, 5_000, 2_000]);
  });

  it('stops while paused without placing another batch', async () => {
    const h = harness();
    h.controls.once('progress', () => h.controls.pause());
    onSleep = () => h.controls.stop();

    const result = await h.run();

    expect(result).toMatchObject({
      outcome: 'stopped',
      progress: { total: 12, completed: 6 },
      processed: 6,
    });
    expect(result.error).toBeUndefined();
    expect(site.submissions).toHaveLength(1);
    expect(h.slept).toEqual([5_000]);
    expect(h.states).toEqual(['authenticating', 'running', 'paused', 'stopped']);

    const reloaded = await CombinationLedger.load(file);
    expect(reloaded.status()).toEqual({ completed: 6, total: 12 });
  });

  it('completes when stop arrives while the final batch is being placed', async () => {
    const h = harness();
    h.controls.on('progress', (p) => {
      if (p.completed === p.total) h.controls.stop();
    });

    const result = await h.run();

    expect(result).toMatchObject({
      outcome: 'completed',
      progress: { total: 12, completed: 12 },
      processed: 12,
    });
    expect(h.states).toEqual(['authenticating', 'running', 'completed']);
  });

  it('resumes after a pause when play is pressed', async () => {
    const h = harness();
    h.controls.once('progress', () => h.controls.pause());
    onSleep = () => h.controls.play();

    const result = await h.run();

    expect(result.outcome).toBe('completed');
    expect(result.processed).toBe(12);
    expect(h.states).toEqual(['authenticating', 'running', 'paused', 'running', 'completed']);
  });

  it('cuts the delay short at the next slice when stop is requested', async () => {
    const h = harness(12);
    onSleep = () => h.controls.stop();

    const result = await h.run();

    expect(result.outcome).toBe('stopped');
    expect(result.processed).toBe(6);
    expect(h.slept).toEqual([5_000]);
    expect(site.submissions).toHaveLength(1);
  });

  it('fails on a protocol error without committing the batch and saves the error log', async () => {
    site.price = '1.25';
    const h = harness();

    const result = await h.run();

    expect(result).toMatchObject({
      outcome: 'failed',
      error: 'Bet price is higher than 1.2 | 1.25',
      errorCode: 'BET_PRICE_HIGHER',
      processed: 0,
      progress: { total: 12, completed: 0 },
    });
    expect(h.states).toEqual(['authenticating', 'running', 'failed']);

    const logs = (await readdir(dir)).filter((name) => name.startsWith('error_log-'));
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatch(/^error_log-\d+\.txt$/);
    expect(result.errorLogPath).toBe(join(dir, logs[0] ?? ''));
    const transcript = await readFile(result.errorLogPath ?? '', 'utf8');
    expect(transcript).toContain('[ERROR] Run failed: Bet price is higher than 1.2 | 1.25');

    const reloaded = await CombinationLedger.load(file);
    expect(reloaded.status()).toEqual({ completed: 0, total: 12 });
  });

  it('fails before any batch when authentication is rejected', async () => {
    const h = harness();

    const result = await h.run('wrong-secret');

    expect(result).toMatchObject({
      outcome: 'failed',
      errorCode: 'AUTHENTICATION_FAILED',
      error: 'Invalid username or password',
    });
    expect(site.submissions).toHaveLength(0);
    expect(h.states).toEqual(['authenticating', 'failed']);
  });

  it('fails on an unusable spreadsheet without logging in', async () => {
    file = join(dir, 'missing.xlsx');
    const h = harness();

    const result = await h.run();

    expect(result).toMatchObject({
      outcome: 'failed',
      errorCode: 'INVALID_INPUT',
      progress: { total: 0, completed: 0 },
    });
    expect(site.loginAttempts).toBe(0);
    expect(h.states).toEqual(['failed']);
  });

  it('fails the run when the login expires mid-run', async () => {
    // Load 1 is the liveness probe, load 2 the first batch.
    site.expireOnGameLoad = 3;
    const h = harness();

    const result = await h.run();

    expect(result).toMatchObject({ outcome: 'failed', errorCode: 'SESSION_EXPIRED', processed: 6 });
    expect(site.loginAttempts).toBe(1);
  });

  it('logs in again and retries the same batch when re-authentication is enabled', async () => {
    site.expireOnGameLoad = 3;
    const h = harness(0, { reauthOnSessionExpiry: true });

    const result = await h.run();

    expect(result).toMatchObject({ outcome: 'completed', processed: 12 });
    expect(site.loginAttempts).toBe(2);
    expect(site.submissions).toHaveLength(2);
    expect(h.states).toEqual(['authenticating', 'running', 'authenticating', 'running', 'completed']);
  });

  it('emits the finished event exactly once and refuses a second start', async () => {
    const h = harness();
    const finished: RunResult[] = [];
    h.runner.on('run:finished', (result) => finished.push(result));

    const result = await h.run();

    expect(finished).toEqual([result]);
    expect(h.runner.result).toBe(result);
    await expect(h.run()).rejects.toThrow(/has already been started/);
  });
});
