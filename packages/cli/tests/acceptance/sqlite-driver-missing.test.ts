import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readdir } from 'node:fs/promises';
import { createWorkspace } from '../support/harness.js';
import type { CliWorkspace } from '../support/harness.js';

vi.doMock('@cadencekit/state-sequelize/sqlite', () => {
  throw new Error("Cannot find package 'better-sqlite3'");
});

describe('cadence CLI without better-sqlite3', () => {
  let ws: CliWorkspace;

  beforeEach(async () => {
    ws = await createWorkspace();
  });

  afterEach(async () => {
    await ws.dispose();
  });

  it('should run on the file backend', async () => {
    const { code } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring']);

    expect(code).toBe(0);
    expect(await readdir(ws.stateDir)).toContain('spring.progress.json');
  });

  it('should exit 1 with a configuration error when the sqlite backend is requested', async () => {
    const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], {
      env: ws.env({ STATE_BACKEND: 'sqlite' }),
    });

    expect(code).toBe(1);
    expect(io.lastErr()).toMatchObject({
      event: 'cli.failed',
      name: 'CampaignConfigError',
      code: 'INVALID_CONFIG',
      message: expect.stringContaining('STATE_BACKEND=sqlite needs the optional better-sqlite3 package'),
    });
  });
});
