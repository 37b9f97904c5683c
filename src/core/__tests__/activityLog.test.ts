import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setLogLevel } from '../../utils/logger';
import { ActivityLog } from '../activityLog';

setLogLevel('SILENT');

const withTempDir = async (run: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(join(tmpdir(), 'leadcast-activity-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test('a missing log file reads as empty', async () => {
  await withTempDir(async (dir) => {
    const activity = new ActivityLog(join(dir, 'activity.json'));
    assert.deepEqual(await activity.read(), []);
    assert.deepEqual(await activity.summarize(), { total: 0, byType: {}, last: undefined });
  });
});

test('concurrent records are all appended in call order', async () => {
  await withTempDir(async (dir) => {
    const filePath = join(dir, 'logs', 'activity.json');
    const activity = new ActivityLog(filePath, () => new Date('2026-10-19T09:30:00.000Z'));
    await Promise.all([
      activity.record('post', { platform: 'x' }),
      activity.record('lead_run', { uniqueLeads: 4 }),
      activity.record('post', { platform: 'medium' }),
    ]);

    const stored: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    assert.deepEqual(stored, [
      { type: 'post', timestamp: '2026-10-19T09:30:00.000Z', data: { platform: 'x' } },
      { type: 'lead_run', timestamp: '2026-10-19T09:30:00.000Z', data: { uniqueLeads: 4 } },
      { type: 'post', timestamp: '2026-10-19T09:30:00.000Z', data: { platform: 'medium' } },
    ]);

    const summary = await activity.summarize();
    assert.equal(summary.total, 3);
    assert.deepEqual(summary.byType, { post: 2, lead_run: 1 });
    assert.deepEqual(summary.last?.data, { platform: 'medium' });
  });
});

test('a corrupt log file is reported, not overwritten', async () => {
  await withTempDir(async (dir) => {
    const filePath = join(dir, 'activity.json');
    await writeFile(filePath, '{not json', 'utf8');
    const activity = new ActivityLog(filePath);
    await assert.rejects(activity.record('post', {}), SyntaxError);
    assert.equal(await readFile(filePath, 'utf8'), '{not json');
  });
});
