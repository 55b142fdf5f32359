/**
 * @fileoverview Unit tests for FileSnapshotCache
 *
 * Tests cover:
 * - TTL validity on the mtime and payload bases
 * - Round trip of jobs, graph and partial markers
 * - Atomic save, invalidation and I/O error mapping
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { FileSnapshotCache, serializeSnapshot } from '../../../cache/snapshotCache';
import type { CacheConfig } from '../../../core/config';
import { CacheIOError } from '../../../core/errors';
import { JobGraph } from '../../../graph/jobGraph';
import type { Snapshot } from '../../../types/snapshot';
import { MemoryFileSystem } from '../mocks/memoryFileSystem';
import { createStubLogger } from '../mocks/silentLogger';

const MINUTE = 60 * 1000;
const CACHE_FILE = 'data/graph.json';

function sampleSnapshot(timestamp: string): Snapshot {
  const graph = new JobGraph();
  graph.addEdge('Extract', 'Load');
  graph.addNode('Report');
  return {
    jobs: [
      { id: '1', name: 'Extract', status: 'success', startTime: '2024-03-01T11:00:00Z' },
      { id: '2', name: 'Load', status: 'failed' },
      { id: '3', name: 'Report', status: 'pending' },
    ],
    graph,
    timestamp,
    partial: false,
    failedJobs: [],
  };
}

suite('FileSnapshotCache', () => {
  let sandbox: sinon.SinonSandbox;
  let nowMs: number;
  let fs: MemoryFileSystem;

  function createCache(overrides: Partial<CacheConfig> = {}): FileSnapshotCache {
    const config: CacheConfig = { file: CACHE_FILE, ttlHours: 1, validityBasis: 'mtime', ...overrides };
    return new FileSnapshotCache(config, { fs, now: () => nowMs, log: createStubLogger() });
  }

  setup(() => {
    sandbox = sinon.createSandbox();
    nowMs = Date.parse('2024-03-01T12:00:00.000Z');
    fs = new MemoryFileSystem(() => nowMs);
  });

  teardown(() => {
    sandbox.restore();
  });

  suite('validity', () => {
    test('is invalid when no snapshot exists', async () => {
      const cache = createCache();

      assert.strictEqual(await cache.isValid(), false);
      assert.deepStrictEqual(await cache.describe(), { exists: false, valid: false });
    });

    test('is valid immediately after save', async () => {
      const cache = createCache();
      await cache.save(sampleSnapshot(new Date(nowMs).toISOString()));

      assert.strictEqual(await cache.isValid(), true);
      assert.deepStrictEqual(await cache.describe(), { exists: true, valid: true, ageMs: 0 });
    });

    test('stays valid just inside the TTL and expires just past it', async () => {
      const cache = createCache({ ttlHours: 1 });
      await cache.save(sampleSnapshot(new Date(nowMs).toISOString()));

      nowMs += 59 * MINUTE;
      assert.strictEqual(await cache.isValid(), true);

      nowMs += 2 * MINUTE;
      assert.strictEqual(await cache.isValid(), false);
      assert.deepStrictEqual(await cache.describe(), { exists: true, valid: false, ageMs: 61 * MINUTE });
    });

    test('is invalid at exactly the TTL', async () => {
      const cache = createCache({ ttlHours: 1 });
      await cache.save(sampleSnapshot(new Date(nowMs).toISOString()));

      nowMs += 60 * MINUTE;

      assert.strictEqual(await cache.isValid(), false);
    });

    test('a zero TTL is never valid', async () => {
      const cache = createCache({ ttlHours: 0 });
      await cache.save(sampleSnapshot(new Date(nowMs).toISOString()));

      assert.strictEqual(await cache.isValid(), false);
    });

    test('maps stat failures other than a missing file to CacheIOError', async () => {
      const cache = createCache();
      sandbox.stub(fs, 'statAsync').rejects(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

      await assert.rejects(cache.isValid(), CacheIOError);
    });

    suite('payload basis', () => {
      test('uses the embedded timestamp instead of the file time', async () => {
        const cache = createCache({ validityBasis: 'payload' });
        const twoHoursAgo = new Date(nowMs - 120 * MINUTE).toISOString();
        fs.put(CACHE_FILE, JSON.stringify(serializeSnapshot(sampleSnapshot(twoHoursAgo))));

        assert.deepStrictEqual(await cache.describe(), { exists: true, valid: false, ageMs: 120 * MINUTE });
      });

      test('treats an unreadable timestamp as no snapshot', async () => {
        const cache = createCache({ validityBasis: 'payload' });
        fs.put(CACHE_FILE, JSON.stringify(serializeSnapshot(sampleSnapshot('yesterday'))));

        assert.deepStrictEqual(await cache.describe(), { exists: false, valid: false });
      });
    });
  });

  suite('load', () => {
    test('returns undefined when no snapshot exists', async () => {
      assert.strictEqual(await createCache().load(), undefined);
    });

    test('round-trips jobs, graph and timestamp', async () => {
      const cache = createCache();
      const original = sampleSnapshot('2024-03-01T12:00:00.000Z');
      await cache.save(original);

      const loaded = await cache.load();

      assert.ok(loaded);
      assert.deepStrictEqual(loaded.jobs, original.jobs);
      assert.deepStrictEqual(loaded.graph.nodes(), ['Extract', 'Load', 'Report']);
      assert.deepStrictEqual(loaded.graph.edges(), [{ source: 'Extract', target: 'Load' }]);
      assert.strictEqual(loaded.timestamp, '2024-03-01T12:00:00.000Z');
      assert.strictEqual(loaded.partial, false);
    });

    test('round-trips the partial marker and failed jobs', async () => {
      const cache = createCache();
      await cache.save({ ...sampleSnapshot('2024-03-01T12:00:00.000Z'), partial: true, failedJobs: ['Load'] });

      const loaded = await cache.load();

      assert.strictEqual(loaded?.partial, true);
      assert.deepStrictEqual(loaded?.failedJobs, ['Load']);
    });

    test('reads files without partial markers as complete', async () => {
      const cache = createCache();
      fs.put(CACHE_FILE, JSON.stringify({
        jobs: [{ id: '1', name: 'A', status: 'success' }],
        graph: { directed: true, multigraph: false, nodes: [{ id: 'A' }], links: [] },
        timestamp: '2024-03-01T12:00:00.000Z',
      }));

      const loaded = await cache.load();

      assert.strictEqual(loaded?.partial, false);
      assert.deepStrictEqual(loaded?.failedJobs, []);
    });

    test('rejects a corrupt file with CacheIOError', async () => {
      const cache = createCache();
      fs.put(CACHE_FILE, '{"jobs": [');

      await assert.rejects(cache.load(), (err: unknown) => err instanceof CacheIOError && err.kind === 'cache-io');
    });

    test('rejects a file with the wrong shape', async () => {
      const cache = createCache();
      fs.put(CACHE_FILE, JSON.stringify({ jobs: [] }));

      await assert.rejects(cache.load(), /unexpected shape: Missing required field 'graph' at \//);
    });
  });

  suite('save', () => {
    test('writes through a temp file and leaves only the target', async () => {
      const cache = createCache();
      const writeSpy = sandbox.spy(fs, 'writeFileAsync');
      const renameSpy = sandbox.spy(fs, 'renameAsync');

      await cache.save(sampleSnapshot('2024-03-01T12:00:00.000Z'));

      const tempFile = writeSpy.firstCall.args[0];
      assert.match(tempFile, /^data\/\.graph\.json\..+\.tmp$/);
      assert.deepStrictEqual(renameSpy.firstCall.args, [tempFile, CACHE_FILE]);
      assert.deepStrictEqual([...fs.files.keys()], [CACHE_FILE]);
      assert.ok(fs.dirs.has('data'));
    });

    test('persists the graph in node-link form', async () => {
      const cache = createCache();
      await cache.save(sampleSnapshot('2024-03-01T12:00:00.000Z'));

      const persisted: unknown = JSON.parse(await fs.readFileAsync(CACHE_FILE));

      assert.deepStrictEqual(persisted, {
        jobs: [
          { id: '1', name: 'Extract', status: 'success', startTime: '2024-03-01T11:00:00Z' },
          { id: '2', name: 'Load', status: 'failed' },
          { id: '3', name: 'Report', status: 'pending' },
        ],
        graph: {
          directed: true,
          multigraph: false,
          nodes: [{ id: 'Extract' }, { id: 'Load' }, { id: 'Report' }],
          links: [{ source: 'Extract', target: 'Load' }],
        },
        timestamp: '2024-03-01T12:00:00.000Z',
        partial: false,
        failedJobs: [],
      });
    });

    test('maps write failures to CacheIOError and removes the temp file', async () => {
      const cache = createCache();
      sandbox.stub(fs, 'renameAsync').rejects(new Error('disk full'));

      await assert.rejects(
        cache.save(sampleSnapshot('2024-03-01T12:00:00.000Z')),
        (err: unknown) => err instanceof CacheIOError && err.message === `Failed to write snapshot cache ${CACHE_FILE}: disk full`
      );
      assert.strictEqual(fs.files.size, 0);
    });
  });

  suite('invalidate', () => {
    test('removes the stored snapshot', async () => {
      const cache = createCache();
      await cache.save(sampleSnapshot('2024-03-01T12:00:00.000Z'));

      await cache.invalidate();

      assert.strictEqual(await cache.isValid(), false);
      assert.strictEqual(await cache.load(), undefined);
    });

    test('is a no-op when nothing is stored', async () => {
      await createCache().invalidate();
    });
  });
});
