import { ConnectionGovernor } from '../src/services/ConnectionGovernor.js';
import { FetchOrchestrator, jsonTask, textTask } from '../src/services/FetchOrchestrator.js';
import { FakeDocumentFetcher } from './helpers/FakeDocumentFetcher.js';

const HOST = 'meta.example.com';

function urlFor(name: string): string {
  return `https://${HOST}/${name}.json`;
}

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('FetchOrchestrator', () => {
  let governor: ConnectionGovernor;
  let fetcher: FakeDocumentFetcher;
  let orchestrator: FetchOrchestrator;

  beforeEach(() => {
    governor = new ConnectionGovernor({ capacityPerHost: 6, acquireTimeout: 1000 });
    fetcher = new FakeDocumentFetcher();
    orchestrator = new FetchOrchestrator(governor, fetcher, 1000);
  });

  it('should return what finished by the deadline and mark the rest timed out', async () => {
    for (const index of [1, 2, 4, 5]) {
      fetcher.respond(urlFor(`task-${index}`), JSON.stringify({ index }));
    }
    fetcher.hang(urlFor('task-3'));
    const tasks = [1, 2, 3, 4, 5].map(index => jsonTask(`task-${index}`, urlFor(`task-${index}`)));

    const startedAt = Date.now();
    const result = await orchestrator.gather(tasks, 100);

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(result.status).toBe('partial');
    expect(Object.keys(result.outcomes)).toEqual(['task-1', 'task-2', 'task-3', 'task-4', 'task-5']);
    expect(result.outcomes['task-3']).toEqual({ status: 'timedOut' });
    for (const index of [1, 2, 4, 5]) {
      const outcome = result.outcomes[`task-${index}`];
      expect(outcome.status).toBe('fulfilled');
      if (outcome.status === 'fulfilled') {
        expect(outcome.value).toEqual({ index });
      }
    }
  });

  it('should wait out a deadline longer than a timer can hold instead of firing at once', async () => {
    fetcher.respond(urlFor('slow'), JSON.stringify({ ok: true }), 30);

    const result = await orchestrator.gather([jsonTask('slow', urlFor('slow'))], 2 ** 31);

    expect(result.status).toBe('complete');
    expect(result.outcomes['slow']).toMatchObject({ status: 'fulfilled', value: { ok: true } });
  });

  it('should abort the request of a timed-out task and free its slot', async () => {
    fetcher.hang(urlFor('stuck'));

    const result = await orchestrator.gather([jsonTask('stuck', urlFor('stuck'))], 30);
    await tick();

    expect(result.status).toBe('failed');
    expect(fetcher.aborted).toEqual([urlFor('stuck')]);
    expect(governor.stats(HOST).inUse).toBe(0);
  });

  it('should discard results that arrive after the deadline', async () => {
    fetcher.respond(urlFor('fast'), '"fast"');
    fetcher.respondLate(urlFor('slow'), '"slow"', 80);

    const result = await orchestrator.gather([jsonTask('fast', urlFor('fast')), jsonTask('slow', urlFor('slow'))], 20);
    await new Promise(resolve => setTimeout(resolve, 120));

    expect(result.status).toBe('partial');
    expect(result.outcomes.slow).toEqual({ status: 'timedOut' });
    expect(result.outcomes.fast).toMatchObject({ status: 'fulfilled', value: 'fast' });
    expect(governor.stats(HOST).inUse).toBe(0);
  });

  it('should report failed tasks with their error code', async () => {
    fetcher.fail(urlFor('gone'), 404);
    fetcher.fail(urlFor('broken'), 500);

    const result = await orchestrator.gather([jsonTask('gone', urlFor('gone')), jsonTask('broken', urlFor('broken'))]);

    expect(result.status).toBe('failed');
    expect(result.outcomes.gone).toMatchObject({
      status: 'failed',
      code: 'UPSTREAM_HTTP_ERROR',
      message: 'Upstream responded with HTTP 404'
    });
    expect(result.outcomes.broken).toMatchObject({
      status: 'failed',
      code: 'UPSTREAM_HTTP_ERROR',
      message: 'Upstream responded with HTTP 500'
    });
  });

  it('should turn a parse failure into a failed outcome', async () => {
    fetcher.respond(urlFor('bad-json'), '{not json');
    fetcher.respond(urlFor('notes'), 'plain text');

    const result = await orchestrator.gather<unknown>([
      jsonTask('bad-json', urlFor('bad-json')),
      textTask('notes', urlFor('notes'))
    ]);

    expect(result.status).toBe('partial');
    expect(result.outcomes['bad-json']).toMatchObject({ status: 'failed', code: 'TASK_FAILED' });
    expect(result.outcomes.notes).toMatchObject({ status: 'fulfilled', value: 'plain text' });
  });

  it('should be complete when there is nothing to fetch', async () => {
    const result = await orchestrator.gather([]);

    expect(result.status).toBe('complete');
    expect(result.outcomes).toEqual({});
  });

  it('should reject duplicate task ids before fetching anything', async () => {
    await expect(
      orchestrator.gather([jsonTask('a', urlFor('one')), jsonTask('a', urlFor('two'))])
    ).rejects.toThrow('Duplicate orchestrator task id: a');
    expect(fetcher.requested).toEqual([]);
  });

  it('should draw from the shared per-host budget', async () => {
    const narrow = new ConnectionGovernor({ capacityPerHost: 1, acquireTimeout: 1000 });
    const serial = new FetchOrchestrator(narrow, fetcher, 1000);
    for (const name of ['s1', 's2', 's3']) {
      fetcher.respond(urlFor(name), `"${name}"`, 10);
    }

    const result = await serial.gather(['s1', 's2', 's3'].map(name => jsonTask(name, urlFor(name))));

    expect(result.status).toBe('complete');
    expect(fetcher.maxInFlight).toBe(1);
    expect(fetcher.requested).toEqual([urlFor('s1'), urlFor('s2'), urlFor('s3')]);
  });
});
