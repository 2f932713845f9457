/**
 * Tests for the parse executors and DOM rebuild
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import type { Worker } from 'node:worker_threads';
import {
  InlineParseExecutor,
  ParseWorkerError,
  WorkerParsePool,
  rebuildDocument,
} from './parse-pool';
import { createCapturingLogger, page } from '../test-setup';

// Real workers, recorded so a test can kill one mid-task
const spawned = vi.hoisted(() => {
  const workers: Worker[] = [];
  return workers;
});

vi.mock('node:worker_threads', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:worker_threads')>();
  class RecordedWorker extends actual.Worker {
    constructor(...args: ConstructorParameters<typeof actual.Worker>) {
      super(...args);
      spawned.push(this);
    }
  }
  return { ...actual, Worker: RecordedWorker };
});

describe('rebuildDocument', () => {
  it('should rebuild a queryable document from flattened nodes', () => {
    const $ = rebuildDocument([
      { kind: 'element', parent: -1, name: 'html', attribs: {} },
      { kind: 'element', parent: 0, name: 'body', attribs: {} },
      { kind: 'element', parent: 1, name: 'div', attribs: { class: 'stat', 'data-hero': 'mercy' } },
      { kind: 'text', parent: 2, data: '42' },
      { kind: 'comment', parent: 1, data: 'footer' },
      { kind: 'element', parent: 1, name: 'span', attribs: {} },
    ]);

    expect($('div.stat').text()).toBe('42');
    expect($('div.stat').attr('data-hero')).toBe('mercy');
    expect($('div.stat').parent().is('body')).toBe(true);
    expect($('div.stat').next().is('span')).toBe(true);
  });

  it('should drop nodes with an unrecognised shape', () => {
    const $ = rebuildDocument([
      { kind: 'element', parent: -1, name: 'p', attribs: { id: 7 } },
      { kind: 'text', parent: 0, data: 'ok' },
      { kind: 'bogus', parent: -1 },
      null,
      'text',
      { kind: 'text', data: 'orphan' },
    ]);

    expect($('p').length).toBe(1);
    expect($('p').text()).toBe('ok');
    expect($('p').attr('id')).toBeUndefined();
    expect($.root().children().length).toBe(1);
  });

  it('should drop the descendants of a dropped node', () => {
    const $ = rebuildDocument([
      { kind: 'element', parent: -1, attribs: {} },
      { kind: 'element', parent: 0, name: 'span', attribs: {} },
      { kind: 'element', parent: -1, name: 'p', attribs: {} },
    ]);

    expect($('span').length).toBe(0);
    expect($('p').length).toBe(1);
  });

  it('should ignore parent indices that point forward', () => {
    const $ = rebuildDocument([
      { kind: 'text', parent: 1, data: 'early' },
      { kind: 'element', parent: -1, name: 'p', attribs: {} },
    ]);

    expect($('p').text()).toBe('');
  });

  it('should return an empty document for non-array input', () => {
    const $ = rebuildDocument(undefined);

    expect($.root().children().length).toBe(0);
  });
});

describe('InlineParseExecutor', () => {
  it('should parse markup into a queryable document', async () => {
    const $ = await new InlineParseExecutor().parse(page('Foo-1234', '<h1 class="name">Foo</h1>'));

    expect($('title').text()).toBe('Foo-1234');
    expect($('h1.name').text()).toBe('Foo');
  });

  it('should build a best-effort tree from malformed markup', async () => {
    const $ = await new InlineParseExecutor().parse('<div><p>unclosed<span>deep</div>');

    expect($('span').text()).toBe('deep');
  });
});

describe('WorkerParsePool', () => {
  let pool: WorkerParsePool | null = null;

  afterEach(async () => {
    await pool?.close();
    pool = null;
  });

  it('should parse in a worker thread', async () => {
    pool = new WorkerParsePool({ size: 1, logger: createCapturingLogger().logger });

    const $ = await pool.parse(page('Worker Page', '<ul><li>a</li><li>b</li></ul>'));

    expect($('title').text()).toBe('Worker Page');
    expect($('li').map((_, el) => $(el).text()).get()).toEqual(['a', 'b']);
    expect(pool.workerCount).toBe(1);
  });

  it('should return each document for the body that was submitted', async () => {
    const active = new WorkerParsePool({ size: 2, logger: createCapturingLogger().logger });
    pool = active;
    const titles = ['eu', 'us', 'kr', 'eu-2', 'us-2'];

    const documents = await Promise.all(titles.map((title) => active.parse(page(title))));

    expect(documents.map(($) => $('title').text())).toEqual(titles);
    expect(active.workerCount).toBe(2);
  });

  it('should parse deeply nested markup', async () => {
    pool = new WorkerParsePool({ size: 1, logger: createCapturingLogger().logger });

    const $ = await pool.parse(`${'<div>'.repeat(20000)}x`);

    expect($('div').length).toBe(20000);
    expect($('div').last().text()).toBe('x');
  });

  it('should reject the task of a crashed worker and spawn a replacement', async () => {
    const active = new WorkerParsePool({ size: 1, logger: createCapturingLogger().logger });
    pool = active;
    const spawnedBefore = spawned.length;

    const doomed = active.parse(page('doomed'));
    const busy = spawned.at(-1);
    if (!busy || spawned.length !== spawnedBefore + 1) {
      throw new Error('expected the task to spawn a worker');
    }

    const failure = expect(doomed).rejects.toThrow(ParseWorkerError);
    await busy.terminate();
    await failure;
    expect(active.workerCount).toBe(0);

    const $ = await active.parse(page('after crash'));

    expect($('title').text()).toBe('after crash');
    expect(spawned.length).toBe(spawnedBefore + 2);
    expect(active.workerCount).toBe(1);
  });

  it('should not spawn workers until a task arrives', () => {
    pool = new WorkerParsePool({ size: 4, logger: createCapturingLogger().logger });

    expect(pool.workerCount).toBe(0);
  });

  it('should reject new tasks after close', async () => {
    pool = new WorkerParsePool({ size: 1, logger: createCapturingLogger().logger });
    await pool.close();

    await expect(pool.parse(page('late'))).rejects.toThrow(ParseWorkerError);
  });

  it('should reject queued tasks when closed', async () => {
    pool = new WorkerParsePool({ size: 1, logger: createCapturingLogger().logger });

    const first = pool.parse(page('first'));
    const second = pool.parse(page('second'));
    expect(pool.pendingCount).toBe(1);

    const rejections = Promise.all([
      expect(first).rejects.toThrow('Parse pool is closed'),
      expect(second).rejects.toThrow('Parse pool is closed'),
    ]);
    await pool.close();

    await rejections;
  });
});
