/**
 * Parse Pool - Off-main-thread HTML parsing
 *
 * Markup is tokenized with htmlparser2 inside worker threads. The worker
 * flattens the DOM into a list of plain objects in document order, and the
 * main thread rebuilds the domhandler graph before wrapping it with cheerio.
 * Neither side recurses, so nesting depth is bounded only by memory.
 *
 * Every task carries an id, so a document always belongs to the body that
 * was submitted for it.
 */

import { createRequire } from 'node:module';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { Worker } from 'node:worker_threads';
import { load } from 'cheerio';
import {
  CDATA,
  Comment,
  Document,
  Element,
  ProcessingInstruction,
  Text,
  type ChildNode,
  type ParentNode,
} from 'domhandler';
import { parseDocument } from 'htmlparser2';
import type { Logger } from 'pino';
import type { ParseExecutor } from '../types/context';
import type { ParsedDocument } from '../types/player';
import { componentLogger } from '../lib/logger';

/**
 * Worker body. Runs as an eval'd CommonJS script, so it only uses `require`.
 */
function workerSource(htmlparser2Path: string): string {
  return `
const { parentPort } = require('node:worker_threads');
const { parseDocument } = require(${JSON.stringify(htmlparser2Path)});

// Pre-order walk with an explicit stack; each entry names its parent by index
function flatten(document) {
  const out = [];
  const stack = [];
  const pushChildren = (children, parent) => {
    for (let i = children.length - 1; i >= 0; i--) stack.push({ node: children[i], parent });
  };
  pushChildren(document.children, -1);

  while (stack.length > 0) {
    const { node, parent } = stack.pop();
    const index = out.length;
    switch (node.type) {
      case 'tag':
      case 'script':
      case 'style':
        out.push({ kind: 'element', parent, name: node.name, attribs: node.attribs });
        pushChildren(node.children, index);
        break;
      case 'text':
        out.push({ kind: 'text', parent, data: node.data });
        break;
      case 'comment':
        out.push({ kind: 'comment', parent, data: node.data });
        break;
      case 'directive':
        out.push({ kind: 'directive', parent, name: node.name, data: node.data });
        break;
      case 'cdata':
        out.push({ kind: 'cdata', parent });
        pushChildren(node.children, index);
        break;
    }
  }
  return out;
}

parentPort.on('message', (task) => {
  try {
    const document = parseDocument(task.body);
    parentPort.postMessage({ id: task.id, ok: true, nodes: flatten(document) });
  } catch (error) {
    parentPort.postMessage({ id: task.id, ok: false, message: String(error && error.message ? error.message : error) });
  }
});
`;
}

// -----------------------------------------------------------------------------
// Rebuilding the DOM on the main thread
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttribs(value: unknown): Record<string, string> {
  const attribs: Record<string, string> = {};
  if (!isRecord(value)) return attribs;

  for (const [name, attr] of Object.entries(value)) {
    if (typeof attr === 'string') {
      attribs[name] = attr;
    }
  }
  return attribs;
}

/**
 * Set parent and sibling links, which node constructors leave empty
 */
function adopt<T extends ParentNode>(parent: T): T {
  const { children } = parent;
  children.forEach((child, index) => {
    child.parent = parent;
    child.prev = children[index - 1] ?? null;
    child.next = children[index + 1] ?? null;
  });
  return parent;
}

/**
 * Build one node without children. Elements and CDATA sections get an empty
 * child list that later entries are appended to.
 */
function toNode(value: Record<string, unknown>): ChildNode | null {
  switch (value.kind) {
    case 'element':
      if (typeof value.name !== 'string') return null;
      return new Element(value.name, toAttribs(value.attribs), []);
    case 'text':
      return typeof value.data === 'string' ? new Text(value.data) : null;
    case 'comment':
      return typeof value.data === 'string' ? new Comment(value.data) : null;
    case 'directive':
      if (typeof value.name !== 'string' || typeof value.data !== 'string') return null;
      return new ProcessingInstruction(value.name, value.data);
    case 'cdata':
      return new CDATA([]);
    default:
      return null;
  }
}

/**
 * Rebuild a document from the flat node list a worker posted back.
 *
 * Entries arrive in document order, each naming its parent by index (-1 for
 * the root), so a parent always precedes its children. Entries that do not
 * have a recognised shape are dropped along with their descendants.
 */
export function rebuildDocument(nodes: unknown): ParsedDocument {
  const document = new Document([]);
  if (!Array.isArray(nodes)) return load(document);

  const parents: ParentNode[] = [document];
  const containers = new Map<number, ParentNode>();

  nodes.forEach((value: unknown, index) => {
    if (!isRecord(value) || typeof value.parent !== 'number') return;

    const parent = value.parent === -1 ? document : containers.get(value.parent);
    const node = parent ? toNode(value) : null;
    if (!parent || !node) return;

    parent.children.push(node);
    if (node instanceof Element || node instanceof CDATA) {
      containers.set(index, node);
      parents.push(node);
    }
  });

  parents.forEach(adopt);
  return load(document);
}

// -----------------------------------------------------------------------------
// Executors
// -----------------------------------------------------------------------------

/**
 * Parses on the calling thread after yielding to the event loop.
 * Useful in tests and where worker threads are unavailable.
 */
export class InlineParseExecutor implements ParseExecutor {
  async parse(body: string): Promise<ParsedDocument> {
    await yieldToEventLoop();
    return load(parseDocument(body));
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Thrown for tasks that could not be completed by a worker
 */
export class ParseWorkerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseWorkerError';
  }
}

interface ParseTask {
  id: number;
  body: string;
  resolve: (document: ParsedDocument) => void;
  reject: (error: Error) => void;
}

interface PoolWorker {
  worker: Worker;
  task: ParseTask | null;
}

export interface WorkerParsePoolOptions {
  /** Number of worker threads, created lazily as load requires */
  size: number;
  logger: Logger;
}

/**
 * WorkerParsePool - fixed-size pool of parse workers with a FIFO queue
 */
export class WorkerParsePool implements ParseExecutor {
  private workers: PoolWorker[] = [];
  private queue: ParseTask[] = [];
  private nextTaskId = 0;
  private closed = false;
  private size: number;
  private logger: Logger;
  private source: string;

  constructor(options: WorkerParsePoolOptions) {
    this.size = Math.max(1, Math.floor(options.size));
    this.logger = componentLogger(options.logger, 'parse-pool');

    const require = createRequire(import.meta.url);
    this.source = workerSource(require.resolve('htmlparser2'));
  }

  /**
   * Submit a body and wait for its document
   */
  parse(body: string): Promise<ParsedDocument> {
    if (this.closed) {
      return Promise.reject(new ParseWorkerError('Parse pool is closed'));
    }

    return new Promise<ParsedDocument>((resolve, reject) => {
      this.queue.push({ id: this.nextTaskId++, body, resolve, reject });
      this.dispatch();
    });
  }

  /**
   * Terminate every worker. Queued and in-flight tasks are rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const error = new ParseWorkerError('Parse pool is closed');
    for (const task of this.queue.splice(0)) {
      task.reject(error);
    }

    const workers = this.workers.splice(0);
    for (const entry of workers) {
      entry.task?.reject(error);
      entry.task = null;
    }
    await Promise.all(workers.map((entry) => entry.worker.terminate()));
  }

  /**
   * Number of live worker threads (for debugging)
   */
  get workerCount(): number {
    return this.workers.length;
  }

  /**
   * Number of tasks waiting for a free worker (for debugging)
   */
  get pendingCount(): number {
    return this.queue.length;
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const entry = this.idleWorker();
      if (!entry) return;

      const task = this.queue.shift();
      if (!task) return;

      entry.task = task;
      entry.worker.postMessage({ id: task.id, body: task.body });
    }
  }

  private idleWorker(): PoolWorker | null {
    const idle = this.workers.find((entry) => entry.task === null);
    if (idle) return idle;

    if (this.workers.length < this.size) {
      return this.spawn();
    }
    return null;
  }

  private spawn(): PoolWorker {
    const entry: PoolWorker = {
      worker: new Worker(this.source, { eval: true }),
      task: null,
    };

    entry.worker.on('message', (message: unknown) => this.handleReply(entry, message));
    entry.worker.on('error', (error) => this.handleFailure(entry, error));
    entry.worker.on('exit', (code) => {
      if (!this.closed && this.workers.includes(entry)) {
        this.handleFailure(entry, new ParseWorkerError(`Parse worker exited with code ${code}`));
      }
    });

    this.workers.push(entry);
    this.logger.debug({ workers: this.workers.length }, 'Spawned parse worker');
    return entry;
  }

  private handleReply(entry: PoolWorker, message: unknown): void {
    const task = entry.task;
    if (!task || !isRecord(message) || message.id !== task.id) {
      this.logger.warn({ expected: task?.id }, 'Discarding unmatched parse worker reply');
      return;
    }

    entry.task = null;
    if (message.ok === true) {
      task.resolve(rebuildDocument(message.nodes));
    } else {
      const reason = typeof message.message === 'string' ? message.message : 'unknown error';
      task.reject(new ParseWorkerError(`Parse failed: ${reason}`));
    }

    this.dispatch();
  }

  /**
   * Reject the worker's task, drop the worker and let the queue spawn a
   * replacement
   */
  private handleFailure(entry: PoolWorker, error: Error): void {
    const index = this.workers.indexOf(entry);
    if (index === -1) return;
    this.workers.splice(index, 1);

    this.logger.error({ err: error }, 'Parse worker failed');
    entry.task?.reject(error);
    entry.task = null;

    entry.worker.terminate().catch((terminateError: unknown) => {
      this.logger.warn({ err: terminateError }, 'Failed to terminate parse worker');
    });

    this.dispatch();
  }
}
