import { MessageChannel, type MessagePort, receiveMessageOnPort, Worker } from 'node:worker_threads';
import { z } from 'zod';
import { TimeoutError } from '../error/timeoutError.js';
import { attemptHeaders } from '../request/headers.js';
import type { RequestSpec } from '../request/types.js';
import { type AttemptOutcome, classifyResponse, type SyncTransport } from './types.js';

/**
 * Runs inside the worker: performs each request with `fetch`, posts the reply on the
 * port, then wakes the blocked caller through the shared flag.
 */
const WORKER_SOURCE = `
const { workerData } = require('node:worker_threads');
const { port, flag } = workerData;

function findCode(error) {
  const seen = new Set();
  let current = error;
  while (current && typeof current === 'object' && !seen.has(current)) {
    if (typeof current.code === 'string') {
      return current.code;
    }
    seen.add(current);
    current = current.cause;
  }
  return null;
}

port.on('message', async ({ id, url, method, headers, body, timeout }) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);
  let reply;
  try {
    const res = await fetch(url, { method, headers, body, signal: controller.signal });
    const bytes = new Uint8Array(await res.arrayBuffer());
    reply = { id, kind: 'response', status: res.status, headers: [...res.headers], body: bytes };
  } catch (error) {
    reply = {
      id,
      kind: controller.signal.aborted ? 'timeout' : 'network',
      message: error instanceof Error ? error.message : String(error),
      code: findCode(error),
    };
  } finally {
    clearTimeout(timer);
  }
  port.postMessage(reply);
  Atomics.store(flag, 0, 1);
  Atomics.notify(flag, 0);
});
`;

const replySchema = z.discriminatedUnion('kind', [
  z.object({
    id: z.number(),
    kind: z.literal('response'),
    status: z.number().int(),
    headers: z.array(z.tuple([z.string(), z.string()])),
    body: z.instanceof(Uint8Array),
  }),
  z.object({
    id: z.number(),
    kind: z.enum(['timeout', 'network']),
    message: z.string(),
    code: z.string().nullable(),
  }),
]);

type WorkerReply = z.infer<typeof replySchema>;

/** Extra time the caller waits for the worker past the request deadline. */
const DEFAULT_GRACE_MS = 1000;

/** Options for {@link WorkerSyncTransport}. */
export interface WorkerSyncTransportOptions {
  /** Extra wait past each deadline before the caller gives up on the worker. */
  graceMs?: number;
}

interface Channel {
  worker: Worker;
  port: MessagePort;
  flag: Int32Array;
}

/**
 * Blocking transport. A single long-lived worker thread owns the connection pool and
 * runs `fetch`; the calling thread sleeps on `Atomics.wait` until the worker replies.
 * The worker starts with the first request.
 */
export class WorkerSyncTransport implements SyncTransport {
  #channel: Channel | null = null;
  #disposed = false;
  #sequence = 0;
  #graceMs: number;

  constructor(opts?: WorkerSyncTransportOptions) {
    this.#graceMs = opts?.graceMs ?? DEFAULT_GRACE_MS;
  }

  execute(spec: RequestSpec, timeout: number): AttemptOutcome {
    if (this.#disposed) {
      return { type: 'transport-failure', reason: 'network', cause: new Error('error transport already disposed') };
    }

    const { port, flag } = this.#open();
    const id = ++this.#sequence;

    Atomics.store(flag, 0, 0);
    port.postMessage({
      id,
      url: spec.url,
      method: spec.method,
      headers: [...attemptHeaders(spec)],
      body: spec.body,
      timeout,
    });

    const deadline = Date.now() + timeout + this.#graceMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return this.#timedOut(timeout);
      }

      Atomics.wait(flag, 0, 0, remaining);
      Atomics.store(flag, 0, 0);

      // Replies of attempts the caller already gave up on are dropped
      for (let received = receiveMessageOnPort(port); received; received = receiveMessageOnPort(port)) {
        const reply = replySchema.safeParse(received.message);
        if (reply.success && reply.data.id === id) {
          return this.#toOutcome(reply.data, timeout);
        }
      }
    }
  }

  /** Closes the channel and terminates the worker, dropping any request it still runs. */
  dispose(): void {
    this.#disposed = true;
    if (!this.#channel) {
      return;
    }

    const { worker, port } = this.#channel;
    this.#channel = null;
    port.close();
    // The exit code is of no use once disposed
    void worker.terminate();
  }

  #open(): Channel {
    if (this.#channel) {
      return this.#channel;
    }

    const { port1, port2 } = new MessageChannel();
    const flag = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { port: port2, flag },
      transferList: [port2],
    });

    worker.unref();
    port1.unref();
    this.#channel = { worker, port: port1, flag };
    return this.#channel;
  }

  #timedOut(timeout: number): AttemptOutcome {
    return {
      type: 'transport-failure',
      reason: 'timeout',
      cause: new TimeoutError(`error request timed out after ${timeout}ms`),
    };
  }

  #toOutcome(reply: WorkerReply, timeout: number): AttemptOutcome {
    switch (reply.kind) {
      case 'response':
        return classifyResponse(reply.status, new Headers(reply.headers), reply.body);
      case 'timeout':
        return this.#timedOut(timeout);
      case 'network':
        return {
          type: 'transport-failure',
          reason: 'network',
          cause: Object.assign(new Error(reply.message), reply.code === null ? {} : { code: reply.code }),
        };
    }
  }
}
