/**
 * =============================================================================
 * THREADED NAVIGATION ENGINE
 * =============================================================================
 *
 * NavigationEngine that forwards every call to a small pool of worker
 * threads, so long engine runs never hold the HTTP event loop.
 *
 * - Threads are started on first use; a call goes to the thread with the
 *   fewest calls in flight
 * - A thread that errors, exits or times out is dropped and every call in
 *   flight on it is rejected; the next call starts a replacement
 * - Timeouts terminate the thread: engine calls have no cancellation point
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { Worker } from 'worker_threads';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { MeshDocument, RouteFeatureCollection, Waypoint } from '../../shared/types/geo.types';
import { EngineRequest, engineResponseSchema, messageId } from './engine-thread.protocol';
import { GREAT_CIRCLE_ENGINE_VERSION, GreatCircleEngineOptions } from './great-circle.engine';
import { NavigationEngine } from './navigation-engine';

export interface ThreadedEngineOptions {
  /** Version of the engine the threads run */
  version: string;
  createWorker: () => Worker;
  /** Number of threads (default 1) */
  size?: number;
  /** Per call; 0 or unset = no limit */
  timeoutMs?: number;
}

interface PendingCall {
  resolve: (result: RouteFeatureCollection) => void;
  reject: (error: Error) => void;
  timeout?: NodeJS.Timeout;
}

interface EngineThread {
  worker: Worker;
  pending: Map<string, PendingCall>;
  retired: boolean;
}

export class ThreadedNavigationEngine implements NavigationEngine {
  readonly version: string;
  private readonly slots: (EngineThread | null)[];
  private readonly timeoutMs: number;

  constructor(private readonly options: ThreadedEngineOptions) {
    this.version = options.version;
    this.slots = Array.from({ length: Math.max(1, options.size ?? 1) }, () => null);
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  computeUnsmoothed(mesh: MeshDocument, waypoints: Waypoint[]): Promise<RouteFeatureCollection> {
    return this.submit({ id: uuidv4(), method: 'computeUnsmoothed', mesh, waypoints });
  }

  smooth(
    mesh: MeshDocument,
    unsmoothed: RouteFeatureCollection,
    waypoints: Waypoint[]
  ): Promise<RouteFeatureCollection> {
    return this.submit({ id: uuidv4(), method: 'smooth', mesh, unsmoothed, waypoints });
  }

  evaluate(mesh: MeshDocument, route: RouteFeatureCollection): Promise<RouteFeatureCollection> {
    return this.submit({ id: uuidv4(), method: 'evaluate', mesh, route });
  }

  /**
   * Terminate every thread; calls in flight are rejected
   */
  async close(): Promise<void> {
    const running = this.slots.filter((thread): thread is EngineThread => thread !== null);
    await Promise.all(running.map(thread => this.retire(thread, new Error('Navigation engine closed'))));
  }

  /** Threads currently started */
  threadCount(): number {
    return this.slots.filter(thread => thread !== null).length;
  }

  private async submit(request: EngineRequest): Promise<RouteFeatureCollection> {
    const thread = this.pickThread();

    return new Promise<RouteFeatureCollection>((resolve, reject) => {
      const call: PendingCall = { resolve, reject };
      if (this.timeoutMs > 0) {
        call.timeout = setTimeout(() => {
          logger.warn(`[ThreadedEngine] ${request.method} exceeded ${this.timeoutMs} ms, terminating its thread`);
          this.retire(thread, new Error(`Navigation engine timed out after ${this.timeoutMs} ms`)).catch(error => {
            logger.error(`[ThreadedEngine] Could not terminate thread: ${errorMessage(error)}`);
          });
        }, this.timeoutMs);
      }
      thread.pending.set(request.id, call);
      thread.worker.postMessage(request);
    });
  }

  private pickThread(): EngineThread {
    let best = 0;
    for (let i = 0; i < this.slots.length; i++) {
      const thread = this.slots[i];
      if (!thread) {
        best = i;
        break;
      }
      const current = this.slots[best];
      if (current && thread.pending.size < current.pending.size) {
        best = i;
      }
    }
    return this.slots[best] ?? this.spawn(best);
  }

  private spawn(slot: number): EngineThread {
    const thread: EngineThread = { worker: this.options.createWorker(), pending: new Map(), retired: false };

    thread.worker.on('message', (message: unknown) => this.settle(thread, message));
    thread.worker.on('error', (error: Error) => {
      logger.error(`[ThreadedEngine] Thread failed: ${error.message}`);
      this.retire(thread, error).catch(terminateError => {
        logger.error(`[ThreadedEngine] Could not terminate thread: ${errorMessage(terminateError)}`);
      });
    });
    thread.worker.on('exit', (code: number) => {
      this.retire(thread, new Error(`Navigation thread exited with code ${code}`)).catch(error => {
        logger.error(`[ThreadedEngine] Could not terminate thread: ${errorMessage(error)}`);
      });
    });

    this.slots[slot] = thread;
    logger.debug(`[ThreadedEngine] Started navigation thread in slot ${slot}`);
    return thread;
  }

  private settle(thread: EngineThread, message: unknown): void {
    const parsed = engineResponseSchema.safeParse(message);
    const id = parsed.success ? parsed.data.id : messageId(message);
    const call = thread.pending.get(id);
    if (!call) {
      logger.warn(`[ThreadedEngine] Dropping reply for unknown call "${id}"`);
      return;
    }

    thread.pending.delete(id);
    clearTimeout(call.timeout);

    if (!parsed.success) {
      call.reject(new Error('Malformed reply from navigation thread'));
    } else if (parsed.data.ok) {
      call.resolve(parsed.data.result);
    } else {
      call.reject(new Error(parsed.data.error));
    }
  }

  private async retire(thread: EngineThread, reason: Error): Promise<void> {
    if (thread.retired) return;
    thread.retired = true;

    const slot = this.slots.indexOf(thread);
    if (slot !== -1) this.slots[slot] = null;

    for (const call of thread.pending.values()) {
      clearTimeout(call.timeout);
      call.reject(reason);
    }
    thread.pending.clear();

    await thread.worker.terminate();
  }
}

/**
 * Pool of threads running the great-circle engine from the build output
 */
export function createGreatCircleThreadEngine(
  engineOptions: GreatCircleEngineOptions,
  pool: { size: number; timeoutMs: number }
): ThreadedNavigationEngine {
  const entry = path.join(__dirname, 'navigation.thread.js');

  return new ThreadedNavigationEngine({
    version: GREAT_CIRCLE_ENGINE_VERSION,
    size: pool.size,
    timeoutMs: pool.timeoutMs,
    createWorker: () => {
      if (!fs.existsSync(entry)) {
        throw new Error(`Navigation thread entry not found at ${entry}; run the build first`);
      }
      return new Worker(entry, { workerData: engineOptions });
    },
  });
}
