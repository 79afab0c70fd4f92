/**
 * Exchange Guard
 *
 * Serializes top-level mutating operations and rejects re-entrant calls.
 * The async context (AsyncLocalStorage) identifies the caller: a call issued
 * from inside a running operation, e.g. by a collaborator during its disposal
 * call, sees that operation's frame and fails with ReentrancyError instead of
 * queueing behind itself.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ReentrancyError } from '../errors.js';

interface GuardFrame {
  operation: string;
  parent: GuardFrame | null;
  active: boolean;
  /** Whether nest() may open item frames under this frame */
  acceptsItems: boolean;
  openChild: GuardFrame | null;
}

export interface GuardRunOptions {
  /** Let the task open item frames through nest() */
  acceptsItems?: boolean;
}

const noop = () => undefined;

export class ExchangeGuard {
  private readonly frames = new AsyncLocalStorage<GuardFrame>();
  private queue: Promise<void> = Promise.resolve();

  /**
   * Run a top-level operation once every earlier operation has settled
   */
  async run<T>(
    operation: string,
    task: () => Promise<T>,
    options: GuardRunOptions = {}
  ): Promise<T> {
    const blocking = this.activeOperation();
    if (blocking) {
      throw new ReentrancyError(operation, blocking);
    }

    const acceptsItems = options.acceptsItems ?? false;
    const turn = this.queue.then(() => this.enter(operation, null, acceptsItems, task));
    this.queue = turn.then(noop, noop);
    return turn;
  }

  /**
   * Run a sub-operation of the current top-level operation in its own frame.
   * The top-level operation must have been started with acceptsItems, and
   * only one sub-operation per top-level operation may be open at a time.
   */
  async nest<T>(operation: string, task: () => Promise<T>): Promise<T> {
    let root = this.frames.getStore() ?? null;
    while (root?.parent) {
      root = root.parent;
    }
    if (!root || !root.active) {
      throw new Error(`${operation} must run inside a guarded operation`);
    }
    if (root.openChild?.active) {
      throw new ReentrancyError(operation, root.openChild.operation);
    }
    if (!root.acceptsItems) {
      throw new ReentrancyError(operation, root.operation);
    }
    return this.enter(operation, root, false, task);
  }

  /**
   * Name of the operation running in the caller's context, if any
   */
  activeOperation(): string | null {
    let frame = this.frames.getStore() ?? null;
    while (frame) {
      if (frame.active) {
        return frame.operation;
      }
      frame = frame.parent;
    }
    return null;
  }

  private async enter<T>(
    operation: string,
    parent: GuardFrame | null,
    acceptsItems: boolean,
    task: () => Promise<T>
  ): Promise<T> {
    const frame: GuardFrame = { operation, parent, active: true, acceptsItems, openChild: null };
    if (parent) {
      parent.openChild = frame;
    }

    try {
      return await this.frames.run(frame, task);
    } finally {
      frame.active = false;
      if (parent && parent.openChild === frame) {
        parent.openChild = null;
      }
    }
  }
}
