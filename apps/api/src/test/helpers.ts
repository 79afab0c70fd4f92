/**
 * Test helpers for the API suites
 * Each app gets its own in-process recycling system
 */

import type { Env, Hono } from 'hono';
import {
  createRecyclingSystem,
  InMemoryAssetClass,
  InMemoryAssetClassDirectory,
  RecyclerEventEmitter,
} from '@recycler/core';
import type { InMemoryAssetClassOptions, RecyclingSystem } from '@recycler/core';
import { createApp } from '../app.js';

export const ADMIN = 'admin-1';
export const CUSTODY = 'custody-vault';
export const ALICE = 'alice';
export const BOB = 'bob';
export const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');

export interface TestApp {
  app: ReturnType<typeof createApp>;
  system: RecyclingSystem;
  directory: InMemoryAssetClassDirectory;
  events: RecyclerEventEmitter;
}

export function createTestApp(): TestApp {
  const directory = new InMemoryAssetClassDirectory();
  const now = () => FIXED_NOW;
  const events = new RecyclerEventEmitter(now);
  const system = createRecyclingSystem({
    config: { adminId: ADMIN, custodyId: CUSTODY, maxPointsPerUnit: 10_000, classes: [] },
    directory,
    events,
    now,
  });

  return { app: createApp(system), system, directory, events };
}

/**
 * Attach an in-memory class and mint the given units
 */
export function attachCollection(
  directory: InMemoryAssetClassDirectory,
  classId: string,
  units: Record<string, string>,
  options?: InMemoryAssetClassOptions
): InMemoryAssetClass {
  const collection = new InMemoryAssetClass(options);
  for (const [unitId, owner] of Object.entries(units)) {
    collection.mint(unitId, owner);
  }
  directory.attach(classId, collection);
  return collection;
}

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  /** Sent as x-actor-id */
  actor?: string;
}

/**
 * Make a request to a Hono app
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {}, actor } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...(actor !== undefined && { 'x-actor-id': actor }),
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const request = new Request(`http://localhost${path}`, init);
  return app.fetch(request);
}
