import { describe, it, expect, beforeEach } from 'vitest';
import {
  ADMIN,
  ALICE,
  FIXED_NOW,
  attachCollection,
  createTestApp,
  makeRequest,
  type TestApp,
} from '../../../test/helpers.js';

const REGISTERED_AT = FIXED_NOW.getTime();

describe('Asset class routes', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
    attachCollection(ctx.directory, 'bottles', { 'b-1': ALICE });
  });

  describe('POST /v1/classes', () => {
    it('registers a class for the admin', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ADMIN,
        body: { classId: 'bottles', pointsPerUnit: 10 },
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        class: {
          classId: 'bottles',
          pointsPerUnit: 10,
          active: true,
          status: 'active',
          totalRecycled: 0,
          registeredAt: REGISTERED_AT,
          updatedAt: REGISTERED_AT,
        },
      });
    });

    it('rejects non-admin actors with 403', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ALICE,
        body: { classId: 'bottles', pointsPerUnit: 10 },
      });

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: 'Actor "alice" is not allowed to register',
        code: 'UNAUTHORIZED',
      });
    });

    it('requires the actor header', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        body: { classId: 'bottles', pointsPerUnit: 10 },
      });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: 'x-actor-id header is required' });
    });

    it('returns 400 with issues for an invalid body', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ADMIN,
        body: { classId: 'bottles', pointsPerUnit: 0 },
      });

      expect(response.status).toBe(400);
      const body = await response.json();
      expect(body).toHaveProperty('error', 'Validation failed');
      expect(body).toHaveProperty('issues.0.path', ['pointsPerUnit']);
    });

    it('returns 400 when the rate exceeds the configured maximum', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ADMIN,
        body: { classId: 'bottles', pointsPerUnit: 10_001 },
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Points per unit must not exceed 10000, got 10001',
        code: 'VALIDATION_FAILED',
      });
    });

    it('returns 409 when the class is already active', async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });

      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ADMIN,
        body: { classId: 'bottles', pointsPerUnit: 20 },
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toHaveProperty('code', 'ALREADY_REGISTERED');
    });

    it('returns 422 when the collaborator lacks the ownership capability', async () => {
      ctx.directory.attach('opaque', {
        ownerOf: async () => ALICE,
        transfer: async () => undefined,
        supportsCapability: async () => false,
      });

      const response = await makeRequest(ctx.app, 'POST', '/v1/classes', {
        actor: ADMIN,
        body: { classId: 'opaque', pointsPerUnit: 10 },
      });

      expect(response.status).toBe(422);
      expect(await response.json()).toHaveProperty('code', 'CAPABILITY_MISSING');
    });
  });

  describe('GET /v1/classes', () => {
    it('lists registered classes', async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });

      const response = await makeRequest(ctx.app, 'GET', '/v1/classes');

      expect(response.status).toBe(200);
      const body = await response.json();
      expect(body).toHaveProperty('classes.length', 1);
      expect(body).toHaveProperty('classes.0.classId', 'bottles');
    });

    it('returns one class or 404', async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });

      const found = await makeRequest(ctx.app, 'GET', '/v1/classes/bottles');
      const missing = await makeRequest(ctx.app, 'GET', '/v1/classes/cans');

      expect(found.status).toBe(200);
      expect(await found.json()).toHaveProperty('class.pointsPerUnit', 10);
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'Asset class not found' });
    });

    it('quotes points for a quantity', async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });

      const response = await makeRequest(ctx.app, 'GET', '/v1/classes/bottles/points?quantity=3');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ classId: 'bottles', quantity: 3, points: 30 });
    });

    it('defaults the quote quantity to one', async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });

      const response = await makeRequest(ctx.app, 'GET', '/v1/classes/bottles/points');

      expect(await response.json()).toEqual({ classId: 'bottles', quantity: 1, points: 10 });
    });

    it('returns 404 when quoting an unregistered class', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/classes/cans/points?quantity=2');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: 'Asset class cans is not registered',
        code: 'NOT_REGISTERED',
      });
    });
  });

  describe('class updates', () => {
    beforeEach(async () => {
      await ctx.system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 });
    });

    it('updates the rate', async () => {
      const response = await makeRequest(ctx.app, 'PATCH', '/v1/classes/bottles/rate', {
        actor: ADMIN,
        body: { pointsPerUnit: 25 },
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toHaveProperty('class.pointsPerUnit', 25);
    });

    it('returns 404 when updating an unregistered class', async () => {
      const response = await makeRequest(ctx.app, 'PATCH', '/v1/classes/cans/rate', {
        actor: ADMIN,
        body: { pointsPerUnit: 25 },
      });

      expect(response.status).toBe(404);
    });

    it('toggles the status', async () => {
      const response = await makeRequest(ctx.app, 'PATCH', '/v1/classes/bottles/status', {
        actor: ADMIN,
        body: { active: false },
      });

      expect(response.status).toBe(200);
      const body = await response.json();
      expect(body).toHaveProperty('class.active', false);
      expect(body).toHaveProperty('class.status', 'inactive');
    });

    it('deactivates through DELETE', async () => {
      const response = await makeRequest(ctx.app, 'DELETE', '/v1/classes/bottles', {
        actor: ADMIN,
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toHaveProperty('class.status', 'inactive');
      expect(ctx.system.queries.isAccepted('bottles')).toBe(false);
    });
  });

  it('echoes a request id on every response', async () => {
    const generated = await makeRequest(ctx.app, 'GET', '/v1/classes');
    const forwarded = await makeRequest(ctx.app, 'GET', '/v1/classes', {
      headers: { 'x-request-id': 'req-123' },
    });

    expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    expect(forwarded.headers.get('x-request-id')).toBe('req-123');
  });
});
