// ============================================
// DEADZONE - HTTP API Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';
import { openDatabase, type DatabaseHandle } from '../src/config/database.js';
import { createGameConfig } from '../src/config/game.js';
import { ManualClock, TEST_CONFIG, TEST_WORLD, constantRandom } from './helpers.js';

const JWT_SECRET = 'test-secret-test-secret-test-secret';
const ADMIN_KEY = 'test-admin-key';

describe('HTTP API', () => {
  let app: FastifyInstance;
  let handle: DatabaseHandle;
  let clock: ManualClock;

  beforeEach(async () => {
    handle = openDatabase(':memory:');
    clock = new ManualClock();
    app = await buildApp({
      logger: false,
      database: handle,
      worldDefinition: TEST_WORLD,
      config: createGameConfig(TEST_CONFIG),
      now: clock.now,
      rng: constantRandom(),
      autoStart: false,
      jwtSecret: JWT_SECRET,
      adminKey: ADMIN_KEY,
    });
  });

  afterEach(async () => {
    await app.close();
    handle.sqlite.close();
  });

  async function signUp(name: string, playerClass = 'Soldier'): Promise<{ id: string; token: string }> {
    const response = await app.inject({ method: 'POST', url: '/api/players', payload: { name, playerClass } });
    expect(response.statusCode).toBe(201);
    const body = response.json();
    return { id: body.player.id, token: body.token };
  }

  function command(token: string, verb: string, args: Array<string | number> = []) {
    return app.inject({
      method: 'POST',
      url: '/api/commands',
      headers: { authorization: `Bearer ${token}` },
      payload: { verb, args },
    });
  }

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });
      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('ok');
    });
  });

  describe('players', () => {
    it('should create a character at the spawn region', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/players',
        payload: { name: 'alice', playerClass: 'Soldier' },
      });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.player).toMatchObject({ name: 'alice', health: 110, maxHealth: 110, equippedWeapon: 'knife' });
      expect(body.player.position).toEqual({ regionId: 'camp', buildingId: null, floorIndex: null });
      expect(typeof body.token).toBe('string');
    });

    it('should reject a taken name', async () => {
      await signUp('alice');
      const response = await app.inject({
        method: 'POST',
        url: '/api/players',
        payload: { name: 'alice', playerClass: 'Mechanic' },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().error.code).toBe('NAME_TAKEN');
    });

    it('should validate the request body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/players',
        payload: { name: 'a', playerClass: 'Wizard' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('should require a token for the profile', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/players/me' });
      expect(response.statusCode).toBe(401);
    });

    it('should reject a token signed with another secret', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/players/me',
        headers: { authorization: 'Bearer not-a-real-token' },
      });
      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe('Invalid or expired token');
    });

    it('should return the profile with the starting kit', async () => {
      const { token } = await signUp('alice');

      const response = await app.inject({
        method: 'GET',
        url: '/api/players/me',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        inventory: { bandage: 2, knife: 1, rations: 3 },
        vehicles: [],
        encounter: null,
        construction: [],
      });
    });

    it('should list past encounters', async () => {
      const { token } = await signUp('alice');
      await command(token, 'enter', ['shed', 0]);
      await command(token, 'attack');

      const response = await app.inject({
        method: 'GET',
        url: '/api/players/me/encounters?limit=5',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(200);
      const { encounters } = response.json();
      expect(encounters).toHaveLength(1);
      expect(encounters[0]).toMatchObject({ buildingId: 'shed', floorIndex: 0, state: 'Cleared', decision: 'attack' });
    });

    it('should delete the character', async () => {
      const { token } = await signUp('alice');

      const deleted = await app.inject({
        method: 'DELETE',
        url: '/api/players/me',
        headers: { authorization: `Bearer ${token}` },
      });
      expect(deleted.json()).toEqual({ success: true });

      const status = await command(token, 'status');
      expect(status.statusCode).toBe(404);
    });
  });

  describe('POST /api/commands', () => {
    it('should describe the player and the time of day', async () => {
      const { token } = await signUp('alice');

      const response = await command(token, 'status');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        ok: true,
        verb: 'status',
        message: 'alice the Soldier in Camp: 110/110 HP. Day 1, 06:00 (day)',
      });
    });

    it('should list the verbs when the command is unknown', async () => {
      const { token } = await signUp('alice');

      const response = await command(token, 'dance');

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        ok: false,
        verb: 'dance',
        error: { code: 'VALIDATION_ERROR', message: "Unknown command 'dance'" },
      });
    });

    it('should reject bad arguments', async () => {
      const { token } = await signUp('alice');

      const response = await command(token, 'enter', ['shed', 'upstairs']);

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('should play out a floor from entry to loot', async () => {
      const { token } = await signUp('alice');

      const entered = await command(token, 'enter', ['shed', 0]);
      expect(entered.json().message).toBe('A walker blocks floor 0! Sneak or attack within 10s.');

      const busy = await command(token, 'loot');
      expect(busy.statusCode).toBe(409);
      expect(busy.json().error.code).toBe('ENCOUNTER_IN_PROGRESS');

      const attacked = await command(token, 'attack');
      expect(attacked.json().message).toBe('alice defeated walker in 4 round(s)');

      const looted = await command(token, 'loot');
      expect(looted.json().message).toBe('You found 2 rations, 1 cloth');

      const again = await command(token, 'loot');
      expect(again.statusCode).toBe(409);
      expect(again.json().error.code).toBe('LOOT_COOLDOWN');
    });

    it('should move between connected regions only', async () => {
      const { token } = await signUp('alice');

      const blocked = await command(token, 'move', ['base']);
      expect(blocked.statusCode).toBe(400);
      expect(blocked.json().error.message).toBe('Base is not reachable from here');

      const moved = await command(token, 'move', ['town']);
      expect(moved.json().message).toBe('You arrive in Town.');
    });

    it('should set and clear standing orders', async () => {
      const { token } = await signUp('alice');

      const set = await command(token, 'setmode', ['ambush']);
      expect(set.json()).toMatchObject({ ok: true, message: 'Standing order set: ambush', data: { offlineMode: 'ambush' } });

      const cleared = await command(token, 'setmode', ['none']);
      expect(cleared.json().data).toEqual({ offlineMode: 'none', offlineActionId: null });
    });

    it('should need a radio tower before anyone can broadcast', async () => {
      const alice = await signUp('alice');
      const bob = await signUp('bob');
      await command(alice.token, 'setfreq', ['145.50']);
      await command(bob.token, 'setfreq', ['145.50']);

      const silent = await command(alice.token, 'radio', ['anyone', 'out', 'there']);
      expect(silent.statusCode).toBe(409);
      expect(silent.json().error.code).toBe('NO_RADIO_TOWER');

      await app.engine.world.repos.regions.updateRegion('town', { structures: ['radio_tower'] });
      const heard = await command(alice.token, 'radio', ['anyone', 'out', 'there']);
      expect(heard.json()).toMatchObject({
        ok: true,
        message: 'Broadcast on 145.50 to 1 listener(s)',
        data: { recipients: [bob.id] },
      });
    });

    it('should not heal past full health', async () => {
      const { token } = await signUp('alice');

      const response = await command(token, 'use', ['bandage']);

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('You are already at full health');
    });

    it('should heal with a bandage', async () => {
      const { id, token } = await signUp('alice');
      await app.engine.world.repos.players.updatePlayer(id, { health: 50 });

      const response = await command(token, 'use', ['bandage']);

      expect(response.json()).toMatchObject({ ok: true, message: 'You use the bandage: 65/110 HP' });
    });
  });

  describe('world', () => {
    it('should show regions with head counts', async () => {
      await signUp('alice');

      const response = await app.inject({ method: 'GET', url: '/api/world' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.clock).toMatchObject({ running: false, tick: 0, day: 1, hour: 6, phase: 'day' });
      expect(body.regions.map((r: { id: string; players: number }) => [r.id, r.players])).toEqual([
        ['base', 0],
        ['camp', 1],
        ['town', 0],
      ]);
    });

    it('should show one region with its buildings', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/world/regions/camp' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.region.name).toBe('Camp');
      expect(body.buildings).toHaveLength(1);
      expect(body.buildings[0].floors).toHaveLength(2);
    });

    it('should 404 an unknown region', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/world/regions/moon' });
      expect(response.statusCode).toBe(404);
    });
  });

  describe('admin', () => {
    it('should require the admin key', async () => {
      const missing = await app.inject({ method: 'POST', url: '/api/admin/tick' });
      expect(missing.statusCode).toBe(401);

      const wrong = await app.inject({ method: 'POST', url: '/api/admin/tick', headers: { 'x-admin-key': 'nope' } });
      expect(wrong.statusCode).toBe(403);
    });

    it('should step the clock even while paused', async () => {
      const headers = { 'x-admin-key': ADMIN_KEY };
      const paused = await app.inject({ method: 'POST', url: '/api/admin/pause', headers });
      expect(paused.json().status.paused).toBe(true);

      const tick = await app.inject({ method: 'POST', url: '/api/admin/tick', headers });
      expect(tick.json()).toMatchObject({ success: true, report: { tick: 1 } });
    });

    it('should wipe players on reset', async () => {
      const { token } = await signUp('alice');
      await command(token, 'enter', ['shed', 0]);
      await command(token, 'attack');

      const reset = await app.inject({ method: 'POST', url: '/api/admin/reset', headers: { 'x-admin-key': ADMIN_KEY } });
      expect(reset.json().status).toMatchObject({ tick: 0, queueSize: 0 });

      const region = await app.inject({ method: 'GET', url: '/api/world/regions/camp' });
      const body = region.json();
      expect(body.players).toEqual([]);
      expect(body.region.noise).toBe(0);
      expect(body.buildings[0].floors[0].cleared).toBe(false);
    });
  });
});
