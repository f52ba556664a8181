// ============================================
// DEADZONE - World Clock
// ============================================

import { EventEmitter } from 'events';
import { scaledMs } from '../config/game.js';
import type { DayPhase, PendingAction, PendingActionKind } from '../models/types.js';
import type { PendingActionRow } from '../db/schema/pending-actions.js';
import type { LockKey, LockScope } from './locks.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import type { ZombiePressureSimulator } from './zombie-pressure.simulator.js';
import { gameTimeAt, type WorldState } from './world-state.js';

/**
 * How the clock resolves one kind of pending action.
 */
export interface ActionHandler {
  lockKeys(action: PendingAction): Promise<LockKey[]>;
  resolve(action: PendingAction, scope: LockScope): Promise<unknown>;
}

export type ActionHandlers = Record<PendingActionKind, ActionHandler>;

export interface TickReport {
  tick: number;
  day: number;
  hour: number;
  phase: DayPhase;
  phaseChanged: boolean;
  resolved: number;
  failed: number;
  regionsUpdated: number;
}

export interface ClockStatus {
  running: boolean;
  paused: boolean;
  tick: number;
  day: number;
  hour: number;
  phase: DayPhase;
  queueSize: number;
}

export interface AdvanceOptions {
  // Run even while paused (admin single-step)
  force?: boolean;
}

export class WorldClock extends EventEmitter {
  private running = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<TickReport | null> | null = null;
  private holds = 0;
  private restartAfterHold = false;

  constructor(
    private world: WorldState,
    private queue: PendingActionQueue,
    private handlers: ActionHandlers,
    private pressure: ZombiePressureSimulator
  ) {
    super();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Start ticking. Pending actions survive restarts; their remaining time is
   * measured from the stored due timestamps.
   */
  async start(): Promise<void> {
    if (this.running) return;

    const now = this.world.now();
    const pending = await this.queue.list();
    for (const row of pending) {
      this.world.logger.info(
        { actionId: row.id, kind: row.kind, ownerId: row.ownerId, remainingMs: Math.max(0, row.dueAt - now) },
        'pending action restored'
      );
    }

    this.running = true;
    const interval = Math.max(1, scaledMs(this.world.config, this.world.config.worldTickSeconds));
    this.timer = setInterval(() => {
      this.advance().catch((error: unknown) => {
        this.world.logger.error({ err: error }, 'world tick failed');
      });
    }, interval);

    this.emit('started');
    this.world.logger.info({ intervalMs: interval, pending: pending.length }, 'world clock started');
  }

  /**
   * Stop ticking and wait for a tick in flight to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.settle();
    this.emit('stopped');
    this.world.logger.info('world clock stopped');
  }

  async pause(): Promise<void> {
    await this.world.repos.world.setPaused(true);
    this.emit('paused');
    this.world.logger.info('world clock paused');
  }

  async resume(): Promise<void> {
    await this.world.repos.world.setPaused(false);
    this.emit('resumed');
    this.world.logger.info('world clock resumed');
  }

  /**
   * Run `work` with no tick in progress. The timer is stopped, the tick in
   * flight is awaited and ticks requested meanwhile are skipped. A clock that
   * was running starts again once the last hold ends.
   */
  async hold<T>(work: () => Promise<T>): Promise<T> {
    this.holds += 1;
    try {
      if (this.running) {
        this.restartAfterHold = true;
        await this.stop();
      }
      await this.settle();
      return await work();
    } finally {
      this.holds -= 1;
      if (this.holds === 0 && this.restartAfterHold) {
        this.restartAfterHold = false;
        await this.start();
      }
    }
  }

  /**
   * Run one tick at `now`. Returns null when skipped: another tick is still
   * running, the clock is held, or the world is paused.
   */
  async advance(now: number = this.world.now(), options: AdvanceOptions = {}): Promise<TickReport | null> {
    if (this.inFlight) {
      this.world.logger.debug('tick skipped, previous tick still running');
      return null;
    }
    if (this.holds > 0) {
      this.world.logger.debug('tick skipped, clock on hold');
      return null;
    }

    this.inFlight = this.runTick(now, options);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  async getStatus(): Promise<ClockStatus> {
    const meta = await this.world.repos.world.getMeta();
    const time = gameTimeAt(this.world.config, meta.epoch, this.world.now());
    return {
      running: this.running,
      paused: meta.paused,
      tick: meta.tick,
      day: time.day,
      hour: time.hour,
      phase: time.phase,
      queueSize: await this.queue.size(),
    };
  }

  // ============================================
  // Tick
  // ============================================

  private async runTick(now: number, options: AdvanceOptions): Promise<TickReport | null> {
    const { repos, config, events, logger } = this.world;

    const meta = await repos.world.getMeta();
    if (meta.paused && !options.force) return null;

    const tick = await repos.world.incrementTick();
    const time = gameTimeAt(config, meta.epoch, now);

    // 1. Day phase
    const phaseChanged = time.phase !== meta.phase;
    if (phaseChanged) {
      await repos.world.setPhase(time.phase);
      logger.info({ tick, day: time.day, phase: time.phase }, 'day phase changed');
      events.publish({ type: 'DayPhaseChanged', phase: time.phase, day: time.day, at: now });
    }

    // 2. Due actions, oldest first
    let resolved = 0;
    let failed = 0;
    for (const row of await this.queue.due(now)) {
      if (await this.runAction(row)) {
        resolved += 1;
      } else {
        failed += 1;
      }
    }

    // 3. Zombie pressure
    const regions = await this.pressure.simulate(tick, time.phase === 'night');

    const report: TickReport = {
      tick,
      day: time.day,
      hour: time.hour,
      phase: time.phase,
      phaseChanged,
      resolved,
      failed,
      regionsUpdated: regions.length,
    };
    this.emit('tick', report);
    return report;
  }

  /**
   * Resolve one due action under its locks. Errors are logged and the
   * action is discarded; the drain goes on. Returns false on failure.
   */
  private async runAction(row: PendingActionRow): Promise<boolean> {
    const { locks, logger } = this.world;

    try {
      const preview = this.queue.parse(row);
      const handler = this.handlers[preview.kind];

      await locks.withDynamicLocks(
        () => handler.lockKeys(preview),
        async (scope) => {
          // A command may have cancelled it while we waited for the locks
          const action = await this.queue.claim(row.id);
          if (!action) {
            logger.debug({ actionId: row.id }, 'pending action already cancelled');
            return;
          }
          await handler.resolve(action, scope);
        }
      );
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, actionId: row.id, kind: row.kind }, 'pending action failed');
      await this.discard(row.id);
      this.world.events.publish({ type: 'PendingActionFailed', actionId: row.id, kind: row.kind, reason });
      return false;
    }
  }

  // The tick's own caller reports its failure
  private async settle(): Promise<void> {
    const tick = this.inFlight;
    if (!tick) return;
    try {
      await tick;
    } catch (error) {
      this.world.logger.debug({ err: error }, 'tick in flight ended with an error');
    }
  }

  private async discard(id: number): Promise<void> {
    try {
      await this.queue.cancel(id);
    } catch (error) {
      this.world.logger.error({ err: error, actionId: id }, 'could not discard failed action');
    }
  }
}
