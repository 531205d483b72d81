import { describe, it, expect, beforeEach } from 'vitest';
import { SyncEventEmitter } from '../src/event-emitter';
import { RUN_TRIGGER, SESSION_STATE, SKIP_REASON, SYNC_EVENT } from '../src/enums';
import { createTestLogger } from './helpers';

describe('SyncEventEmitter', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let emitter: SyncEventEmitter;

  beforeEach(() => {
    logger = createTestLogger();
    emitter = new SyncEventEmitter(logger);
  });

  it('should emit and listen to events', () => {
    const received: unknown[] = [];

    emitter.on(SYNC_EVENT.TABLE_SKIPPED, data => {
      received.push(data);
    });

    emitter.emit(SYNC_EVENT.TABLE_SKIPPED, { table: 'venta', reason: SKIP_REASON.NO_PENDING_ROWS });

    expect(received).toEqual([{ table: 'venta', reason: 'no-pending-rows' }]);
  });

  it('should return unsubscribe function', () => {
    let callCount = 0;

    const unsubscribe = emitter.on(SYNC_EVENT.RUN_STARTED, () => {
      callCount++;
    });

    emitter.emit(SYNC_EVENT.RUN_STARTED, { trigger: RUN_TRIGGER.MANUAL, tables: ['producto'] });
    expect(callCount).toBe(1);

    unsubscribe();

    emitter.emit(SYNC_EVENT.RUN_STARTED, { trigger: RUN_TRIGGER.MANUAL, tables: ['producto'] });
    expect(callCount).toBe(1);
    expect(emitter.listenerCount(SYNC_EVENT.RUN_STARTED)).toBe(0);
  });

  it('should keep notifying listeners after one throws', () => {
    const states: SESSION_STATE[] = [];

    emitter.on(SYNC_EVENT.SESSION_STATE_CHANGED, () => {
      throw new Error('listener broke');
    });
    emitter.on(SYNC_EVENT.SESSION_STATE_CHANGED, ({ state }) => {
      states.push(state);
    });

    emitter.emit(SYNC_EVENT.SESSION_STATE_CHANGED, { state: SESSION_STATE.AUTHENTICATED });

    expect(states).toEqual([SESSION_STATE.AUTHENTICATED]);
    expect(logger.error).toHaveBeenCalledWith('Error in event listener for session:state-changed', {
      error: { message: 'listener broke' },
    });
  });

  it('should remove listeners per event or all at once', () => {
    emitter.on(SYNC_EVENT.RUN_SKIPPED, () => undefined);
    emitter.on(SYNC_EVENT.RUN_SKIPPED, () => undefined);
    emitter.on(SYNC_EVENT.TABLE_SYNCED, () => undefined);

    expect(emitter.listenerCount(SYNC_EVENT.RUN_SKIPPED)).toBe(2);

    emitter.removeAllListeners(SYNC_EVENT.RUN_SKIPPED);
    expect(emitter.listenerCount(SYNC_EVENT.RUN_SKIPPED)).toBe(0);
    expect(emitter.listenerCount(SYNC_EVENT.TABLE_SYNCED)).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount(SYNC_EVENT.TABLE_SYNCED)).toBe(0);
  });
});
