import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConsoleService } from './ConsoleService';

describe('ConsoleService', () => {
  beforeEach(() => {
    ConsoleService.clear();
  });

  it('records entries with increasing ids', () => {
    ConsoleService.info('solved');
    ConsoleService.warn('slow');
    ConsoleService.error('failed');
    ConsoleService.log('started');

    const entries = ConsoleService.getEntries();
    expect(entries.map(e => e.id)).toEqual([1, 2, 3, 4]);
    expect(entries.map(e => e.type)).toEqual(['info', 'warning', 'error', 'system']);
    expect(entries.map(e => e.content)).toEqual(['solved', 'slow', 'failed', 'started']);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = ConsoleService.subscribe(listener);

    ConsoleService.info('first');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toHaveLength(1);

    unsubscribe();
    ConsoleService.info('second');
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('keeps the newest entries once the log is full', () => {
    for (let i = 1; i <= 501; i++) {
      ConsoleService.log(`entry ${i}`);
    }
    const entries = ConsoleService.getEntries();
    expect(entries).toHaveLength(400);
    expect(entries[0].content).toBe('entry 102');
    expect(entries[399].content).toBe('entry 501');
  });

  it('restarts ids after clear', () => {
    ConsoleService.info('a');
    ConsoleService.clear();
    ConsoleService.info('b');
    expect(ConsoleService.getEntries()[0].id).toBe(1);
  });
});
