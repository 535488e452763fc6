import { describe, it, expect, vi } from 'vitest';
import { StateEmitter } from '../../src/paginator/state-emitter.js';

describe('StateEmitter', () => {
  it('should notify listeners in subscription order', () => {
    const emitter = new StateEmitter<number>();
    const received: string[] = [];
    emitter.subscribe(state => received.push(`first:${state}`));
    emitter.subscribe(state => received.push(`second:${state}`));

    emitter.emit(1);

    expect(received).toEqual(['first:1', 'second:1']);
    expect(emitter.listenerCount).toBe(2);
  });

  it('should stop notifying after unsubscribe', () => {
    const emitter = new StateEmitter<number>();
    const listener = vi.fn();
    const unsubscribe = emitter.subscribe(listener);

    unsubscribe();
    emitter.emit(1);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount).toBe(0);
  });

  it('should skip a listener removed by an earlier one during emit', () => {
    const emitter = new StateEmitter<number>();
    const later = vi.fn();
    let removeLater: () => void = () => undefined;
    emitter.subscribe(() => removeLater());
    removeLater = emitter.subscribe(later);

    emitter.emit(1);

    expect(later).not.toHaveBeenCalled();
    expect(emitter.listenerCount).toBe(1);
  });

  it('should let the caller see listener errors', () => {
    const emitter = new StateEmitter<number>();
    emitter.subscribe(() => {
      throw new Error('listener failed');
    });

    expect(() => emitter.emit(1)).toThrow('listener failed');
  });

  it('should drop every listener on clear', () => {
    const emitter = new StateEmitter<number>();
    emitter.subscribe(vi.fn());
    emitter.subscribe(vi.fn());

    emitter.clear();

    expect(emitter.listenerCount).toBe(0);
  });
});
