import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ObserverRegistry, createObserverRegistry } from './observer-registry.js';
import type { ChangeEvent, RegistryEvent } from './types.js';

describe('ObserverRegistry', () => {
  let registry: ObserverRegistry;
  let a: number;
  let b: number;

  beforeEach(() => {
    registry = createObserverRegistry();
    a = 1;
    b = 1;
  });

  describe('add()', () => {
    it('should return the constructed observer', () => {
      const onChange = vi.fn();
      const observer = registry.add(() => a, { tag: 'a', onChange });

      a = 2;
      expect(observer.update()).toBe(true);
      expect(onChange).toHaveBeenCalledTimes(1);
      expect(registry.get('a')).toBe(observer);
    });

    it("should default the tag to the observer's id", () => {
      const accessor = () => a;
      const first = registry.add(accessor, { onChange: vi.fn() });
      const second = registry.add(accessor, { onChange: vi.fn() });

      expect(registry.size).toBe(2);
      expect(registry.has(first.id)).toBe(true);
      expect(registry.has(second.id)).toBe(true);
    });

    it('should replace an existing entry with the same tag', () => {
      const first = vi.fn();
      const second = vi.fn();
      registry.add(() => a, { tag: 'x', onChange: first });
      const replacement = registry.add(() => a, { tag: 'x', onChange: second });

      a = 2;
      registry.update();

      expect(registry.size).toBe(1);
      expect(registry.get('x')).toBe(replacement);
      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it('should apply registry defaults with per-call overrides', () => {
      const withDefaults = createObserverRegistry({
        defaults: { fireOnFirstSample: true, maxHistoryLength: 2, clock: () => 42 },
      });
      const fired = vi.fn<(event: ChangeEvent<number>) => void>();
      withDefaults.add(() => a, { tag: 'a', onChange: fired });

      const overridden = withDefaults.add(() => b, {
        tag: 'b',
        onChange: vi.fn(),
        fireOnFirstSample: false,
        maxHistoryLength: 0,
      });

      expect(fired).toHaveBeenCalledWith({ value: 1, changeTime: 42, history: [] });
      expect(overridden.maxHistoryLength).toBe(0);
    });

    it('should keep registry defaults for options passed as undefined', () => {
      const withDefaults = createObserverRegistry({ defaults: { maxHistoryLength: 3 } });
      const observer = withDefaults.add(() => a, { onChange: vi.fn(), maxHistoryLength: undefined });

      expect(observer.maxHistoryLength).toBe(3);
    });

    it('should hold observers of different value types', () => {
      let label = 'idle';
      const labels: string[] = [];
      const counts: number[] = [];
      registry.add(() => label, { tag: 'label', onChange: (event) => labels.push(event.value) });
      registry.add(() => a, { tag: 'count', onChange: (event) => counts.push(event.value) });

      label = 'busy';
      a = 5;
      registry.update();

      expect(labels).toEqual(['busy']);
      expect(counts).toEqual([5]);
    });
  });

  describe('update()', () => {
    it('should update only the tagged observer', () => {
      const onA = vi.fn();
      const onB = vi.fn();
      registry.add(() => a, { tag: 'a', onChange: onA });
      registry.add(() => b, { tag: 'b', onChange: onB });

      a = 2;
      b = 2;
      expect(registry.update('a')).toBe(1);

      expect(onA).toHaveBeenCalledTimes(1);
      expect(onB).not.toHaveBeenCalled();
    });

    it('should update every observer without a tag', () => {
      const onA = vi.fn();
      const onB = vi.fn();
      registry.add(() => a, { tag: 'a', onChange: onA });
      registry.add(() => b, { tag: 'b', onChange: onB });

      a = 2;
      b = 2;
      expect(registry.update()).toBe(2);

      expect(onA).toHaveBeenCalledTimes(1);
      expect(onB).toHaveBeenCalledTimes(1);
    });

    it('should ignore unknown tags', () => {
      registry.add(() => a, { tag: 'a', onChange: vi.fn() });

      expect(registry.update('missing')).toBe(0);
    });

    it('should expose updateAll as an alias', () => {
      const onA = vi.fn();
      registry.add(() => a, { tag: 'a', onChange: onA });

      a = 2;
      expect(registry.updateAll('a')).toBe(1);
      a = 3;
      expect(registry.updateAll()).toBe(1);
      expect(onA).toHaveBeenCalledTimes(2);
    });

    it('should propagate observer errors and stop the pass', () => {
      const onB = vi.fn();
      registry.add(() => a, {
        tag: 'a',
        onChange: () => {
          throw new Error('render failed');
        },
      });
      registry.add(() => b, { tag: 'b', onChange: onB });

      a = 2;
      b = 2;
      expect(() => registry.update()).toThrow('render failed');
      expect(onB).not.toHaveBeenCalled();

      expect(registry.update('b')).toBe(1);
      expect(onB).toHaveBeenCalledTimes(1);
    });

    it('should skip observers removed by an earlier callback in the same pass', () => {
      const events: RegistryEvent[] = [];
      const clocked = createObserverRegistry({ defaults: { clock: () => 50 } });
      const onB = vi.fn();
      clocked.add(() => a, { tag: 'a', onChange: () => clocked.remove('b') });
      clocked.add(() => b, { tag: 'b', onChange: onB });
      clocked.events$.subscribe((event) => events.push(event));

      a = 2;
      b = 2;
      expect(clocked.update()).toBe(1);

      expect(onB).not.toHaveBeenCalled();
      expect(events).toEqual([
        { type: 'removed', tag: 'b' },
        { type: 'changed', tag: 'a', value: 2, changeTime: 50 },
      ]);
    });

    it('should skip observers replaced by an earlier callback in the same pass', () => {
      const original = vi.fn();
      const replacement = vi.fn();
      registry.add(() => a, {
        tag: 'a',
        onChange: () => registry.add(() => b, { tag: 'b', onChange: replacement }),
      });
      registry.add(() => b, { tag: 'b', onChange: original });

      a = 2;
      b = 2;
      expect(registry.update()).toBe(1);

      expect(original).not.toHaveBeenCalled();
      expect(replacement).not.toHaveBeenCalled();
    });
  });

  describe('remove()', () => {
    it('should remove a single tag', () => {
      const onA = vi.fn();
      registry.add(() => a, { tag: 'a', onChange: onA });
      registry.add(() => b, { tag: 'b', onChange: vi.fn() });

      registry.remove('a');
      a = 2;

      expect(registry.update('a')).toBe(0);
      expect(onA).not.toHaveBeenCalled();
      expect(registry.tags()).toEqual(['b']);
    });

    it('should ignore unknown tags', () => {
      registry.add(() => a, { tag: 'a', onChange: vi.fn() });

      expect(() => registry.remove('missing')).not.toThrow();
      expect(registry.size).toBe(1);
    });

    it('should clear every entry without a tag', () => {
      registry.add(() => a, { tag: 'a', onChange: vi.fn() });
      registry.add(() => b, { tag: 'b', onChange: vi.fn() });

      registry.remove();

      expect(registry.size).toBe(0);
      expect(registry.update()).toBe(0);
    });
  });

  describe('events$ and stats', () => {
    it('should report additions, changes and removals', () => {
      const events: RegistryEvent[] = [];
      const clocked = createObserverRegistry({ defaults: { clock: () => 50 } });
      clocked.events$.subscribe((event) => events.push(event));

      clocked.add(() => a, { tag: 'a', onChange: vi.fn() });
      clocked.add(() => b, { tag: 'b', onChange: vi.fn() });
      a = 2;
      clocked.update();
      clocked.remove('a');
      clocked.remove();

      expect(events).toEqual([
        { type: 'added', tag: 'a' },
        { type: 'added', tag: 'b' },
        { type: 'changed', tag: 'a', value: 2, changeTime: 50 },
        { type: 'removed', tag: 'a' },
        { type: 'cleared', count: 1 },
      ]);
    });

    it('should count updates and changes', () => {
      registry.add(() => a, { tag: 'a', onChange: vi.fn() });
      registry.add(() => b, { tag: 'b', onChange: vi.fn() });

      registry.update();
      a = 2;
      registry.update();
      registry.update('b');

      expect(registry.getStats()).toEqual({ observerCount: 2, totalUpdates: 5, totalChanges: 1 });
    });

    it('should report a change whose callback threw', () => {
      const events: RegistryEvent[] = [];
      const clocked = createObserverRegistry({ defaults: { clock: () => 50 } });
      clocked.add(() => a, {
        tag: 'a',
        onChange: () => {
          throw new Error('render failed');
        },
      });
      clocked.events$.subscribe((event) => events.push(event));

      a = 2;
      expect(() => clocked.update()).toThrow('render failed');

      expect(events).toEqual([{ type: 'changed', tag: 'a', value: 2, changeTime: 50 }]);
      expect(clocked.getStats()).toEqual({ observerCount: 1, totalUpdates: 1, totalChanges: 1 });
    });

    it('should not report a failed sample', () => {
      const events: RegistryEvent[] = [];
      let broken = false;
      registry.add(
        () => {
          if (broken) throw new Error('unavailable');
          return a;
        },
        { tag: 'a', onChange: vi.fn() }
      );
      registry.events$.subscribe((event) => events.push(event));

      broken = true;
      expect(() => registry.update()).toThrow('unavailable');

      expect(events).toEqual([]);
      expect(registry.getStats().totalChanges).toBe(0);
    });

    it('should complete events$ on dispose', () => {
      const complete = vi.fn();
      registry.events$.subscribe({ complete });
      registry.add(() => a, { tag: 'a', onChange: vi.fn() });

      registry.dispose();

      expect(complete).toHaveBeenCalledTimes(1);
      expect(registry.size).toBe(0);
    });
  });
});
