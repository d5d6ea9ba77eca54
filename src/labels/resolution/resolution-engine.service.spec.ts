import { Logger } from '@nestjs/common';
import {
  LabelWriteConflictError,
  StoreUnavailableError,
} from '../label.errors';
import { Label, LabelIdentifier } from '../label.types';
import { InMemoryLabelStore } from '../store/in-memory-label.store';
import { MathRandomSource, RandomSource } from './random-source';
import {
  candidateTuples,
  ResolutionEngine,
} from './resolution-engine.service';

class SequenceRandomSource implements RandomSource {
  private position = 0;

  constructor(private readonly values: number[]) {}

  nextInt(): number {
    const value = this.values[this.position % this.values.length];
    this.position++;
    return value;
  }
}

describe('candidateTuples', () => {
  it('orders tuples from most to least specific', () => {
    expect(
      candidateTuples({
        locale: 'en',
        connectorType: 'messenger',
        interfaceType: 'voice',
      }),
    ).toEqual([
      { locale: 'en', connectorType: 'messenger', interfaceType: 'voice' },
      { locale: 'en', connectorType: 'messenger' },
      { locale: 'en', interfaceType: 'voice' },
      { locale: 'en' },
    ]);
  });

  it('drops duplicates when dimensions are absent', () => {
    expect(candidateTuples({ locale: 'en' })).toEqual([
      { locale: 'en', connectorType: undefined, interfaceType: undefined },
    ]);
  });
});

describe('ResolutionEngine', () => {
  const id: LabelIdentifier = { namespace: 'ns', key: 'k' };
  let store: InMemoryLabelStore;
  let engine: ResolutionEngine;

  const seed = async (label: Partial<Label> = {}) =>
    store.upsertIfAbsent({
      identifier: id,
      defaultLocale: 'en',
      defaultText: 'Hello',
      variants: [{ locale: 'en', alternatives: ['Hello'], validated: false }],
      ...label,
    });

  beforeEach(() => {
    store = new InMemoryLabelStore();
    engine = new ResolutionEngine(store, new MathRandomSource());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('first use', () => {
    it('creates the label from the default text', async () => {
      const resolved = await engine.resolve(id, 'Hello {0}', { locale: 'fr' });

      expect(resolved).toEqual({
        pattern: 'Hello {0}',
        variant: { locale: 'fr', alternatives: ['Hello {0}'], validated: false },
        freshlyCreated: true,
        validated: false,
      });
      expect(await store.getLabel(id)).toEqual({
        identifier: id,
        defaultLocale: 'fr',
        defaultText: 'Hello {0}',
        variants: [
          { locale: 'fr', alternatives: ['Hello {0}'], validated: false },
        ],
      });
    });

    it('reports later lookups as existing', async () => {
      await engine.resolve(id, 'Hello', { locale: 'en' });
      const second = await engine.resolve(id, 'Hello', { locale: 'en' });
      expect(second.freshlyCreated).toBe(false);
    });

    it('creates a single label for concurrent first uses', async () => {
      const upsert = jest.spyOn(store, 'upsertIfAbsent');

      const results = await Promise.all(
        Array.from({ length: 20 }, () =>
          engine.resolve(id, 'Hello', { locale: 'en' }),
        ),
      );

      expect(upsert).toHaveBeenCalledTimes(1);
      expect(await store.listLabels('ns')).toHaveLength(1);
      expect(new Set(results.map((r) => r.pattern))).toEqual(
        new Set(['Hello']),
      );
    });
  });

  describe('variant selection', () => {
    beforeEach(async () => {
      await seed({
        variants: [
          { locale: 'en', alternatives: ['A'], validated: true },
          {
            locale: 'en',
            connectorType: 'messenger',
            alternatives: ['B'],
            validated: true,
          },
          {
            locale: 'en',
            interfaceType: 'voice',
            alternatives: ['C'],
            validated: true,
          },
          {
            locale: 'en',
            connectorType: 'messenger',
            interfaceType: 'voice',
            alternatives: ['D'],
            validated: true,
          },
          {
            locale: 'fr',
            connectorType: 'web',
            alternatives: ['E'],
            validated: true,
          },
        ],
      });
    });

    it.each([
      [{ connectorType: 'messenger', interfaceType: 'voice' as const }, 'D'],
      [{ connectorType: 'messenger', interfaceType: 'text' as const }, 'B'],
      [{ connectorType: 'web', interfaceType: 'voice' as const }, 'C'],
      [{ connectorType: 'web' }, 'A'],
      [{}, 'A'],
    ])('picks the most specific variant for %p', async (dims, expected) => {
      const resolved = await engine.resolve(id, 'Hello', {
        locale: 'en',
        ...dims,
      });
      expect(resolved.pattern).toBe(expected);
      expect(resolved.validated).toBe(true);
    });

    it('uses a variant of the requested locale when one matches', async () => {
      const resolved = await engine.resolve(id, 'Hello', {
        locale: 'fr',
        connectorType: 'web',
      });
      expect(resolved.pattern).toBe('E');
    });

    it('falls back to the default locale', async () => {
      const resolved = await engine.resolve(id, 'Hello', {
        locale: 'fr',
        connectorType: 'messenger',
      });
      expect(resolved.pattern).toBe('B');
      expect(resolved.variant?.locale).toBe('en');
    });
  });

  it('falls back to the default text without variants', async () => {
    await seed({ variants: [] });

    const resolved = await engine.resolve(id, 'Hello', { locale: 'de' });

    expect(resolved).toEqual({
      pattern: 'Hello',
      variant: null,
      freshlyCreated: false,
      validated: false,
    });
  });

  describe('alternatives', () => {
    const alternatives = ['a', 'b', 'c'];

    beforeEach(async () => {
      await seed({
        variants: [{ locale: 'en', alternatives, validated: true }],
      });
    });

    it('picks alternatives roughly uniformly', async () => {
      const counts = new Map<string, number>();
      for (let i = 0; i < 9000; i++) {
        const { pattern } = await engine.resolve(id, 'Hello', { locale: 'en' });
        counts.set(pattern, (counts.get(pattern) ?? 0) + 1);
      }

      for (const alternative of alternatives) {
        expect(counts.get(alternative)).toBeGreaterThan(2700);
        expect(counts.get(alternative)).toBeLessThan(3300);
      }
    });

    it('draws from the injected random source', async () => {
      engine = new ResolutionEngine(store, new SequenceRandomSource([2, 0, 1]));
      const picks: string[] = [];
      for (let i = 0; i < 3; i++) {
        picks.push((await engine.resolve(id, 'Hello', { locale: 'en' })).pattern);
      }
      expect(picks).toEqual(['c', 'a', 'b']);
    });

    it('clamps out of range draws', async () => {
      engine = new ResolutionEngine(store, new SequenceRandomSource([7, -3]));
      const high = await engine.resolve(id, 'Hello', { locale: 'en' });
      const low = await engine.resolve(id, 'Hello', { locale: 'en' });
      expect(high.pattern).toBe('c');
      expect(low.pattern).toBe('a');
    });
  });

  describe('store failures', () => {
    it('wraps read failures', async () => {
      jest
        .spyOn(store, 'getLabel')
        .mockRejectedValue(new Error('connection refused'));

      const resolution = engine.resolve(id, 'Hello', { locale: 'en' });

      await expect(resolution).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(resolution).rejects.toThrow(
        'Label store failed: connection refused',
      );
    });

    it('wraps create failures', async () => {
      jest.spyOn(store, 'upsertIfAbsent').mockRejectedValue(new Error('disk full'));

      await expect(
        engine.resolve(id, 'Hello', { locale: 'en' }),
      ).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('reads the winner after a write conflict', async () => {
      await seed({
        defaultText: 'Hi',
        variants: [{ locale: 'en', alternatives: ['Hi'], validated: true }],
      });
      jest.spyOn(store, 'getLabel').mockResolvedValueOnce(null);
      jest
        .spyOn(store, 'upsertIfAbsent')
        .mockRejectedValue(new LabelWriteConflictError(id));
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      const resolved = await engine.resolve(id, 'Hi', { locale: 'en' });

      expect(resolved.pattern).toBe('Hi');
      expect(resolved.freshlyCreated).toBe(true);
    });

    it('gives up when the winner cannot be read', async () => {
      jest.spyOn(store, 'getLabel').mockResolvedValue(null);
      jest
        .spyOn(store, 'upsertIfAbsent')
        .mockRejectedValue(new LabelWriteConflictError(id));
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      const resolution = engine.resolve(id, 'Hello', { locale: 'en' });

      await expect(resolution).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(resolution).rejects.toThrow('Label ns:k could not be created');
    });
  });

  describe('key collisions', () => {
    let warn: jest.SpyInstance;

    beforeEach(() => {
      warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);
    });

    it('lets the last default text win and warns once', async () => {
      await seed();

      const first = await engine.resolve(id, 'Hallo', { locale: 'en' });
      await engine.resolve(id, 'Hallo', { locale: 'en' });

      expect(first.pattern).toBe('Hallo');
      expect(first.freshlyCreated).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        'Key collision on ns:k: stored "Hello", requested "Hallo"',
      );
      expect(await store.getLabel(id)).toEqual({
        identifier: id,
        defaultLocale: 'en',
        defaultText: 'Hallo',
        variants: [{ locale: 'en', alternatives: ['Hallo'], validated: false }],
      });
    });

    it('switches back when the first text is requested again', async () => {
      await seed();

      await engine.resolve(id, 'Goodbye', { locale: 'en' });
      const back = await engine.resolve(id, 'Hello', { locale: 'en' });

      expect(back.pattern).toBe('Hello');
      expect(warn).toHaveBeenCalledTimes(2);
    });

    it('keeps validated wording', async () => {
      await seed({
        variants: [{ locale: 'en', alternatives: ['Hi!'], validated: true }],
      });

      const resolved = await engine.resolve(id, 'Hallo', { locale: 'en' });

      expect(resolved.pattern).toBe('Hi!');
      expect((await store.getLabel(id))?.defaultText).toBe('Hallo');
    });
  });

  it('keeps identifiers whose parts contain colons apart', async () => {
    const first = { namespace: 'a:b', key: 'c' };
    const second = { namespace: 'a', key: 'b:c' };

    await engine.resolve(first, 'Tenant AB text', { locale: 'en' });
    const resolved = await engine.resolve(second, 'Tenant A text', {
      locale: 'en',
    });

    expect(resolved.pattern).toBe('Tenant A text');
    expect(resolved.freshlyCreated).toBe(true);
    expect((await store.getLabel(second))?.identifier).toEqual(second);
    expect((await store.getLabel(first))?.defaultText).toBe('Tenant AB text');
  });
});
