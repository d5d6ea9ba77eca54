import { BadRequestException, NotFoundException } from '@nestjs/common';
import { PatternCacheService } from './format/pattern-cache.service';
import { Label } from './label.types';
import { LabelsService } from './labels.service';
import { InMemoryLabelStore } from './store/in-memory-label.store';

describe('LabelsService', () => {
  const id = { namespace: 'shop', key: 'a' };
  const label: Label = {
    identifier: id,
    defaultLocale: 'en',
    defaultText: 'Welcome',
    variants: [
      { locale: 'en', alternatives: ['Welcome'], validated: false },
      { locale: 'fr', alternatives: ['Bienvenu'], validated: false },
    ],
  };
  let store: InMemoryLabelStore;
  let patternCache: PatternCacheService;
  let service: LabelsService;

  beforeEach(async () => {
    store = new InMemoryLabelStore();
    patternCache = new PatternCacheService();
    service = new LabelsService(store, patternCache);
    await store.upsertIfAbsent(label);
  });

  describe('findLabel', () => {
    it('returns stored labels', async () => {
      expect(await service.findLabel(id)).toEqual(label);
    });

    it('throws NotFoundException for unknown labels', async () => {
      await expect(
        service.findLabel({ namespace: 'shop', key: 'missing' }),
      ).rejects.toThrow(new NotFoundException('Label shop:missing not found'));
    });
  });

  describe('saveVariant', () => {
    it('saves the variant and evicts its compiled patterns', async () => {
      patternCache.get('Bienvenu', { identifier: id, tuple: { locale: 'fr' } });
      patternCache.get('Welcome', { identifier: id, tuple: { locale: 'en' } });

      const saved = await service.saveVariant(id, {
        locale: 'fr',
        alternatives: ['Bienvenue'],
        validated: true,
      });

      expect(saved.variants).toContainEqual({
        locale: 'fr',
        alternatives: ['Bienvenue'],
        validated: true,
      });
      expect(patternCache.size).toBe(1);
    });

    it('rejects variants without alternatives', async () => {
      await expect(
        service.saveVariant(id, { locale: 'fr', alternatives: [], validated: true }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('rejects unknown labels', async () => {
      await expect(
        service.saveVariant(
          { namespace: 'shop', key: 'missing' },
          { locale: 'fr', alternatives: ['x'], validated: true },
        ),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('findUsage', () => {
    it('lists usage of known labels', async () => {
      await store.recordUsage(id, { locale: 'en' });
      const usage = await service.findUsage(id);
      expect(usage).toHaveLength(1);
      expect(usage[0].count).toBe(1);
    });

    it('throws NotFoundException for unknown labels', async () => {
      await expect(
        service.findUsage({ namespace: 'shop', key: 'missing' }),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('importLabels', () => {
    it('merges records into the store', async () => {
      const summary = await service.importLabels([
        {
          identifier: { namespace: 'shop', key: 'b' },
          defaultLocale: 'en',
          defaultText: 'Goodbye',
          variants: [{ locale: 'en', alternatives: ['Goodbye'], validated: true }],
        },
        {
          ...label,
          variants: [
            { locale: 'en', alternatives: ['Hi there'], validated: false },
            { locale: 'fr', alternatives: ['Bienvenue'], validated: true },
            { locale: 'de', alternatives: ['Willkommen'], validated: false },
          ],
        },
      ]);

      expect(summary).toEqual({ created: 1, updated: 1, added: 1, skipped: 1 });

      const merged = await store.getLabel(id);
      expect(merged?.variants).toEqual([
        { locale: 'en', alternatives: ['Welcome'], validated: false },
        { locale: 'fr', alternatives: ['Bienvenue'], validated: true },
        { locale: 'de', alternatives: ['Willkommen'], validated: false },
      ]);
      expect((await store.getLabel({ namespace: 'shop', key: 'b' }))?.defaultText).toBe(
        'Goodbye',
      );
    });

    it('rejects a file with two variants for one tuple before writing', async () => {
      const records: Label[] = [
        { ...label, identifier: { namespace: 'shop', key: 'c' } },
        {
          ...label,
          identifier: { namespace: 'shop', key: 'd' },
          variants: [
            { locale: 'fr', connectorType: 'mobile', alternatives: ['Salut'], validated: false },
            { locale: 'fr', connectorType: 'mobile', alternatives: ['Coucou'], validated: true },
          ],
        },
      ];

      const result = service.importLabels(records);
      await expect(result).rejects.toBeInstanceOf(BadRequestException);
      await expect(result).rejects.toThrow(
        'Label shop:d has more than one variant for fr/mobile',
      );
      expect(await store.getLabel({ namespace: 'shop', key: 'c' })).toBeNull();
    });
  });

  describe('exportLabels', () => {
    it('returns the labels of a namespace', async () => {
      await store.upsertIfAbsent({
        ...label,
        identifier: { namespace: 'other', key: 'z' },
      });

      const exported = await service.exportLabels('shop');
      expect(exported).toEqual([label]);
    });
  });
});
