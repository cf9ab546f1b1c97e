import { describe, expect, it, vi } from 'vitest';
import { NotFoundError, TransformationError, ValidationError } from '@callbridge/core';
import type { DataRecord, EntityKind, EntityTransformer } from '@callbridge/core';
import {
  PlatformDispatcher,
  RINGCENTRAL_TO_ZOOM,
  createDefaultRegistry,
} from '../src/dispatch/index.js';
import type { TransformerRegistration } from '../src/dispatch/index.js';
import { makeDeps } from './helpers.js';

class FakeTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'fake_sites';
  readonly jobTypeId: number = 1;
  readonly entity: EntityKind = 'site';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['done'];

  initialize: () => Promise<void> = async () => {};

  transform(record: DataRecord): DataRecord {
    if (record.explode === true) throw new Error('boom');
    if (record.hollow === true) return {};
    return { ...record, done: true };
  }

  missingInputFields(record: DataRecord): string[] {
    return record.id ? [] : ['id'];
  }

  validateInput(): boolean {
    return true;
  }

  validateOutput(record: DataRecord): boolean {
    return record.done === true;
  }
}

function fakeRegistration(create: TransformerRegistration['create']): TransformerRegistration {
  return { code: 'fake_sites', id: 1, name: 'Fake Sites', entity: 'site', create };
}

describe('PlatformDispatcher', () => {
  it('shares one construction between code and id lookups', async () => {
    const create = vi.fn(() => new FakeTransformer());
    const dispatcher = new PlatformDispatcher('src', 'dst', [fakeRegistration(create)], makeDeps());

    const [byCode, byId, byIdString] = await Promise.all([
      dispatcher.getTransformer('fake_sites'),
      dispatcher.getTransformer(1),
      dispatcher.getTransformer('1'),
    ]);

    expect(create).toHaveBeenCalledTimes(1);
    expect(byId).toBe(byCode);
    expect(byIdString).toBe(byCode);
  });

  it('does not cache a failed initialization', async () => {
    let attempts = 0;
    const create = vi.fn(() => {
      attempts += 1;
      const transformer = new FakeTransformer();
      if (attempts === 1) {
        transformer.initialize = async () => {
          throw new Error('config down');
        };
      }
      return transformer;
    });
    const dispatcher = new PlatformDispatcher('src', 'dst', [fakeRegistration(create)], makeDeps());

    await expect(dispatcher.getTransformer('fake_sites')).rejects.toThrow(
      'Transformation failed for fake_sites: config down'
    );
    await expect(dispatcher.getTransformer('fake_sites')).resolves.toBeInstanceOf(FakeTransformer);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('rebuilds transformers after clearCache', async () => {
    const create = vi.fn(() => new FakeTransformer());
    const dispatcher = new PlatformDispatcher('src', 'dst', [fakeRegistration(create)], makeDeps());

    const first = await dispatcher.getTransformer(1);
    dispatcher.clearCache();
    const second = await dispatcher.getTransformer(1);

    expect(second).not.toBe(first);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('reports unsupported job types with what is supported', () => {
    const dispatcher = new PlatformDispatcher('src', 'dst', [fakeRegistration(() => new FakeTransformer())], makeDeps());

    expect(dispatcher.supportsJobType('fake_sites')).toBe(true);
    expect(dispatcher.supportsJobType(99)).toBe(false);
    try {
      void dispatcher.getTransformer('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.message).toBe("Unsupported job type 'nope' for src -> dst");
        expect(error.supported).toEqual(['fake_sites (1)']);
        expect(error.suggestion).toBe('Supported: fake_sites (1)');
      }
    }
  });

  it('rejects duplicate registrations', () => {
    const registration = fakeRegistration(() => new FakeTransformer());
    expect(
      () => new PlatformDispatcher('src', 'dst', [registration, { ...registration, code: 'other' }], makeDeps())
    ).toThrow(TransformationError);
  });

  it('describes registered job types', () => {
    const dispatcher = new PlatformDispatcher('ringcentral', 'zoom', RINGCENTRAL_TO_ZOOM, makeDeps());

    expect(dispatcher.getSupportedJobTypes().map((jobType) => jobType.code)).toEqual([
      'rc_zoom_sites',
      'rc_zoom_users',
      'rc_zoom_call_queues',
      'rc_zoom_ars',
      'rc_zoom_ivr',
    ]);
    expect(dispatcher.getTransformerInfo(77)).toEqual({
      id: 77,
      code: 'rc_zoom_ars',
      name: 'RingCentral Auto Receptionists to Zoom Auto Receptionists',
      sourcePlatform: 'ringcentral',
      targetPlatform: 'zoom',
      entity: 'auto_receptionist',
      isExtractionOnly: false,
      dependencies: ['rc_zoom_sites'],
    });
    expect(dispatcher.getTransformerInfo('missing')).toBeUndefined();
  });

  describe('transform', () => {
    const dispatcher = new PlatformDispatcher(
      'src',
      'dst',
      [fakeRegistration(() => new FakeTransformer())],
      makeDeps()
    );

    it('returns the validated output', async () => {
      await expect(dispatcher.transform('fake_sites', { id: 'a' })).resolves.toEqual({ id: 'a', done: true });
    });

    it('names missing input fields', async () => {
      const failure = dispatcher.transform('fake_sites', { name: 'x' });
      await expect(failure).rejects.toBeInstanceOf(ValidationError);
      await expect(failure).rejects.toThrow('Input for fake_sites is missing required fields: id');
    });

    it('wraps unexpected transformer errors', async () => {
      const failure = dispatcher.transform(1, { id: 'a', explode: true });
      await expect(failure).rejects.toBeInstanceOf(TransformationError);
      await expect(failure).rejects.toThrow('Transformation failed for fake_sites: boom');
    });

    it('rejects output that fails validation', async () => {
      await expect(dispatcher.transform(1, { id: 'a', hollow: true })).rejects.toThrow(
        'Output of fake_sites failed validation'
      );
    });

    it('tags log lines with the trace and the job group', async () => {
      const lines: string[] = [];
      const tagged = new PlatformDispatcher(
        'src',
        'dst',
        [fakeRegistration(() => new FakeTransformer())],
        makeDeps({ lines })
      );

      await tagged.transform('fake_sites', { id: 'a' }, { traceId: 't-9', jobGroupId: 12 });
      await tagged.transform('fake_sites', { id: 'b' });

      const transforming = lines
        .filter((line) => line.includes('Transforming record'))
        .map((line) => line.replace(/^\[[^\]]*\] /, ''));
      expect(transforming).toEqual([
        'INFO trace=t-9 Transforming record dispatcher=src->dst jobTypeCode=fake_sites jobGroupId=12 id=a',
        'INFO Transforming record dispatcher=src->dst jobTypeCode=fake_sites id=b',
      ]);
    });

    it('warns about input fields that went missing', async () => {
      const lines: string[] = [];
      const watched = new PlatformDispatcher(
        'src',
        'dst',
        [fakeRegistration(() => new FakeTransformer())],
        makeDeps({ lines })
      );

      await expect(watched.transform('fake_sites', { id: 'a', hollow: true })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(
        lines.some((line) =>
          line.endsWith(
            'WARN Transformer dropped input fields it does not document as removed ' +
              'dispatcher=src->dst jobTypeCode=fake_sites fields=["id","hollow"]'
          )
        )
      ).toBe(true);
    });
  });
});

describe('DispatcherRegistry', () => {
  it('lists the shipped platform pairs in registration order', () => {
    const registry = createDefaultRegistry(makeDeps());

    expect(registry.getSupportedPlatforms()).toEqual([
      { source: 'ringcentral', target: 'zoom' },
      { source: 'ssot', target: 'zoom' },
      { source: 'dialpad', target: 'zoom' },
    ]);
    expect(registry.supportsPlatformCombination('RingCentral', 'Zoom')).toBe(true);
    expect(registry.supportsPlatformCombination('zoom', 'ringcentral')).toBe(false);
  });

  it('caches dispatchers until cleared', () => {
    const registry = createDefaultRegistry(makeDeps());
    const first = registry.getDispatcher('dialpad', 'zoom');

    expect(registry.getDispatcher('DIALPAD', 'zoom')).toBe(first);
    registry.clearCache();
    expect(registry.getDispatcher('dialpad', 'zoom')).not.toBe(first);
  });

  it('drops the cached dispatcher when a pair is registered again', () => {
    const registry = createDefaultRegistry(makeDeps());
    const first = registry.getDispatcher('ssot', 'zoom');

    registry.registerTable('ssot', 'zoom', [fakeRegistration(() => new FakeTransformer())]);
    const replaced = registry.getDispatcher('ssot', 'zoom');

    expect(replaced).not.toBe(first);
    expect(replaced.getSupportedJobTypes().map((jobType) => jobType.code)).toEqual(['fake_sites']);
  });

  it('rejects unknown platform pairs', async () => {
    const registry = createDefaultRegistry(makeDeps());

    try {
      registry.getDispatcher('teams', 'zoom');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.supported).toEqual(['ringcentral -> zoom', 'ssot -> zoom', 'dialpad -> zoom']);
      }
    }

    const failure = registry.transformData('teams', 'zoom', 33, { id: 'x' });
    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow('No dispatcher for teams -> zoom');
  });

  it('transforms records end to end by code or id', async () => {
    const registry = createDefaultRegistry(makeDeps());
    const site = { id: 's1', name: 'Main Office' };

    const byCode = await registry.transformData('ringcentral', 'zoom', 'rc_zoom_sites', site);
    const byId = await registry.transformData('ringcentral', 'zoom', 33, site, { traceId: 'trace-1' });

    expect(byCode).toEqual({
      id: 's1',
      name: 'Main Office',
      site_code: 'MAIN_OFFICE',
      auto_receptionist_name: 'Main Office (NIU)',
    });
    expect(byId).toEqual(byCode);
  });
});
