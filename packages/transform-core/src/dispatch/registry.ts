/**
 * Dispatcher Registry
 *
 * Maps (source, target) platform pairs to dispatchers. Built once at
 * startup and passed by reference; dispatchers are constructed on first
 * lookup and cached for the registry's lifetime.
 */

import type { DataRecord, Logger, TransformContext, TransformerDeps } from '@callbridge/core';
import { NotFoundError } from '@callbridge/core';
import { DIALPAD_TO_ZOOM, RINGCENTRAL_TO_ZOOM, SSOT_TO_ZOOM } from './job-types.js';
import { PlatformDispatcher } from './platform-dispatcher.js';
import type { JobTypeRef, TransformerRegistration } from './platform-dispatcher.js';

export type DispatcherFactory = (deps: TransformerDeps) => PlatformDispatcher;

export interface PlatformPair {
  source: string;
  target: string;
}

function pairKey(source: string, target: string): string {
  return `${source.trim().toLowerCase()}->${target.trim().toLowerCase()}`;
}

export class DispatcherRegistry {
  private readonly factories = new Map<string, { pair: PlatformPair; factory: DispatcherFactory }>();
  private readonly dispatchers = new Map<string, PlatformDispatcher>();
  private readonly log: Logger;

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ component: 'dispatcher-registry' });
  }

  /**
   * Register (or replace) the dispatcher for a platform pair. Replacing drops
   * any cached instance.
   */
  register(source: string, target: string, factory: DispatcherFactory): void {
    const key = pairKey(source, target);
    this.factories.set(key, {
      pair: { source: source.trim().toLowerCase(), target: target.trim().toLowerCase() },
      factory,
    });
    this.dispatchers.delete(key);
    this.log.debug('Registered dispatcher', { pair: key });
  }

  /** Register a table of transformers as a dispatcher for a platform pair */
  registerTable(source: string, target: string, table: readonly TransformerRegistration[]): void {
    this.register(source, target, (deps) => new PlatformDispatcher(source, target, table, deps));
  }

  /**
   * Cached dispatcher for a platform pair; platform names are
   * case-insensitive.
   */
  getDispatcher(source: string, target: string): PlatformDispatcher {
    const key = pairKey(source, target);
    const cached = this.dispatchers.get(key);
    if (cached) return cached;

    const entry = this.factories.get(key);
    if (!entry) {
      throw new NotFoundError({
        message: `No dispatcher for ${source} -> ${target}`,
        supported: Array.from(this.factories.keys()).map((k) => k.replace('->', ' -> ')),
      });
    }

    const dispatcher = entry.factory(this.deps);
    this.dispatchers.set(key, dispatcher);
    return dispatcher;
  }

  getSupportedPlatforms(): PlatformPair[] {
    return Array.from(this.factories.values()).map((e) => ({ ...e.pair }));
  }

  supportsPlatformCombination(source: string, target: string): boolean {
    return this.factories.has(pairKey(source, target));
  }

  /** Drop every cached dispatcher and, with them, their transformers. */
  clearCache(): void {
    for (const dispatcher of this.dispatchers.values()) {
      dispatcher.clearCache();
    }
    this.dispatchers.clear();
  }

  async transformData(
    source: string,
    target: string,
    jobType: JobTypeRef,
    data: DataRecord,
    context?: TransformContext
  ): Promise<DataRecord> {
    return await this.getDispatcher(source, target).transform(jobType, data, context);
  }
}

/** Registry with the RingCentral, SSOT and Dialpad to Zoom dispatchers */
export function createDefaultRegistry(deps: TransformerDeps): DispatcherRegistry {
  const registry = new DispatcherRegistry(deps);
  registry.registerTable('ringcentral', 'zoom', RINGCENTRAL_TO_ZOOM);
  registry.registerTable('ssot', 'zoom', SSOT_TO_ZOOM);
  registry.registerTable('dialpad', 'zoom', DIALPAD_TO_ZOOM);
  return registry;
}
