/**
 * RingCentral IVR menus to Zoom IVR
 *
 * `ivr_details[0].actions` becomes `ivr_actions` and `ivr_details` is
 * removed. What each key routes to is guessed from the extension's display
 * name (see `inferTargetTypeFromName`); there is no authoritative type
 * lookup here.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  IvrTargetType,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asRecord, asString, isPlainObject } from '@callbridge/core';
import { loadSettings, settingStringList } from '../../config/transformation-config.js';
import {
  actionTakesTarget,
  applyDtmfCleanup,
  inferTargetTypeFromName,
  mapIvrAction,
  mapIvrKey,
  parseDtmfCleanupRule,
} from '../../rules/index.js';
import type { DtmfCleanupRule, TargetTypeKeywords } from '../../rules/index.js';
import { missingPaths } from '../support.js';

export interface IvrAction {
  key?: unknown;
  action?: number;
  target?: { type: IvrTargetType; extension_id: string };
}

export class RingCentralIvrTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'rc_zoom_ivr';
  readonly jobTypeId: number = 78;
  readonly entity: EntityKind = 'ivr';
  readonly removedFields: readonly string[] = ['ivr_details'];
  readonly rewrittenFields: readonly string[] = ['ivr_actions'];

  private readonly log: Logger;
  private keywords: TargetTypeKeywords = {};
  private cleanup: DtmfCleanupRule | null = null;

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  async initialize(): Promise<void> {
    const settings: TransformationSettings = await loadSettings(
      this.deps.configLoader,
      this.jobTypeCode,
      this.log
    );
    this.keywords = {
      queue: settingStringList(settings, 'queue_keywords'),
      receptionist: settingStringList(settings, 'receptionist_keywords'),
    };
    this.cleanup = parseDtmfCleanupRule(settings.dtmf_cleanup);
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    const details = record.ivr_details;

    if (!Array.isArray(details) || details.length === 0) {
      this.log.info('No IVR details to transform', { id: record.id });
      return out;
    }

    const actions = asRecord(details[0]).actions;
    if (Array.isArray(actions)) {
      const transformed: IvrAction[] = [];
      for (const action of actions) {
        const mapped = this.transformAction(action);
        if (mapped) transformed.push(mapped);
      }
      out.ivr_actions = transformed;
    }
    delete out.ivr_details;

    if (this.cleanup) {
      applyDtmfCleanup(out, this.cleanup);
    }
    return out;
  }

  transformAction(action: unknown): IvrAction | null {
    if (!isPlainObject(action)) {
      this.log.warn('Skipping IVR action that is not an object');
      return null;
    }

    const result: IvrAction = {};
    const input = asString(action.input);
    if (input !== null) {
      result.key = mapIvrKey(input);
    } else if ('key' in action) {
      result.key = action.key;
    }

    let extensionId: string | null = null;
    let extensionName: string | null = null;
    if (isPlainObject(action.extension)) {
      extensionId = asString(action.extension.id);
      extensionName = asString(action.extension.name);
    } else if (isPlainObject(action.target)) {
      extensionId = asString(action.target.extension_id);
    }

    const targetType = inferTargetTypeFromName(extensionName, this.keywords);
    this.log.debug('Inferred IVR target type', { extensionId, extensionName, targetType });

    const sourceAction = asString(action.action);
    if (sourceAction !== null) {
      const code = mapIvrAction(sourceAction, targetType);
      result.action = code;
      if (extensionId !== null && actionTakesTarget(code)) {
        result.target = { type: targetType, extension_id: extensionId };
      }
    }
    return result;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingPaths(record, ['id', 'name']);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['id', 'name']);
    if (missing.length > 0) {
      this.log.error('Transformed IVR is missing required fields', { fields: missing });
      return false;
    }
    if ('ivr_details' in record) {
      this.log.warn('ivr_details still present after transform', { id: record.id });
    }
    return true;
  }
}
