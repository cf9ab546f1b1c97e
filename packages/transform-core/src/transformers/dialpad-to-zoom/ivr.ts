/**
 * Dialpad office routing options to Zoom IVR
 *
 * `routing_options.{open,closed}.dtmf` entries become `ivr_actions` in the
 * RingCentral IVR shape, followed by one `timeout` action derived from
 * `no_operators_action`.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asArray, asRecord, asString, isPlainObject } from '@callbridge/core';
import { loadSettings } from '../../config/transformation-config.js';
import {
  DISABLED_ACTION,
  actionTakesTarget,
  applyDtmfCleanup,
  dialpadTargetType,
  mapDialpadAction,
  mapDialpadIvrKey,
  parseDtmfCleanupRule,
} from '../../rules/index.js';
import type { DtmfCleanupRule } from '../../rules/index.js';
import type { IvrAction } from '../ringcentral-to-zoom/ivr.js';
import { missingPaths } from '../support.js';
import { dialpadOfficeId } from './auto-receptionists.js';

const ROUTING_STATES = ['open', 'closed'] as const;
const ACTIONS_WITHOUT_TARGET = new Set(['disabled', 'directory', 'repeat']);
const VOICEMAIL_TO_USER = 200;

export class DialpadIvrTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'dialpad_zoom_ivr';
  readonly jobTypeId: number = 78;
  readonly entity: EntityKind = 'ivr';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['id', 'name', 'extensionNumber', 'site.id', 'ivr_actions', 'record_id'];

  private readonly log: Logger;
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
    this.cleanup = parseDtmfCleanupRule(settings.dtmf_cleanup);
  }

  transform(record: DataRecord): DataRecord {
    const officeId = dialpadOfficeId(record);
    const out: DataRecord = {
      ...record,
      id: officeId,
      name: asString(record.name) ?? '',
      extensionNumber: asString(record.office_id) ?? officeId,
      'site.id': officeId,
      ivr_actions: this.ivrActions(record),
      record_id: record.record_id ?? `dialpad_ivr_${officeId || 'unknown'}`,
    };

    if (this.cleanup) {
      applyDtmfCleanup(out, this.cleanup);
    }
    return out;
  }

  private ivrActions(record: DataRecord): IvrAction[] {
    const actions: IvrAction[] = [];
    const routing = asRecord(record.routing_options);

    for (const state of ROUTING_STATES) {
      for (const item of asArray(asRecord(routing[state]).dtmf)) {
        const action = this.dtmfAction(item);
        if (action) actions.push(action);
      }
    }

    const noOperators = asString(record.no_operators_action) ?? 'voicemail';
    actions.push({ key: 'timeout', action: noOperators === 'voicemail' ? VOICEMAIL_TO_USER : DISABLED_ACTION });
    return actions;
  }

  private dtmfAction(item: unknown): IvrAction | null {
    if (!isPlainObject(item)) return null;
    const input = asString(item.input);
    const options = asRecord(item.options);
    if (input === null || Object.keys(options).length === 0) {
      this.log.debug('Skipping DTMF entry without input or options', { input });
      return null;
    }

    const name = asString(options.action) ?? '';
    const targetType = dialpadTargetType(name, asString(options.action_target_type) ?? '');
    const code = mapDialpadAction(name, targetType);
    const action: IvrAction = { key: mapDialpadIvrKey(input), action: code };

    const targetId = asString(options.action_target_id);
    if (targetId !== null && !ACTIONS_WITHOUT_TARGET.has(name) && actionTakesTarget(code)) {
      action.target = { type: targetType, extension_id: targetId };
    }
    return action;
  }

  missingInputFields(record: DataRecord): string[] {
    const missing = missingPaths(record, ['name']);
    if (dialpadOfficeId(record) === '') missing.unshift('id');
    return missing;
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['id', 'name']);
    if (!Array.isArray(record.ivr_actions)) missing.push('ivr_actions');
    if (missing.length > 0) {
      this.log.error('Transformed IVR is missing required fields', { fields: missing });
      return false;
    }
    const actions = asArray(record.ivr_actions);
    if (isPlainObject(record.routing_options) && actions.length <= 1) {
      this.log.warn('Routing options present but no keypress actions generated', { id: record.id });
    }
    return true;
  }
}
