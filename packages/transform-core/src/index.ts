/**
 * @callbridge/transform-core
 *
 * Rule library, field-mapping applier, entity transformers and the
 * dispatcher registry.
 */

export * from './rules/index.js';
export { FieldMappingApplier, isSimpleRule, readSource } from './mapping/field-mapping-applier.js';
export type { MappingResult } from './mapping/field-mapping-applier.js';
export {
  loadSettings,
  parseTransformationConfig,
  settingNumber,
  settingRecord,
  settingString,
  settingStringList,
} from './config/transformation-config.js';
export * from './transformers/ringcentral-to-zoom/index.js';
export * from './transformers/dialpad-to-zoom/index.js';
export * from './transformers/ssot-to-zoom/index.js';
export * from './dispatch/index.js';
