import { expect } from 'vitest';
import { Logger, StaticConfigLoader, StaticFieldMappingStore, hasOwn } from '@callbridge/core';
import type {
  DataRecord,
  EntityTransformer,
  FieldMapping,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';

export interface DepsOptions {
  mappings?: FieldMapping[];
  configs?: { [jobTypeCode: string]: TransformationSettings };
  lines?: string[];
}

export function makeDeps(options: DepsOptions = {}): TransformerDeps {
  const lines = options.lines;
  return {
    fieldMappings: new StaticFieldMappingStore(options.mappings ?? []),
    configLoader: new StaticConfigLoader(options.configs ?? {}),
    logger: new Logger({
      level: 'debug',
      sink: (line) => {
        lines?.push(line);
      },
    }),
  };
}

export async function ready<T extends EntityTransformer>(transformer: T): Promise<T> {
  await transformer.initialize?.();
  return transformer;
}

export function mapping(
  jobTypeId: number,
  targetEntity: string,
  sourceField: string,
  targetField: string,
  extra: Partial<FieldMapping> = {}
): FieldMapping {
  return {
    jobTypeId,
    sourcePlatform: 'ssot',
    targetEntity,
    sourceField,
    targetField,
    transformationRule: null,
    isRequired: false,
    ...extra,
  };
}

/**
 * Input keys in `removedFields` are gone, keys in `rewrittenFields` are
 * still present, and every other key survives with its value unchanged.
 * `rewritten` names the derived values expected for rewritten keys.
 */
export function expectCopyAll(
  transformer: EntityTransformer,
  input: DataRecord,
  output: DataRecord,
  rewritten: DataRecord = {}
): void {
  for (const key of transformer.removedFields) {
    expect(transformer.rewrittenFields, `key '${key}' is both removed and rewritten`).not.toContain(key);
  }
  for (const [key, value] of Object.entries(input)) {
    if (transformer.removedFields.includes(key)) {
      expect(hasOwn(output, key), `removed key '${key}'`).toBe(false);
    } else if (transformer.rewrittenFields.includes(key)) {
      expect(hasOwn(output, key), `rewritten key '${key}'`).toBe(true);
    } else {
      expect(output[key], `key '${key}'`).toEqual(value);
    }
  }
  for (const [key, value] of Object.entries(rewritten)) {
    expect(transformer.rewrittenFields, `key '${key}' is not documented as rewritten`).toContain(key);
    expect(output[key], `rewritten key '${key}'`).toEqual(value);
  }
}
