import { describe, expect, it } from 'vitest';
import { Logger } from '@callbridge/core';
import { FieldMappingApplier, readSource } from '../src/mapping/field-mapping-applier.js';
import { mapping } from './helpers.js';

function makeApplier(lines: string[] = []): FieldMappingApplier {
  return new FieldMappingApplier(new Logger({ level: 'debug', sink: (line) => lines.push(line) }));
}

describe('FieldMappingApplier.applyRule', () => {
  const applier = makeApplier();
  const rule = (transformationRule: string) => ({ transformationRule, sourceField: 'f' });

  it('changes case', () => {
    expect(applier.applyRule('Main', rule('uppercase'))).toBe('MAIN');
    expect(applier.applyRule('Main', rule('lowercase'))).toBe('main');
    expect(applier.applyRule('mAIN office', rule('capitalize'))).toBe('Main office');
  });

  it('reads false-like strings as false', () => {
    for (const value of ['', 'false', 'FALSE', '0', 'no', 'off', ' Off ']) {
      expect(applier.applyRule(value, rule('boolean'))).toBe(false);
    }
    expect(applier.applyRule('yes', rule('boolean'))).toBe(true);
    expect(applier.applyRule(0, rule('boolean'))).toBe(false);
    expect(applier.applyRule(1, rule('boolean'))).toBe(true);
  });

  it('converts integers and keeps values it cannot convert', () => {
    expect(applier.applyRule('42', rule('integer'))).toBe(42);
    expect(applier.applyRule(' -7 ', rule('integer'))).toBe(-7);
    expect(applier.applyRule(3.9, rule('integer'))).toBe(3);
    expect(applier.applyRule('', rule('integer'))).toBe(0);
    expect(applier.applyRule('4x', rule('integer'))).toBe('4x');
  });

  it('passes null values and unknown rules through', () => {
    expect(applier.applyRule(null, rule('uppercase'))).toBeNull();
    expect(applier.applyRule('abc', rule('reverse'))).toBe('abc');
    expect(applier.applyRule(12, { transformationRule: null, sourceField: 'f' })).toBe(12);
    expect(applier.applyRule(12, rule('string'))).toBe('12');
  });
});

describe('FieldMappingApplier.applyFlat', () => {
  it('writes targets, skips absent optionals and collects missing required fields', () => {
    const lines: string[] = [];
    const result = makeApplier(lines).applyFlat({ name: 'desk', 'a.b': 1, nested: { code: 'x' } }, [
      mapping(39, 'site', 'name', 'site_name', { transformationRule: 'uppercase' }),
      mapping(39, 'site', 'a.b', 'literal'),
      mapping(39, 'site', 'nested.code', 'code'),
      mapping(39, 'site', 'phone', 'phone'),
      mapping(39, 'site', 'id', 'site_id', { isRequired: true }),
    ]);

    expect(result.record).toEqual({ site_name: 'DESK', literal: 1, code: 'x' });
    expect(result.missingRequired).toEqual(['id']);
    expect(lines.some((line) => line.includes('WARN Missing required fields in data'))).toBe(true);
  });
});

describe('readSource', () => {
  it('reads a literal key before a dotted path', () => {
    expect(readSource({ 'a.b': 1, a: { b: 2 } }, 'a.b')).toBe(1);
    expect(readSource({ a: { b: 2 } }, 'a.b')).toBe(2);
  });

  it('treats null the same at a literal key and at a nested path', () => {
    expect(readSource({ 'a.b': null }, 'a.b')).toBeUndefined();
    expect(readSource({ a: { b: null } }, 'a.b')).toBeUndefined();
    expect(readSource({ a: null }, 'a')).toBeUndefined();
    expect(readSource({}, 'a.b')).toBeUndefined();
  });

  it('keeps falsy values that are not null', () => {
    expect(readSource({ a: { b: '' } }, 'a.b')).toBe('');
    expect(readSource({ flag: false }, 'flag')).toBe(false);
    expect(readSource({ a: { n: 0 } }, 'a.n')).toBe(0);
  });
});

describe('FieldMappingApplier.applyFlat null sources', () => {
  it('reports a null required source as missing on either path', () => {
    const result = makeApplier().applyFlat({ 'a.b': null, nested: { code: null } }, [
      mapping(39, 'site', 'a.b', 'literal', { isRequired: true }),
      mapping(39, 'site', 'nested.code', 'code', { isRequired: true }),
    ]);

    expect(result.record).toEqual({});
    expect(result.missingRequired).toEqual(['a.b', 'nested.code']);
  });
});

describe('FieldMappingApplier.applyNested', () => {
  it('nests dotted targets under the parent and ignores other parents', () => {
    const result = makeApplier().applyNested(
      { name: 'Front', enabled: 'no', ext: '301', other: 'x' },
      [
        mapping(77, 'auto_receptionist', 'name', 'name'),
        mapping(77, 'auto_receptionist', 'enabled', 'auto_receptionist.business_hours_enabled', {
          transformationRule: 'boolean',
        }),
        mapping(77, 'auto_receptionist', 'ext', 'auto_receptionist.extension.number'),
        mapping(77, 'auto_receptionist', 'other', 'ivr_setting.other'),
      ],
      'auto_receptionist'
    );

    expect(result.record).toEqual({
      name: 'Front',
      auto_receptionist: { business_hours_enabled: false, extension: { number: '301' } },
    });
    expect(result.missingRequired).toEqual([]);
  });

  it('reports missing required sources', () => {
    const result = makeApplier().applyNested(
      {},
      [mapping(78, 'ivr', 'menu', 'ivr_setting.menu', { isRequired: true })],
      'ivr_setting'
    );
    expect(result.record).toEqual({});
    expect(result.missingRequired).toEqual(['menu']);
  });
});
