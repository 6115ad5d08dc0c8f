// Tests for policy construction and document conversion

import { describe, it, expect } from 'vitest';
import { PolicyCreationError, UnknownCheckerTypeError } from '../errors.js';
import { eq, cidr, subjectEqual, regexMatch } from '../rules/factories.js';
import { validateRule } from '../validation/documents.js';
import {
  createPolicy,
  derivePolicyType,
  isFieldMap,
  policyToDocument,
  policyFromDocument,
  policyTypeForChecker,
} from './policy.js';

describe('createPolicy', () => {
  it('derives the string type from string conditions', () => {
    const policy = createPolicy({
      uid: '1',
      effect: 'allow',
      subjects: ['Max', '<Ben|Henry>'],
      actions: ['get'],
    });

    expect(policy.type).toBe('string');
    expect(policy.subjects).toEqual(['Max', '<Ben|Henry>']);
    expect(policy.resources).toEqual([]);
  });

  it('treats a policy without conditions as string-based', () => {
    expect(createPolicy({ uid: 'empty' }).type).toBe('string');
  });

  it('derives the rule type from rule conditions', () => {
    const policy = createPolicy({
      uid: '2',
      subjects: [{ name: eq('Max') }],
      actions: [regexMatch('get|list')],
    });

    expect(policy.type).toBe('rule');
  });

  it('rejects mixed string and rule conditions', () => {
    expect(() =>
      createPolicy({ uid: '3', subjects: ['Max'], actions: [{ method: eq('get') }] })
    ).toThrow(PolicyCreationError);
  });

  it('defaults to deny with default tags', () => {
    const policy = createPolicy({ uid: '4' });

    expect(policy.effect).toBe('deny');
    expect(policy.startTag).toBe('<');
    expect(policy.endTag).toBe('>');
    expect(policy.context).toEqual({});
    expect(policy.description).toBeUndefined();
  });

  it('turns literals in field maps and context into eq rules', () => {
    const policy = createPolicy({
      uid: '5',
      subjects: [{ name: 'Max', role: eq('admin') }],
      context: { owner: 'Max', ip: cidr('127.0.0.1/32') },
    });

    expect(policy.subjects).toEqual([
      { name: { type: 'eq', value: 'Max' }, role: { type: 'eq', value: 'admin' } },
    ]);
    expect(policy.context).toEqual({
      owner: { type: 'eq', value: 'Max' },
      ip: { type: 'cidr', cidr: '127.0.0.1/32' },
    });
  });

  it('keeps bare rules as they are', () => {
    const rule = eq('Max');
    const policy = createPolicy({ uid: '6', subjects: [rule] });

    expect(policy.subjects[0]).toBe(rule);
  });

  it('reads rule-shaped literals as field maps', () => {
    const policy = createPolicy({
      uid: '6a',
      subjects: [{ type: 'and' }],
      resources: [{ type: 'any' }],
      actions: [{ type: 'in_list', values: ['get'] }],
    });

    expect(policy.type).toBe('rule');
    expect(policy.subjects).toEqual([{ type: { type: 'eq', value: 'and' } }]);
    expect(policy.resources).toEqual([{ type: { type: 'eq', value: 'any' } }]);
    expect(policy.actions).toEqual([
      { type: { type: 'eq', value: 'in_list' }, values: { type: 'eq', value: ['get'] } },
    ]);
    expect(isFieldMap(policy.resources[0])).toBe(true);
  });

  it('reads rule-shaped literals in context as eq values', () => {
    const policy = createPolicy({ uid: '6b', context: { kind: { type: 'neither' } } });

    expect(policy.context).toEqual({
      kind: { type: 'eq', value: { type: 'neither' } },
    });
  });

  it('keeps rules parsed from documents', () => {
    const parsed = validateRule({ type: 'any' });
    if (!parsed.valid) throw new Error('expected a valid rule');

    const policy = createPolicy({ uid: '6c', resources: [parsed.value] });

    expect(policy.resources[0]).toBe(parsed.value);
    expect(isFieldMap(policy.resources[0])).toBe(false);
  });

  it('requires a uid', () => {
    expect(() => createPolicy({ uid: '' })).toThrow(PolicyCreationError);
  });

  it('requires single-character tags', () => {
    expect(() => createPolicy({ uid: '7', startTag: '{{' })).toThrow(
      'startTag must be a single character'
    );
    expect(() => createPolicy({ uid: '7', endTag: '' })).toThrow(PolicyCreationError);
  });

  it('returns a frozen value', () => {
    const policy = createPolicy({ uid: '8', subjects: ['Max'] });

    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.subjects)).toBe(true);
    expect(Object.isFrozen(policy.context)).toBe(true);
  });
});

describe('derivePolicyType', () => {
  it('names the policy in the mixing error', () => {
    expect(() => derivePolicyType(['a', eq('b')], 'p-9')).toThrow(
      'Policy p-9 could not be created: string-based and rule-based conditions can not be mixed'
    );
  });
});

describe('isFieldMap', () => {
  it('tells field maps from bare rules', () => {
    expect(isFieldMap({ name: eq('Max') })).toBe(true);
    expect(isFieldMap(eq('Max'))).toBe(false);
  });
});

describe('documents', () => {
  function viaJson(value: unknown): unknown {
    return JSON.parse(JSON.stringify(value));
  }

  it('round-trips a string policy', () => {
    const policy = createPolicy({
      uid: 'doc-1',
      description: 'Readers of the library',
      effect: 'allow',
      subjects: ['<[A-Z][a-z]+>'],
      resources: ['library:books:{.*}'],
      actions: ['read'],
      startTag: '{',
      endTag: '}',
    });

    expect(policyFromDocument(viaJson(policyToDocument(policy)))).toEqual(policy);
  });

  it('round-trips a rule policy', () => {
    const policy = createPolicy({
      uid: 'doc-2',
      effect: 'allow',
      subjects: [{ name: eq('Max') }, eq('Nina')],
      resources: [{ id: regexMatch('\\d+') }],
      actions: [{ method: eq('get') }],
      context: { owner: subjectEqual() },
    });

    const restored = policyFromDocument(viaJson(policyToDocument(policy)));

    expect(restored).toEqual(policy);
    expect(restored.type).toBe('rule');
    expect(isFieldMap(restored.subjects[0])).toBe(true);
    expect(isFieldMap(restored.subjects[1])).toBe(false);
  });

  it('writes the derived type into the document', () => {
    const document = policyToDocument(createPolicy({ uid: 'doc-3', subjects: [eq(1)] }));

    expect(document.type).toBe('rule');
    expect(document.startTag).toBe('<');
  });

  it('fills in default tags for documents without them', () => {
    const policy = policyFromDocument({
      uid: 'doc-4',
      effect: 'deny',
      type: 'string',
      subjects: ['Max'],
      resources: [],
      actions: [],
      context: {},
    });

    expect(policy.startTag).toBe('<');
    expect(policy.endTag).toBe('>');
  });

  it('rejects malformed documents with the failing paths', () => {
    try {
      policyFromDocument({ uid: 'doc-5', type: 'string', subjects: [], resources: [], actions: [], context: {} });
      expect.unreachable('document without an effect was accepted');
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyCreationError);
      if (error instanceof PolicyCreationError) {
        expect(error.details?.errors).toEqual([
          expect.objectContaining({ path: 'effect' }),
        ]);
      }
    }
  });

  it('rejects documents whose type does not match their conditions', () => {
    expect(() =>
      policyFromDocument({
        uid: 'doc-6',
        effect: 'allow',
        type: 'rule',
        subjects: ['Max'],
        resources: [],
        actions: [],
        context: {},
      })
    ).toThrow('document declares type "rule" but its conditions are string-based');
  });

  it('rejects rules with invalid arguments', () => {
    expect(() =>
      policyFromDocument({
        uid: 'doc-7',
        effect: 'allow',
        type: 'rule',
        subjects: [{ type: 'regex_match', pattern: '(' }],
        resources: [],
        actions: [],
        context: {},
      })
    ).toThrow(PolicyCreationError);
  });
});

describe('policyTypeForChecker', () => {
  it('maps string checkers to string policies', () => {
    expect(policyTypeForChecker('exact')).toBe('string');
    expect(policyTypeForChecker('fuzzy')).toBe('string');
    expect(policyTypeForChecker('regex')).toBe('string');
  });

  it('maps the rules checker to rule policies', () => {
    expect(policyTypeForChecker('rules')).toBe('rule');
  });

  it('rejects unknown kinds', () => {
    expect(() => policyTypeForChecker('glob')).toThrow(UnknownCheckerTypeError);
    expect(() => policyTypeForChecker('glob')).toThrow("Can't determine Checker type: glob");
  });
});
