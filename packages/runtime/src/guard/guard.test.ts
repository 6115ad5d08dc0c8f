// Tests for the Guard
// Verifies deny-overrides, default deny, fail-closed behaviour and decision reasons.

import { describe, it, expect, vi, beforeAll } from 'vitest';
import {
  cidr,
  createInquiry,
  createPolicy,
  eq,
  regexMatch,
  subjectEqual,
} from '@tessera/protocol';
import type { Inquiry, Policy } from '@tessera/protocol';
import { MemoryStorage, createMemoryStorage } from '@tessera/repositories';
import { PatternCompiler } from '../compiler/index.js';
import { ExactChecker, RegexChecker, RulesChecker } from '../checkers/index.js';
import { GuardCache } from '../cache/index.js';
import { createCapturingLogger } from '../logging/index.js';
import { Guard, type DecisionRecord } from './guard.js';

const policies: Policy[] = [
  createPolicy({
    uid: '1',
    description: 'Owners may create, delete and get resources from the local machine',
    effect: 'allow',
    subjects: ['Max', 'Nina', '<Ben|Henry>'],
    resources: [
      'myrn:example.com:resource:123',
      'myrn:example.com:resource:345',
      'myrn:something:foo:<.+>',
    ],
    actions: ['<create|delete>', 'get'],
    context: { ip: cidr('127.0.0.1/32'), owner: subjectEqual() },
  }),
  createPolicy({
    uid: '2',
    description: 'Max may update any resource',
    effect: 'allow',
    subjects: ['Max'],
    actions: ['update'],
    resources: ['<.*>'],
  }),
  createPolicy({
    uid: '3',
    description: 'Max may not print any resource',
    effect: 'deny',
    subjects: ['Max'],
    actions: ['print'],
    resources: ['<.*>'],
  }),
  createPolicy({ uid: '4' }),
  createPolicy({
    uid: '5',
    description: 'Nina may update resources named by digits',
    effect: 'allow',
    subjects: ['Nina'],
    actions: ['update'],
    resources: ['<[\\d]+>'],
  }),
  createPolicy({
    uid: '6',
    description: 'Nina may update or read numbered issues',
    effect: 'allow',
    subjects: [eq('Nina')],
    actions: [eq('update'), eq('read')],
    resources: [{ id: regexMatch('\\d+'), magazine: regexMatch('[\\d\\w]+') }],
  }),
];

describe('Guard over a mixed policy set', () => {
  let storage: MemoryStorage;
  const regex = new RegexChecker(new PatternCompiler());
  const rules = new RulesChecker();

  beforeAll(async () => {
    storage = await createMemoryStorage(policies);
  });

  const regexCases: Array<[string, Inquiry, boolean]> = [
    ['an empty inquiry matches nothing, not even an empty policy', createInquiry(), false],
    [
      'Max may update a resource',
      createInquiry({ subject: 'Max', resource: 'myrn:example.com:resource:123', action: 'update' }),
      true,
    ],
    [
      'Max may update an empty resource',
      createInquiry({ subject: 'Max', resource: '', action: 'update' }),
      true,
    ],
    [
      'subjects are case-sensitive',
      createInquiry({ subject: 'max', resource: 'myrn:example.com:resource:123', action: 'update' }),
      false,
    ],
    [
      'Max may not print',
      createInquiry({ subject: 'Max', resource: 'myrn:example.com:resource:123', action: 'print' }),
      false,
    ],
    [
      'Max may not print without a resource',
      createInquiry({ subject: 'Max', action: 'print' }),
      false,
    ],
    [
      'an owner on the local machine may delete',
      createInquiry({
        subject: 'Nina',
        action: 'delete',
        resource: 'myrn:example.com:resource:123',
        context: { owner: 'Nina', ip: '127.0.0.1' },
      }),
      true,
    ],
    [
      'a subject listed by a pattern may get',
      createInquiry({
        subject: 'Henry',
        action: 'get',
        resource: 'myrn:example.com:resource:123',
        context: { owner: 'Henry', ip: '127.0.0.1' },
      }),
      true,
    ],
    [
      'a misspelled context name does not match',
      createInquiry({
        subject: 'Nina',
        action: 'delete',
        resource: 'myrn:example.com:resource:123',
        context: { owner: 'Nina', IP: '127.0.0.1' },
      }),
      false,
    ],
    [
      'a foreign address does not match',
      createInquiry({
        subject: 'Nina',
        action: 'delete',
        resource: 'myrn:example.com:resource:123',
        context: { owner: 'Nina', ip: '10.0.0.1' },
      }),
      false,
    ],
    [
      'Nina may update a numbered resource',
      createInquiry({ subject: 'Nina', action: 'update', resource: '12345' }),
      true,
    ],
    [
      'Nina may not update a named resource',
      createInquiry({ subject: 'Nina', action: 'update', resource: 'abc' }),
      false,
    ],
  ];

  it.each(regexCases)('regex checker: %s', async (_description, inquiry, expected) => {
    const guard = new Guard(storage, regex);

    expect(await guard.isAllowed(inquiry)).toBe(expected);
  });

  const rulesCases: Array<[string, Inquiry, boolean]> = [
    [
      'string inquiries do not match rule-based policies',
      createInquiry({
        subject: 'Henry',
        action: 'get',
        resource: 'myrn:example.com:resource:123',
        context: { owner: 'Henry', ip: '127.0.0.1' },
      }),
      false,
    ],
    [
      'Nina may read a numbered issue',
      createInquiry({ subject: 'Nina', action: 'read', resource: { id: '7', magazine: 'Tech1' } }),
      true,
    ],
    [
      'Nina may not read an issue without a number',
      createInquiry({ subject: 'Nina', action: 'read', resource: { id: 'seven', magazine: 'Tech1' } }),
      false,
    ],
    [
      'Nina may not delete an issue',
      createInquiry({ subject: 'Nina', action: 'delete', resource: { id: '7', magazine: 'Tech1' } }),
      false,
    ],
  ];

  it.each(rulesCases)('rules checker: %s', async (_description, inquiry, expected) => {
    const guard = new Guard(storage, rules);

    expect(await guard.isAllowed(inquiry)).toBe(expected);
  });

  it('explains a denial by the deny policies that matched', async () => {
    const guard = new Guard(storage, regex);

    const decision = await guard.decide(
      createInquiry({ subject: 'Max', resource: 'report', action: 'print' })
    );

    expect(decision).toEqual({ allowed: false, reason: 'matched-deny', policies: ['3'] });
  });

  it('explains an approval by the allow policies that matched', async () => {
    const guard = new Guard(storage, regex);

    const decision = await guard.decide(
      createInquiry({ subject: 'Max', resource: 'report', action: 'update' })
    );

    expect(decision).toEqual({ allowed: true, reason: 'matched-allow', policies: ['2'] });
  });

  it('explains a denial without a matching policy', async () => {
    const guard = new Guard(storage, regex);

    expect(await guard.decide(createInquiry())).toEqual({
      allowed: false,
      reason: 'no-matching-policies',
      policies: [],
    });
  });
});

function maxReadsBooks(uid: string, effect: 'allow' | 'deny'): Policy {
  return createPolicy({ uid, effect, subjects: ['Max'], resources: ['books'], actions: ['read'] });
}

describe('deny overrides', () => {
  const allow = maxReadsBooks('allow', 'allow');
  const deny = maxReadsBooks('deny', 'deny');
  const inquiry = createInquiry({ subject: 'Max', resource: 'books', action: 'read' });

  const orders: Array<[string, Policy[]]> = [
    ['allow first', [allow, deny]],
    ['deny first', [deny, allow]],
  ];

  it.each(orders)('denies with %s', async (_order, ordered) => {
    const guard = new Guard(await createMemoryStorage(ordered), new ExactChecker());

    expect(await guard.decide(inquiry)).toEqual({
      allowed: false,
      reason: 'matched-deny',
      policies: ['deny'],
    });
  });
});

describe('default deny', () => {
  it('denies everything for an empty storage', async () => {
    const guard = new Guard(new MemoryStorage(), new ExactChecker());

    expect(await guard.isAllowed(createInquiry({ subject: 'Max' }))).toBe(false);
    expect((await guard.decide(createInquiry())).reason).toBe('no-policies');
  });
});

describe('fail closed', () => {
  const allowAll = createPolicy({
    uid: 'all',
    effect: 'allow',
    subjects: ['<.*>'],
    resources: ['<.*>'],
    actions: ['<.*>'],
  });

  it('denies when the storage fails', async () => {
    const storage = await createMemoryStorage([allowAll]);
    vi.spyOn(storage, 'findForInquiry').mockRejectedValue(new Error('database unavailable'));
    const logger = createCapturingLogger();
    const guard = new Guard(storage, new RegexChecker(new PatternCompiler()), { logger });

    const decision = await guard.decide(createInquiry({ subject: 'Max' }));

    expect(decision).toEqual({ allowed: false, reason: 'error', policies: [] });
    expect(logger.entries.filter((entry) => entry.level === 'error')).toEqual([
      {
        level: 'error',
        message: 'Policy evaluation failed, access denied',
        data: { error: 'database unavailable', errorName: 'Error', checker: 'regex' },
      },
    ]);
  });

  it('denies when the storage throws synchronously', async () => {
    const storage = await createMemoryStorage([allowAll]);
    vi.spyOn(storage, 'findForInquiry').mockImplementation(() => {
      throw new TypeError('broken driver');
    });
    const guard = new Guard(storage, new RegexChecker(new PatternCompiler()));

    expect(await guard.isAllowed(createInquiry({ subject: 'Max' }))).toBe(false);
  });

  it('denies when a pattern is malformed, even if another policy allows', async () => {
    const malformed = createPolicy({
      uid: 'bad',
      effect: 'allow',
      subjects: ['<Max'],
      resources: ['x'],
      actions: ['y'],
    });
    const storage = await createMemoryStorage([allowAll, malformed]);
    const logger = createCapturingLogger();
    const guard = new Guard(storage, new RegexChecker(new PatternCompiler()), { logger });

    const decision = await guard.decide(
      createInquiry({ subject: 'Max', resource: 'x', action: 'y' })
    );

    expect(decision.reason).toBe('error');
    expect(logger.entries.find((entry) => entry.level === 'error')?.data).toMatchObject({
      errorName: 'MalformedTemplateError',
    });
  });
});

describe('auditing', () => {
  const policy = maxReadsBooks('p', 'allow');
  const inquiry = createInquiry({ subject: 'Max', resource: 'books', action: 'read' });

  it('records every decision with its inquiry', async () => {
    const records: DecisionRecord[] = [];
    const guard = new Guard(await createMemoryStorage([policy]), new ExactChecker(), {
      auditLogger: (record) => records.push(record),
    });

    await guard.isAllowed(inquiry);

    expect(records).toEqual([{ allowed: true, reason: 'matched-allow', policies: ['p'], inquiry }]);
  });

  it('keeps the decision when the audit logger fails', async () => {
    const logger = createCapturingLogger();
    const guard = new Guard(await createMemoryStorage([policy]), new ExactChecker(), {
      logger,
      auditLogger: () => {
        throw new Error('audit sink full');
      },
    });

    expect(await guard.isAllowed(inquiry)).toBe(true);
    expect(logger.entries).toContainEqual({
      level: 'error',
      message: 'Audit logger failed',
      data: { error: 'audit sink full' },
    });
  });
});

describe('with a GuardCache', () => {
  it('retrieves candidates through the cache', async () => {
    const policy = maxReadsBooks('p', 'allow');
    const storage = await createMemoryStorage([policy]);
    const findForInquiry = vi.spyOn(storage, 'findForInquiry');
    const cache = new GuardCache(storage);
    cache.markFresh();
    const guard = new Guard(storage, new ExactChecker(), { cache });
    const inquiry = createInquiry({ subject: 'Max', resource: 'books', action: 'read' });

    expect(await guard.isAllowed(inquiry)).toBe(true);
    expect(await guard.isAllowed(inquiry)).toBe(true);
    expect(findForInquiry).toHaveBeenCalledTimes(1);
  });
});
