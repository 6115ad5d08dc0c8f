import { and, asc, eq, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { POLICY_FIELDS, PolicyExistsError, PolicyUpdateError } from '@tessera/protocol';
import type { CheckerDescriptor, Id, Inquiry, Policy } from '@tessera/protocol';
import type { Database } from './db.js';
import type { Storage } from '../interfaces/index.js';
import { policies } from './schema/index.js';
import { policyToRow, rowToPolicy } from './mapping.js';
import { createInquiryFilter, type InquiryFilter } from './filters.js';
import { assertValidPage } from '../pagination.js';

const UNIQUE_VIOLATION = '23505';

/**
 * Check if a database error is a unique-constraint violation.
 * Looks through `cause` for errors wrapped by the driver.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === UNIQUE_VIOLATION) return true;
  return 'cause' in error && isUniqueViolation(error.cause);
}

/**
 * Translate a push-down filter into SQL conditions.
 */
export function filterConditions(filter: InquiryFilter): SQL[] {
  const conditions: SQL[] = [];

  if (filter.type) {
    conditions.push(eq(policies.type, filter.type));
  }

  const { contains } = filter;
  if (contains) {
    for (const field of POLICY_FIELDS) {
      conditions.push(sql`${policies[field]} @> ${JSON.stringify([contains[field]])}::jsonb`);
    }
  }

  return conditions;
}

/**
 * Storage backed by Postgres.
 *
 * Candidate retrieval pushes the checker's filter down to the database;
 * the checker still runs over every returned row.
 */
export class PgStorage implements Storage {
  constructor(private db: Database) {}

  async add(policy: Policy): Promise<void> {
    const now = new Date();
    try {
      await this.db.insert(policies).values({
        ...policyToRow(policy),
        createdAt: now,
        updatedAt: now,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new PolicyExistsError(policy.uid);
      }
      throw error;
    }
  }

  async get(uid: Id): Promise<Policy | null> {
    const [row] = await this.db.select().from(policies).where(eq(policies.uid, uid));
    return row ? rowToPolicy(row) : null;
  }

  async getAll(limit: number, offset: number): Promise<Policy[]> {
    assertValidPage(limit, offset);

    const rows = await this.db
      .select()
      .from(policies)
      .orderBy(asc(policies.uid))
      .limit(limit)
      .offset(offset);

    return rows.map(rowToPolicy);
  }

  async findForInquiry(inquiry: Inquiry, checker?: CheckerDescriptor): Promise<Policy[]> {
    const conditions = filterConditions(createInquiryFilter(inquiry, checker));

    const rows = await this.db
      .select()
      .from(policies)
      .where(and(...conditions))
      .orderBy(asc(policies.uid));

    return rows.map(rowToPolicy);
  }

  async update(policy: Policy): Promise<void> {
    const { uid, ...columns } = policyToRow(policy);

    const rows = await this.db
      .update(policies)
      .set({ ...columns, updatedAt: new Date() })
      .where(eq(policies.uid, uid))
      .returning({ uid: policies.uid });

    if (rows.length === 0) {
      throw new PolicyUpdateError(uid, 'policy does not exist');
    }
  }

  async delete(uid: Id): Promise<void> {
    await this.db.delete(policies).where(eq(policies.uid, uid));
  }
}
