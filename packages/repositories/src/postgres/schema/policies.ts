import { pgTable, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { Effect, PolicyDocument, PolicyType } from '@tessera/protocol';

/**
 * Policies table - one row per policy, conditions stored as jsonb documents.
 *
 * `type` is denormalized from the conditions so that candidate retrieval can
 * filter by checker family without reading the documents.
 */
export const policies = pgTable(
  'tessera_policies',
  {
    uid: text('uid').primaryKey(),
    type: text('type').$type<PolicyType>().notNull(),
    effect: text('effect').$type<Effect>().notNull(),
    description: text('description'),
    subjects: jsonb('subjects').$type<PolicyDocument['subjects']>().notNull(),
    resources: jsonb('resources').$type<PolicyDocument['resources']>().notNull(),
    actions: jsonb('actions').$type<PolicyDocument['actions']>().notNull(),
    context: jsonb('context').$type<PolicyDocument['context']>().notNull(),
    startTag: text('start_tag').notNull().default('<'),
    endTag: text('end_tag').notNull().default('>'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('tessera_policies_type_idx').on(table.type)]
);

export type PolicyRow = typeof policies.$inferSelect;
export type NewPolicyRow = typeof policies.$inferInsert;
