import { jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

// One row per logical collection; the payload holds the whole array.
export const collections = pgTable('collections', {
  collectionKey: text('collection_key').primaryKey(),
  payload: jsonb('payload').$type<unknown[]>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});
