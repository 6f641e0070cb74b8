/**
 * Drizzle schema for the SQLite store.
 * `chat_history` keeps the planning conversation and saved plans;
 * `profile_memories` keeps profile records and preferences with their embeddings.
 */

import { sql } from 'drizzle-orm';
import { text, integer, sqliteTable, index } from 'drizzle-orm/sqlite-core';
import type { ExtractedProfile, MacroTargets, Recipe } from '@/types/nutrition';

export type PlanMetadata = {
  userRequest: string;
  recipes: Recipe[];
  timestamp: string;
};

export const chatHistory = sqliteTable('chat_history', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: text('user_id').notNull(),
  sessionId: text('session_id').notNull(),
  role: text('role', { enum: ['user', 'assistant', 'system'] }).notNull(),
  content: text('content').notNull(),
  metadata: text('metadata', { mode: 'json' }).$type<PlanMetadata>(),
  createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
}, (table) => ({
  userSessionIdx: index('idx_chat_history_user_session').on(table.userId, table.sessionId),
  createdAtIdx: index('idx_chat_history_created_at').on(table.createdAt),
}));

export type ProfilePayload = {
  fields: ExtractedProfile;
  macros: MacroTargets;
};

export const profileMemories = sqliteTable('profile_memories', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  category: text('category', {
    enum: ['nutrition_profile', 'dietary_preference', 'allergy', 'medical_condition', 'dislike', 'general'],
  }).notNull(),
  text: text('text').notNull(),
  medicalInfo: integer('medical_info', { mode: 'boolean' }).notNull().default(false),
  payload: text('payload', { mode: 'json' }).$type<ProfilePayload>(),
  embedding: text('embedding', { mode: 'json' }).$type<number[]>().notNull(),
  createdAt: text('created_at').notNull(),
}, (table) => ({
  userIdx: index('idx_profile_memories_user').on(table.userId, table.category),
}));
