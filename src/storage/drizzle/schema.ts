import { boolean, index, pgEnum, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

export const authProviderEnum = pgEnum('auth_provider', ['password', 'federated']);

export const actionTokenPurposeEnum = pgEnum('action_token_purpose', [
  'email_verification',
  'password_reset',
]);

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  username: text('username').notNull().unique('users_username_key'),
  email: text('email').notNull().unique('users_email_key'),
  passwordHash: text('password_hash'),
  externalId: text('external_id').unique('users_external_id_key'),
  authProvider: authProviderEnum('auth_provider').notNull(),
  emailVerified: boolean('email_verified').notNull().default(false),
  profilePictureUrl: text('profile_picture_url'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Per-user statistics row, created alongside every user
 */
export const userStats = pgTable('user_stats', {
  userId: uuid('user_id')
    .primaryKey()
    .references(() => users.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const refreshTokens = pgTable(
  'refresh_tokens',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    sessionId: uuid('session_id').notNull(),
    tokenHash: text('token_hash').notNull().unique('refresh_tokens_token_hash_key'),
    deviceInfo: text('device_info'),
    ipAddress: text('ip_address'),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('refresh_tokens_user_id_idx').on(table.userId),
    expiresIdx: index('refresh_tokens_expires_at_idx').on(table.expiresAt),
  })
);

export const actionTokens = pgTable(
  'action_tokens',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    purpose: actionTokenPurposeEnum('purpose').notNull(),
    tokenHash: text('token_hash').notNull().unique('action_tokens_token_hash_key'),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    usedAt: timestamp('used_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userPurposeIdx: index('action_tokens_user_purpose_idx').on(table.userId, table.purpose),
  })
);

export type UserRow = typeof users.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
export type ActionTokenRow = typeof actionTokens.$inferSelect;
