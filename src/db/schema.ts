import { sql } from 'drizzle-orm';
import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { v4 as uuid } from 'uuid';

// Column declarations mirror src/db/schema.sql, which is applied at startup.

const id = () =>
  text('id')
    .primaryKey()
    .$defaultFn(() => uuid());

const timestamps = {
  createdAt: integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
};

export type BillingStatus = 'pending' | 'active' | 'past_due' | 'canceled';
export type TeamRole = 'owner' | 'admin' | 'staff';
export type IntegrationProvider = 'hostaway' | 'stripe_connect';
export type MessageSender = 'guest' | 'assistant' | 'system' | 'host';
export type PurchaseStatus = 'pending' | 'paid' | 'refunded' | 'canceled' | 'failed';
export type ActionPriority = 'none' | 'low' | 'medium' | 'high' | 'urgent';
export type EscalationLevel = 'low' | 'medium' | 'high';

export const pmcs = sqliteTable('pmcs', {
  id: id(),
  name: text('name').notNull(),
  email: text('email').notNull(),
  active: integer('active', { mode: 'boolean' }).notNull().default(false),
  syncEnabled: integer('sync_enabled', { mode: 'boolean' }).notNull().default(true),
  lastSyncedAt: integer('last_synced_at', { mode: 'timestamp_ms' }),
  billingStatus: text('billing_status').$type<BillingStatus>().notNull().default('pending'),
  stripeCustomerId: text('stripe_customer_id'),
  stripeSubscriptionId: text('stripe_subscription_id'),
  signupPaidAt: integer('signup_paid_at', { mode: 'timestamp_ms' }),
  ...timestamps,
});

export const pmcUsers = sqliteTable(
  'pmc_users',
  {
    id: id(),
    pmcId: text('pmc_id')
      .notNull()
      .references(() => pmcs.id, { onDelete: 'cascade' }),
    email: text('email').notNull(),
    fullName: text('full_name'),
    role: text('role').$type<TeamRole>().notNull().default('staff'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    isSuperuser: integer('is_superuser', { mode: 'boolean' }).notNull().default(false),
    notificationPrefs: text('notification_prefs', { mode: 'json' })
      .$type<Record<string, boolean>>()
      .notNull()
      .$defaultFn(() => ({})),
    timezone: text('timezone'),
    lastLoginAt: integer('last_login_at', { mode: 'timestamp_ms' }),
    ...timestamps,
  },
  (table) => [uniqueIndex('pmc_users_pmc_email_uidx').on(table.pmcId, table.email)],
);

export const pmcIntegrations = sqliteTable(
  'pmc_integrations',
  {
    id: id(),
    pmcId: text('pmc_id')
      .notNull()
      .references(() => pmcs.id, { onDelete: 'cascade' }),
    provider: text('provider').$type<IntegrationProvider>().notNull(),
    accountId: text('account_id'),
    apiSecret: text('api_secret'),
    accessToken: text('access_token'),
    tokenExpiresAt: integer('token_expires_at', { mode: 'timestamp_ms' }),
    isConnected: integer('is_connected', { mode: 'boolean' }).notNull().default(false),
    lastSyncedAt: integer('last_synced_at', { mode: 'timestamp_ms' }),
    lastError: text('last_error'),
    ...timestamps,
  },
  (table) => [uniqueIndex('pmc_integrations_pmc_provider_uidx').on(table.pmcId, table.provider)],
);

export const properties = sqliteTable(
  'properties',
  {
    id: id(),
    pmcId: text('pmc_id')
      .notNull()
      .references(() => pmcs.id, { onDelete: 'cascade' }),
    integrationId: text('integration_id').references(() => pmcIntegrations.id, {
      onDelete: 'set null',
    }),
    provider: text('provider').notNull().default('manual'),
    externalPropertyId: text('external_property_id'),
    slug: text('slug').notNull(),
    name: text('name').notNull(),
    address: text('address'),
    description: text('description'),
    houseRules: text('house_rules'),
    wifiName: text('wifi_name'),
    wifiPassword: text('wifi_password'),
    checkInTime: text('check_in_time'),
    checkOutTime: text('check_out_time'),
    emergencyPhone: text('emergency_phone'),
    heroImageUrl: text('hero_image_url'),
    chatEnabled: integer('chat_enabled', { mode: 'boolean' }).notNull().default(true),
    lastSyncedAt: integer('last_synced_at', { mode: 'timestamp_ms' }),
    deletedAt: integer('deleted_at', { mode: 'timestamp_ms' }),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('properties_pmc_slug_uidx')
      .on(table.pmcId, table.slug)
      .where(sql`deleted_at IS NULL`),
    uniqueIndex('properties_pmc_external_uidx').on(
      table.pmcId,
      table.provider,
      table.externalPropertyId,
    ),
  ],
);

export const reservations = sqliteTable(
  'reservations',
  {
    id: id(),
    propertyId: text('property_id')
      .notNull()
      .references(() => properties.id, { onDelete: 'cascade' }),
    externalReservationId: text('external_reservation_id').notNull(),
    guestName: text('guest_name'),
    phoneLast4: text('phone_last4'),
    arrivalDate: text('arrival_date').notNull(),
    departureDate: text('departure_date').notNull(),
    checkInTime: text('check_in_time'),
    checkOutTime: text('check_out_time'),
    status: text('status').notNull().default('confirmed'),
    guestCount: integer('guest_count'),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('reservations_property_external_uidx').on(
      table.propertyId,
      table.externalReservationId,
    ),
    index('reservations_property_arrival_idx').on(table.propertyId, table.arrivalDate),
  ],
);

export const guides = sqliteTable(
  'guides',
  {
    id: id(),
    propertyId: text('property_id')
      .notNull()
      .references(() => properties.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    category: text('category'),
    shortDescription: text('short_description'),
    longDescription: text('long_description'),
    bodyHtml: text('body_html'),
    imageUrl: text('image_url'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    sortOrder: integer('sort_order').notNull().default(0),
    ...timestamps,
  },
  (table) => [index('guides_property_idx').on(table.propertyId, table.sortOrder)],
);

export const upgrades = sqliteTable(
  'upgrades',
  {
    id: id(),
    propertyId: text('property_id')
      .notNull()
      .references(() => properties.id, { onDelete: 'cascade' }),
    slug: text('slug').notNull(),
    title: text('title').notNull(),
    shortDescription: text('short_description'),
    longDescription: text('long_description'),
    priceCents: integer('price_cents').notNull(),
    currency: text('currency').notNull().default('usd'),
    imageUrl: text('image_url'),
    stripePriceId: text('stripe_price_id'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    sortOrder: integer('sort_order').notNull().default(0),
    ...timestamps,
  },
  (table) => [uniqueIndex('upgrades_property_slug_uidx').on(table.propertyId, table.slug)],
);

export const chatSessions = sqliteTable(
  'chat_sessions',
  {
    id: id(),
    propertyId: text('property_id')
      .notNull()
      .references(() => properties.id, { onDelete: 'cascade' }),
    reservationId: text('reservation_id').references(() => reservations.id, {
      onDelete: 'set null',
    }),
    source: text('source').notNull().default('guest_web'),
    reservationStatus: text('reservation_status').notNull().default('pre_booking'),
    isVerified: integer('is_verified', { mode: 'boolean' }).notNull().default(false),
    phoneLast4: text('phone_last4'),
    externalReservationId: text('external_reservation_id'),
    guestName: text('guest_name'),
    arrivalDate: text('arrival_date'),
    departureDate: text('departure_date'),
    language: text('language'),
    actionPriority: text('action_priority').$type<ActionPriority>().notNull().default('none'),
    guestMood: text('guest_mood'),
    guestMoodConfidence: integer('guest_mood_confidence'),
    emotionalSignals: text('emotional_signals', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .$defaultFn(() => []),
    heatScore: integer('heat_score').notNull().default(0),
    escalationLevel: text('escalation_level').$type<EscalationLevel>(),
    assignedTo: text('assigned_to'),
    internalNote: text('internal_note'),
    aiSummary: text('ai_summary'),
    aiSummaryUpdatedAt: integer('ai_summary_updated_at', { mode: 'timestamp_ms' }),
    isResolved: integer('is_resolved', { mode: 'boolean' }).notNull().default(false),
    resolvedAt: integer('resolved_at', { mode: 'timestamp_ms' }),
    lastActivityAt: integer('last_activity_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    ...timestamps,
  },
  (table) => [index('chat_sessions_property_activity_idx').on(table.propertyId, table.lastActivityAt)],
);

export const chatMessages = sqliteTable(
  'chat_messages',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sessionId: text('session_id')
      .notNull()
      .references(() => chatSessions.id, { onDelete: 'cascade' }),
    sender: text('sender').$type<MessageSender>().notNull(),
    content: text('content').notNull(),
    clientMessageId: text('client_message_id'),
    category: text('category'),
    logType: text('log_type'),
    sentiment: text('sentiment'),
    sentimentData: text('sentiment_data', { mode: 'json' }).$type<Record<string, unknown>>(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index('chat_messages_session_idx').on(table.sessionId, table.id)],
);

export const upgradePurchases = sqliteTable(
  'upgrade_purchases',
  {
    id: id(),
    pmcId: text('pmc_id')
      .notNull()
      .references(() => pmcs.id, { onDelete: 'cascade' }),
    propertyId: text('property_id')
      .notNull()
      .references(() => properties.id, { onDelete: 'cascade' }),
    // No cascade: an upgrade with purchases is deactivated, never deleted.
    upgradeId: text('upgrade_id')
      .notNull()
      .references(() => upgrades.id),
    guestSessionId: text('guest_session_id')
      .notNull()
      .references(() => chatSessions.id, { onDelete: 'cascade' }),
    amountCents: integer('amount_cents').notNull(),
    platformFeeCents: integer('platform_fee_cents').notNull(),
    netAmountCents: integer('net_amount_cents').notNull(),
    currency: text('currency').notNull(),
    status: text('status').$type<PurchaseStatus>().notNull().default('pending'),
    attempt: integer('attempt').notNull().default(0),
    stripeCheckoutSessionId: text('stripe_checkout_session_id'),
    checkoutUrl: text('checkout_url'),
    checkoutCreatedAt: integer('checkout_created_at', { mode: 'timestamp_ms' }),
    stripePaymentIntentId: text('stripe_payment_intent_id'),
    stripeDestinationAccountId: text('stripe_destination_account_id'),
    paidAt: integer('paid_at', { mode: 'timestamp_ms' }),
    refundedAt: integer('refunded_at', { mode: 'timestamp_ms' }),
    refundedAmountCents: integer('refunded_amount_cents'),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('upgrade_purchases_session_upgrade_uidx').on(
      table.guestSessionId,
      table.upgradeId,
    ),
    uniqueIndex('upgrade_purchases_checkout_session_uidx').on(table.stripeCheckoutSessionId),
  ],
);

export const stripeEvents = sqliteTable('stripe_events', {
  id: text('id').primaryKey(),
  type: text('type').notNull(),
  receivedAt: integer('received_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
});

export const pmcMessages = sqliteTable(
  'pmc_messages',
  {
    id: id(),
    pmcId: text('pmc_id')
      .notNull()
      .references(() => pmcs.id, { onDelete: 'cascade' }),
    dedupeKey: text('dedupe_key').notNull(),
    type: text('type').notNull(),
    subject: text('subject').notNull(),
    body: text('body').notNull(),
    severity: text('severity').notNull().default('info'),
    status: text('status').$type<'open' | 'resolved'>().notNull().default('open'),
    isRead: integer('is_read', { mode: 'boolean' }).notNull().default(false),
    propertyId: text('property_id'),
    upgradePurchaseId: text('upgrade_purchase_id'),
    upgradeId: text('upgrade_id'),
    guestSessionId: text('guest_session_id'),
    linkUrl: text('link_url'),
    ...timestamps,
  },
  (table) => [uniqueIndex('pmc_messages_pmc_dedupe_uidx').on(table.pmcId, table.dedupeKey)],
);

export const analyticsEvents = sqliteTable(
  'analytics_events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    pmcId: text('pmc_id').notNull(),
    propertyId: text('property_id'),
    sessionId: text('session_id'),
    threadId: text('thread_id'),
    messageId: text('message_id'),
    parentId: text('parent_id'),
    eventName: text('event_name').notNull(),
    sender: text('sender'),
    variant: text('variant'),
    length: integer('length'),
    data: text('data', { mode: 'json' })
      .$type<Record<string, unknown>>()
      .notNull()
      .$defaultFn(() => ({})),
    createdAt: integer('created_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index('analytics_events_pmc_created_idx').on(table.pmcId, table.createdAt)],
);

export const events = sqliteTable(
  'events',
  {
    id: id(),
    pmcId: text('pmc_id'),
    type: text('type').notNull(),
    payload: text('payload').notNull().default('{}'),
    requestId: text('request_id'),
    span: text('span'),
    durationMs: integer('duration_ms'),
    entityType: text('entity_type'),
    entityId: text('entity_id'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index('events_type_idx').on(table.type)],
);

export type Pmc = typeof pmcs.$inferSelect;
export type PmcUser = typeof pmcUsers.$inferSelect;
export type PmcIntegration = typeof pmcIntegrations.$inferSelect;
export type Property = typeof properties.$inferSelect;
export type Reservation = typeof reservations.$inferSelect;
export type Guide = typeof guides.$inferSelect;
export type Upgrade = typeof upgrades.$inferSelect;
export type ChatSession = typeof chatSessions.$inferSelect;
export type ChatMessage = typeof chatMessages.$inferSelect;
export type UpgradePurchase = typeof upgradePurchases.$inferSelect;
export type PmcMessage = typeof pmcMessages.$inferSelect;
export type AnalyticsEvent = typeof analyticsEvents.$inferSelect;
export type TelemetryEvent = typeof events.$inferSelect;
