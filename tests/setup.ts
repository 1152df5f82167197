// Global test setup — runs before every test file, ahead of any src import.
// Each file gets its own in-memory database and stub integrations.
process.env.NODE_ENV = 'test';
process.env.DATABASE_URL = ':memory:';
process.env.LOG_LEVEL = 'silent';
process.env.INTEGRATIONS_MODE = 'stub';
process.env.APP_BASE_URL = 'http://concierge.test';
process.env.SESSION_SECRET = 'test-secret-value';
process.env.STRIPE_WEBHOOK_SECRET = 'whsec_test-secret';
process.env.STRIPE_PRICE_PROPERTY_MONTHLY = 'price_test_monthly';
process.env.ADMIN_EMAILS = 'root@example.com';
process.env.PLATFORM_FEE_PERCENT = '2';
process.env.PLATFORM_FEE_FLAT_CENTS = '30';
process.env.SUMMARY_THROTTLE_MINUTES = '10';
