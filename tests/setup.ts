// Set env vars before any module reads them. Tests never open a database
// connection; persistence is replaced by the in-memory store in tests/support.
process.env.NODE_ENV = 'test';
process.env.DB_NAME = process.env.DB_NAME_TEST || 'autodeal_test';
process.env.MARKET_SOURCES = '';
process.env.OPENAI_API_KEY = '';
process.env.RATE_LIMIT_MAX = '1000';
