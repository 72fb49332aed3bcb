/**
 * Runs before every test file (vitest setupFiles).
 * The logger reads LOG_LEVEL when it is first imported, so it is set here.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.BCRYPT_COST = process.env.BCRYPT_COST ?? '4';
