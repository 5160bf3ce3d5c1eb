/**
 * Jest Setup File
 *
 * Global environment for all tests.
 */

// Keep per-file OK/FAIL lines out of test output
process.env.LOG_LEVEL = 'error'
process.env.NODE_ENV = 'test'
