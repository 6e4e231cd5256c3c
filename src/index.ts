/**
 * acme-conductor - RFC 8555 ACME client library
 *
 * Main entry point
 */

export * from './lib/index.js';
