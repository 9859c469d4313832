/**
 * @vitalgrid/core - Shared foundations for VitalGrid packages
 *
 * - Reliability: error taxonomy and structured JSON logging
 * - Config: sampler settings schema and environment loader
 */

// Reliability exports (errors, logging)
export * from './reliability/index.js';

// Configuration exports
export * from './config/index.js';
