/**
 * @chronicler/test-utils
 *
 * Shared test utilities for Chronicler
 */

// Mock backends
export {
  createMockBackend,
  createEchoBackend,
  type MockBackend,
  type MockBackendConfig,
  type RecordedCall,
} from './mocks/mock-backend.js';

// Quota authority
export {
  createTrackingQuota,
  type TrackingQuota,
  type TrackingQuotaConfig,
  type QuotaRequest,
} from './mocks/mock-quota.js';

// Builders
export {
  SessionLogBuilder,
  sessionLog,
  fillerText,
  buildProse,
  buildStructuredSession,
  type StructuredSessionSpec,
} from './builders/session-log-builder.js';
