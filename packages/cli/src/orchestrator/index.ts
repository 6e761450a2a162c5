/**
 * Orchestrator module exports
 */

export type { Services, ServiceCallbacks } from './services.js';
export { initializeServices, performHealthChecks, requireUsableBackend } from './services.js';

export { orchestrateSynthesis, failureToError, toCampaignContext } from './orchestrator.js';
