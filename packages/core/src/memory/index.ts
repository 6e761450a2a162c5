export { SessionMemory, DEFAULT_SESSION_MEMORY_CONFIG } from './session-memory.js';
export type { SummaryEntry, SessionMemoryConfig, SnapshotOptions, MemoryStats } from './session-memory.js';
