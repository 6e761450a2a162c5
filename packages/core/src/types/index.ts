export type {
  Transcript,
  BoundaryKind,
  Boundary,
  Segment,
  TokenEstimator,
} from './transcript.js';

export type {
  PlotPoint,
  ExtractedElements,
  CampaignContext,
  ContextDigest,
  StyleHint,
  SegmentNarration,
  FailoverReason,
  FailoverEvent,
  FailureReason,
  SynthesisResult,
} from './narration.js';

export type {
  BackendKind,
  NarrateOptions,
  GenerationBackend,
  QuotaAuthority,
} from './backend.js';
