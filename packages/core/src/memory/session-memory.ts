/**
 * Session Memory
 *
 * Run-scoped state carried from one segment to the next:
 * - Characters and locations (case-insensitive, first-seen casing kept)
 * - Plot points in arrival order
 * - A bounded running summary built from narrations
 *
 * Entity sets and plot points only grow. The running summary is the only
 * part that is ever compacted.
 */

import { splitFirstSentence, splitSentences } from '../segmentation/text-breaks.js';
import type { CampaignContext, ContextDigest, ExtractedElements, PlotPoint } from '../types/narration.js';

/**
 * Running summary entry
 */
export interface SummaryEntry {
  /** Segment whose narration produced this entry */
  segmentIndex: number;
  text: string;
  /** Highest plot point salience of the segment (1-5) */
  salience: number;
}

/**
 * Session memory configuration
 */
export interface SessionMemoryConfig {
  /** Running summary size that triggers compaction (default: 2000) */
  summaryMaxChars: number;
  /** Most recent summary entries kept whole by compaction (default: 3) */
  recentEntries: number;
  /** Lead sentences of each narration added to the summary (default: 2) */
  leadSentences: number;
  /** Cap on one summary entry (default: 240) */
  leadMaxChars: number;
  /** Plot points offered to the digest (default: 5) */
  recentEvents: number;
}

/**
 * Default session memory configuration
 */
export const DEFAULT_SESSION_MEMORY_CONFIG: SessionMemoryConfig = {
  summaryMaxChars: 2000,
  recentEntries: 3,
  leadSentences: 2,
  leadMaxChars: 240,
  recentEvents: 5,
};

/**
 * Position and campaign data stamped onto a digest
 */
export interface SnapshotOptions {
  segmentIndex?: number;
  totalSegments?: number;
  campaign?: CampaignContext;
}

/**
 * Counters for progress and diagnostics
 */
export interface MemoryStats {
  characters: number;
  locations: number;
  plotPoints: number;
  summaryEntries: number;
  summaryChars: number;
  compactions: number;
}

/**
 * Accumulating state for one synthesis run
 */
export class SessionMemory {
  private readonly config: SessionMemoryConfig;
  private readonly characterNames = new Map<string, string>();
  private readonly locationNames = new Map<string, string>();
  private readonly points: PlotPoint[] = [];
  private entries: SummaryEntry[] = [];
  private compactions = 0;
  private lastSegmentIndex = -1;

  constructor(config: Partial<SessionMemoryConfig> = {}) {
    this.config = { ...DEFAULT_SESSION_MEMORY_CONFIG, ...config };
  }

  /**
   * Merge a segment's extraction into memory
   */
  register(elements: ExtractedElements): void {
    for (const name of elements.characters) {
      addName(this.characterNames, name);
    }
    for (const name of elements.locations) {
      addName(this.locationNames, name);
    }
    for (const point of elements.events) {
      this.points.push({ ...point });
    }
    this.lastSegmentIndex = Math.max(this.lastSegmentIndex, elements.segmentIndex);
  }

  /**
   * Add the lead of a narration to the running summary
   */
  recordNarration(segmentIndex: number, text: string): void {
    const lead = truncateAtWord(
      splitSentences(text).slice(0, this.config.leadSentences).join(' '),
      this.config.leadMaxChars,
    );
    if (!lead) return;

    const salience = this.points
      .filter((p) => p.segmentIndex === segmentIndex)
      .reduce((max, p) => Math.max(max, p.salience), 1);

    this.entries.push({ segmentIndex, text: lead, salience });

    if (this.summary.length > this.config.summaryMaxChars) {
      this.compact();
    }
  }

  /**
   * Shrink the running summary back under summaryMaxChars
   *
   * The most recent entries stay whole. Older entries are cut to their
   * first sentence, then dropped lowest salience first (oldest on ties).
   */
  compact(): void {
    const limit = this.config.summaryMaxChars;
    if (summaryLength(this.entries) <= limit) return;

    const recentCount = Math.min(this.config.recentEntries, this.entries.length);
    const recent = this.entries.slice(this.entries.length - recentCount);
    let older = this.entries.slice(0, this.entries.length - recentCount).map((entry) => ({
      ...entry,
      text: splitFirstSentence(entry.text).first.trim(),
    }));

    const dropOrder = [...older].sort((a, b) => a.salience - b.salience || a.segmentIndex - b.segmentIndex);
    for (const victim of dropOrder) {
      if (summaryLength([...older, ...recent]) <= limit) break;
      older = older.filter((entry) => entry !== victim);
    }

    let kept = [...older, ...recent];
    while (summaryLength(kept) > limit && kept.length > 1) {
      kept = kept.slice(1);
    }
    const [only] = kept;
    if (kept.length === 1 && only && only.text.length > limit) {
      kept = [{ ...only, text: truncateAtWord(only.text, limit) }];
    }

    this.entries = kept;
    this.compactions++;
  }

  /**
   * Bounded digest for the next backend call. `text` never exceeds maxChars.
   *
   * Space goes to characters, then locations, then the most recent plot
   * points, then the tail of the running summary.
   */
  snapshotContext(maxChars: number, options: SnapshotOptions = {}): ContextDigest {
    const segmentIndex = options.segmentIndex ?? Math.max(0, this.lastSegmentIndex);
    const lines: string[] = [];
    let used = 0;

    const remaining = (): number => maxChars - used - (lines.length > 0 ? 1 : 0);
    const push = (line: string): void => {
      used += line.length + (lines.length > 0 ? 1 : 0);
      lines.push(line);
    };

    const characters = fitList('Characters: ', this.characters, ', ', remaining());
    if (characters.line) push(characters.line);

    const locations = fitList('Locations: ', this.locations, ', ', remaining());
    if (locations.line) push(locations.line);

    const latest = this.points.slice(-this.config.recentEvents).map((p) => p.text);
    const events = fitList('Recent events: ', [...latest].reverse(), ' ', remaining());
    const recentEvents = [...events.items].reverse();
    if (recentEvents.length > 0) push(`Recent events: ${recentEvents.join(' ')}`);

    let summary = '';
    const summaryLabel = 'Story so far: ';
    const room = remaining() - summaryLabel.length;
    if (room > 0 && this.summary) {
      summary = tailAtWord(this.summary, room);
      if (summary) push(`${summaryLabel}${summary}`);
    }

    const digest: ContextDigest = {
      text: lines.join('\n'),
      characters: characters.items,
      locations: locations.items,
      recentEvents,
      summary,
      segmentIndex,
      totalSegments: options.totalSegments ?? segmentIndex + 1,
    };
    if (options.campaign) {
      digest.campaign = options.campaign;
    }
    return digest;
  }

  get characters(): string[] {
    return [...this.characterNames.values()];
  }

  get locations(): string[] {
    return [...this.locationNames.values()];
  }

  get plotPoints(): readonly PlotPoint[] {
    return this.points;
  }

  get summaryEntries(): readonly SummaryEntry[] {
    return this.entries;
  }

  /**
   * Running summary as one paragraph
   */
  get summary(): string {
    return this.entries.map((entry) => entry.text).join(' ');
  }

  hasCharacter(name: string): boolean {
    return this.characterNames.has(name.toLowerCase());
  }

  hasLocation(name: string): boolean {
    return this.locationNames.has(name.toLowerCase());
  }

  stats(): MemoryStats {
    return {
      characters: this.characterNames.size,
      locations: this.locationNames.size,
      plotPoints: this.points.length,
      summaryEntries: this.entries.length,
      summaryChars: this.summary.length,
      compactions: this.compactions,
    };
  }
}

function addName(names: Map<string, string>, name: string): void {
  const trimmed = name.trim();
  const key = trimmed.toLowerCase();
  if (trimmed && !names.has(key)) {
    names.set(key, trimmed);
  }
}

function summaryLength(entries: readonly SummaryEntry[]): number {
  return entries.map((entry) => entry.text).join(' ').length;
}

/**
 * Label plus as many items as fit in maxChars
 */
function fitList(
  label: string,
  items: readonly string[],
  separator: string,
  maxChars: number,
): { line: string; items: string[] } {
  const taken: string[] = [];
  let length = label.length;

  for (const item of items) {
    const cost = item.length + (taken.length > 0 ? separator.length : 0);
    if (length + cost > maxChars) break;
    taken.push(item);
    length += cost;
  }

  return { line: taken.length > 0 ? `${label}${taken.join(separator)}` : '', items: taken };
}

function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.lastIndexOf(' ', maxChars);
  return text.slice(0, cut > 0 ? cut : maxChars).trimEnd();
}

/**
 * Last maxChars of text, starting on a word
 */
function tailAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const start = text.length - maxChars;
  const space = text.indexOf(' ', start);
  return (space >= 0 && space < text.length - 1 ? text.slice(space + 1) : text.slice(start)).trim();
}
