/**
 * Word lists used by the element extractor, read from the data directory of
 * the core package (the same from src/ and from a build under dist/)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const wordListSchema = z.array(z.string().min(1));
const verbTableSchema = z.record(z.string().min(1), z.number().int().min(1).max(5));

/**
 * Parsed word lists
 */
export interface Lexicon {
  /** Lowercase words never treated as names */
  stopwords: ReadonlySet<string>;
  /** Lowercase action verb -> salience (1-5) */
  actionVerbs: ReadonlyMap<string, number>;
  /** Capitalized nouns that mark a place name ("Forest", "Keep") */
  locationSuffixes: readonly string[];
  /** Lowercase singular creature and role nouns ("orc", "guard") that name no one */
  commonNouns: ReadonlySet<string>;
}

/**
 * Whether a single word is a common noun in the lexicon, in singular or plural form
 */
export function isCommonNoun(word: string, lexicon: Lexicon): boolean {
  const lower = word.toLowerCase();
  const singulars = [lower];
  if (lower.endsWith('ves')) singulars.push(`${lower.slice(0, -3)}f`);
  if (lower.endsWith('es')) singulars.push(lower.slice(0, -2));
  if (lower.endsWith('s')) singulars.push(lower.slice(0, -1));
  return singulars.some((singular) => lexicon.commonNouns.has(singular));
}

let cached: Lexicon | undefined;

/**
 * Nearest directory at or above startDir that holds a package.json
 */
export function findPackageRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
  return dir;
}

function readJson(dataDir: string, fileName: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(dataDir, fileName), 'utf-8'));
}

/**
 * Load the bundled lexicon (read once per process)
 */
export function loadLexicon(): Lexicon {
  if (cached) {
    return cached;
  }

  const dataDir = path.join(findPackageRoot(__dirname), 'data');
  const stopwords = wordListSchema.parse(readJson(dataDir, 'stopwords.json'));
  const verbs = verbTableSchema.parse(readJson(dataDir, 'action-verbs.json'));
  const suffixes = wordListSchema.parse(readJson(dataDir, 'location-suffixes.json'));
  const commonNouns = wordListSchema.parse(readJson(dataDir, 'common-nouns.json'));

  cached = {
    stopwords: new Set(stopwords.map((word) => word.toLowerCase())),
    actionVerbs: new Map(Object.entries(verbs).map(([verb, salience]) => [verb.toLowerCase(), salience])),
    locationSuffixes: suffixes,
    commonNouns: new Set(commonNouns.map((word) => word.toLowerCase())),
  };
  return cached;
}
