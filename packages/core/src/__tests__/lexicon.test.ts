import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, describe, it, expect } from 'vitest';

import { findPackageRoot, isCommonNoun, loadLexicon } from '../extraction/lexicon.js';

const coreRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

describe('Lexicon', () => {
  describe('findPackageRoot', () => {
    let tempDir: string | undefined;

    afterEach(() => {
      if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    });

    it('should find the same package from sources and from a build', () => {
      expect(findPackageRoot(path.join(coreRoot, 'src', 'extraction'))).toBe(coreRoot);
      expect(findPackageRoot(path.join(coreRoot, 'dist', 'extraction'))).toBe(coreRoot);
    });

    it('should stop at the nearest package.json', () => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chronicler-lexicon-'));
      const nested = path.join(tempDir, 'pkg', 'dist', 'extraction');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, 'pkg', 'package.json'), '{}');

      expect(findPackageRoot(nested)).toBe(path.join(tempDir, 'pkg'));
    });
  });

  describe('common nouns', () => {
    it('should match singular and plural forms', () => {
      const lexicon = loadLexicon();

      expect(isCommonNoun('Orc', lexicon)).toBe(true);
      expect(isCommonNoun('Orcs', lexicon)).toBe(true);
      expect(isCommonNoun('Wolves', lexicon)).toBe(true);
      expect(isCommonNoun('Thieves', lexicon)).toBe(true);
      expect(isCommonNoun('Kael', lexicon)).toBe(false);
    });
  });
});
