/**
 * CLI options parsing tests
 */

import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseList, parsePositiveInt } from '../cli.js';

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse input option', () => {
      expect(parseCliOptions({ input: 'session-12.txt' }).input).toBe('session-12.txt');
    });

    it('should parse output option', () => {
      expect(parseCliOptions({ output: 'story.md' }).output).toBe('story.md');
    });

    it('should parse config option', () => {
      expect(parseCliOptions({ config: './my-config.json' }).config).toBe('./my-config.json');
    });
  });

  describe('pipeline options', () => {
    it('should keep the backend list in order', () => {
      expect(parseCliOptions({ backends: ['local', 'offline'] }).backends).toEqual(['local', 'offline']);
    });

    it('should parse budget as number', () => {
      expect(parseCliOptions({ budget: 1200 }).budget).toBe(1200);
    });

    it('should ignore values of the wrong type', () => {
      const result = parseCliOptions({ budget: '1200', input: 42, verbose: 'yes' });
      expect(result).toEqual({});
    });
  });

  describe('flags', () => {
    it('should parse showConfig flag', () => {
      expect(parseCliOptions({ showConfig: true }).showConfig).toBe(true);
      expect(parseCliOptions({ showConfig: false }).showConfig).toBe(false);
    });

    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      // Commander.js converts --no-color to color: false
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });

    it('should parse dryRun and verbose flags', () => {
      const result = parseCliOptions({ dryRun: true, verbose: true });
      expect(result.dryRun).toBe(true);
      expect(result.verbose).toBe(true);
    });
  });

  describe('undefined handling', () => {
    it('should only include defined options', () => {
      const result = parseCliOptions({ input: 'session.txt', sessionName: 'The Drowned Bell' });
      expect(Object.keys(result)).toEqual(['input', 'sessionName']);
    });
  });
});

describe('option parsers', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('800')).toBe(800);
  });

  it('should reject zero, fractions and text', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('many')).toThrow(InvalidArgumentError);
  });

  it('should split and trim lists', () => {
    expect(parseList(' remote, offline ,')).toEqual(['remote', 'offline']);
  });

  it('should reject an empty list', () => {
    expect(() => parseList(' , ')).toThrow('List must name at least one entry.');
  });
});

describe('createProgram', () => {
  it('should parse weave flags into camelCase options', () => {
    const program = createProgram();
    const weave = program.commands.find((command) => command.name() === 'weave');
    expect(weave).toBeDefined();
    if (!weave) return;

    weave.action(() => undefined);
    program.parse(
      ['weave', '-i', 'session.txt', '--backends', 'local,offline', '--budget', '900', '--local-model', 'mistral', '--no-color'],
      { from: 'user' },
    );

    const options = parseCliOptions(weave.opts());
    expect(options).toEqual({
      input: 'session.txt',
      backends: ['local', 'offline'],
      budget: 900,
      localModel: 'mistral',
      noColor: true,
    });
  });
});
