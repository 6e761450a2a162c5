import { describe, it, expect } from 'vitest';

import { extractElements } from '../extraction/element-extractor.js';
import type { ExtractionRule } from '../extraction/rules.js';

const SEGMENT = [
  '**Kael**: We should move before dawn.',
  'Mira: Agreed, I will scout ahead.',
  'Player 2 (Thorn) rolls for perception.',
  'Location: Ironhold Keep',
  'The party pressed on into the Whispering Forest.',
  'Brom attacked the bandit leader.',
  'Kael found a silver locket in the mud.',
].join('\n');

describe('Element Extractor', () => {
  describe('characters', () => {
    it('should find speakers, player tags and actors in text order', () => {
      const elements = extractElements(SEGMENT, 0);

      expect(elements.characters).toEqual(['Kael', 'Mira', 'Thorn', 'Brom']);
    });

    it('should drop stopwords such as the game master tag', () => {
      const elements = extractElements('**DM**: Roll initiative.', 0);

      expect(elements.characters).toEqual([]);
      expect(elements.events).toEqual([]);
    });

    it('should strip leading sentence words and possessives', () => {
      const elements = extractElements("Then Kael attacked. Suddenly Mira's hound fled.", 0);

      expect(elements.characters).toEqual(['Kael']);
    });

    it('should not take creatures and roles for named characters', () => {
      const elements = extractElements(
        'Orcs attacked the camp. The Wolves fled.\nGuard: Halt!\nKael charged the nearest raider.',
        0,
      );

      expect(elements.characters).toEqual(['Kael']);
    });

    it('should deduplicate names case-insensitively', () => {
      const elements = extractElements('Kael: Hello.\nKAEL attacked the door.', 0);

      expect(elements.characters).toEqual(['Kael']);
    });
  });

  describe('locations', () => {
    it('should find tagged and suffixed places', () => {
      const elements = extractElements(SEGMENT, 0);

      expect(elements.locations).toEqual(['Ironhold Keep', 'Whispering Forest']);
    });

    it('should never claim a place name as a character', () => {
      const elements = extractElements('The ruins of Raven Keep attacked their senses.', 0);

      expect(elements.locations).toEqual(['Raven Keep']);
      expect(elements.characters).toEqual([]);
    });

    it('should find places after locative prepositions', () => {
      const elements = extractElements('At dusk the wagons rolled into Oakvale.', 0);

      expect(elements.locations).toEqual(['Oakvale']);
    });

    it('should find places after a preposition that opens the sentence', () => {
      const elements = extractElements('In Thornvale the guards waited.\nInto Greywater they rode at dusk.', 0);

      expect(elements.locations).toEqual(['Thornvale', 'Greywater']);
      expect(elements.characters).toEqual([]);
    });
  });

  describe('events', () => {
    it('should take one event per action sentence with verb salience', () => {
      const elements = extractElements(SEGMENT, 4);

      expect(elements.events).toEqual([
        { segmentIndex: 4, text: 'Player 2 (Thorn) rolls for perception.', salience: 1 },
        { segmentIndex: 4, text: 'Brom attacked the bandit leader.', salience: 3 },
        { segmentIndex: 4, text: 'Kael found a silver locket in the mud.', salience: 3 },
      ]);
    });

    it('should trim long events to 200 characters on a word boundary', () => {
      const sentence = `Kael attacked ${'the shadow '.repeat(30)}at last.`;

      const [event] = extractElements(sentence, 0).events;

      expect(event!.text.length).toBeLessThanOrEqual(200);
      expect(sentence.startsWith(event!.text)).toBe(true);
      expect(event!.text.endsWith('shadow')).toBe(true);
    });
  });

  it('should be idempotent', () => {
    expect(extractElements(SEGMENT, 2)).toEqual(extractElements(SEGMENT, 2));
  });

  it('should return empty output with a warning instead of throwing', () => {
    const broken: ExtractionRule = {
      id: 'broken',
      category: 'character',
      priority: 1,
      group: 1,
      get pattern(): RegExp {
        throw new Error('bad rule');
      },
    };

    const elements = extractElements('Kael attacked.', 3, [broken]);

    expect(elements).toEqual({
      segmentIndex: 3,
      characters: [],
      locations: [],
      events: [],
      warnings: ['Element extraction failed for segment 3: bad rule'],
    });
  });
});
