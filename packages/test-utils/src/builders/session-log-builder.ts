/**
 * Builders for synthetic session transcripts
 */

/**
 * Neutral table-talk sentences: no names, no markers
 */
const FILLER_SENTENCES = [
  'The torches gutter low while the dice clatter across the table.',
  'Someone refills the snack bowl and the conversation drifts back to the game.',
  'A long pause follows as everyone studies the hand-drawn map.',
  'The rain outside taps steadily against the window of the game room.',
  'Maps and character sheets slowly spread across every free inch of the table.',
  'There is a brief debate about the rules before play resumes.',
  'The group laughs at an old joke and settles back into character.',
  'Quiet music plays in the background as the evening wears on.',
];

const PROSE_SENTENCES = [
  'The lantern light wavered over the old map as the wind rose outside.',
  'Every road on the parchment seemed to bend toward the same dark valley.',
  'A cart rattled past the window and the sound faded into the night.',
  'The innkeeper wiped the same mug for the third time without looking up.',
  'Somewhere above them a loose shutter knocked against the stone wall.',
  'The fire settled into embers and the room grew slowly colder.',
  'Rumours of missing caravans had reached even this quiet corner of the realm.',
  'Nobody at the table wanted to be the first to speak about the letter.',
  'The candle burned down to a stub while the plan took shape.',
  'Outside the frost crept across the cobbles in thin silver lines.',
  'A dog barked twice in the yard and then fell silent.',
  'The smell of bread drifted up from the kitchen below.',
];

/**
 * Fluent builder for session transcripts
 */
export class SessionLogBuilder {
  private readonly lines: string[] = [];

  /** `**Session N**` part marker */
  part(number: number): this {
    this.lines.push(`**Session ${number}**`, '');
    return this;
  }

  /** `## Scene: title` marker */
  scene(title: string): this {
    this.lines.push(`## Scene: ${title}`, '');
    return this;
  }

  /** `Combat` marker */
  combat(): this {
    this.lines.push('Combat', '');
    return this;
  }

  /** `**Name**: line` */
  speaker(name: string, line: string): this {
    this.lines.push(`**${name}**: ${line}`);
    return this;
  }

  /** Plain narration paragraph */
  narration(text: string): this {
    this.lines.push(text, '');
    return this;
  }

  /** Filler sentences, cycling through a fixed list */
  filler(sentences: number): this {
    this.lines.push(fillerText(sentences), '');
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

/**
 * Start a session log
 */
export function sessionLog(): SessionLogBuilder {
  return new SessionLogBuilder();
}

/**
 * Filler paragraph of the given number of sentences
 */
export function fillerText(sentences: number): string {
  return Array.from({ length: sentences }, (_, i) => FILLER_SENTENCES[i % FILLER_SENTENCES.length]).join(' ');
}

/**
 * Marker-free prose of at least minChars characters
 */
export function buildProse(minChars: number): string {
  const sentences: string[] = [];
  let length = 0;
  for (let i = 0; length < minChars; i++) {
    const sentence = PROSE_SENTENCES[i % PROSE_SENTENCES.length] ?? '';
    sentences.push(sentence);
    length += sentence.length + 1;
  }
  return sentences.join(' ');
}

export interface StructuredSessionSpec {
  /** Number of `**Session N**` parts */
  parts: number;
  /** Speakers; each part has every character speak once */
  characters: string[];
  /** One location per part, cycling */
  locations: string[];
  /** Exact length of the log */
  targetChars: number;
}

/**
 * Session log of exactly targetChars characters with one part marker per part
 *
 * Every part opens with its marker, visits a location, gives every character a
 * line and an action, then pads with filler.
 */
export function buildStructuredSession(spec: StructuredSessionSpec): string {
  const perPart = Math.floor(spec.targetChars / spec.parts);
  const chunks: string[] = [];

  for (let p = 0; p < spec.parts; p++) {
    const size = p === spec.parts - 1 ? spec.targetChars - perPart * (spec.parts - 1) : perPart;
    const location = spec.locations[p % spec.locations.length] ?? 'Old Road';

    const builder = sessionLog().part(p + 1).narration(`The party arrived at the ${location} as the light faded.`);
    spec.characters.forEach((name, i) => {
      builder.speaker(name, `I keep watch near the ${location}.`);
      builder.narration(`${name} ${ACTIONS[(i + p) % ACTIONS.length] ?? 'searched the area'}.`);
    });

    let body = builder.build();
    while (body.length < size) {
      body += `${fillerText(FILLER_SENTENCES.length)} `;
    }
    chunks.push(`${body.slice(0, size - 2)}\n\n`);
  }

  return chunks.join('');
}

const ACTIONS = [
  'found a rusted key beneath the altar',
  'attacked the nearest cultist with a war cry',
  'discovered a hidden passage behind the tapestry',
  'rescued a trembling merchant from the cellar',
  'cast a ward of light across the doorway',
  'defeated the guard captain in single combat',
];
