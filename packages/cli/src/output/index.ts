export { formatStory, formatStats, type StoryFormatOptions } from './story-formatter.js';
