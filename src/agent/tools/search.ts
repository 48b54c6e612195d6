import { Type } from '@sinclair/typebox';
import { defineCapability } from './types.js';

/**
 * Offline demo answers. Swap in a real search backend by registering a
 * capability with the same name.
 */
const DEMO_RESULTS: Readonly<Record<string, string>> = {
  python: 'Python is a general-purpose programming language known for its readable syntax.',
  ai: 'Artificial intelligence (AI) is a branch of computer science concerned with building intelligent machines.',
  weather: 'The weather today is sunny with mild temperatures.',
  'machine learning': 'Machine learning is a field of AI in which computers learn from data.',
};

export const searchTool = defineCapability({
  name: 'search',
  description: 'Look up a short fact (offline demo with canned results)',
  parameters: Type.Object({
    query: Type.String({ description: 'Search keywords' }),
  }),
  execute: ({ query }) => {
    return DEMO_RESULTS[query.trim().toLowerCase()] ?? `No information found for '${query}'`;
  },
});
