/**
 * Debug script to test knowledge base search
 * Run with: npx tsx scripts/search-knowledge.ts "how do refunds work?" [threshold]
 */

import 'dotenv/config';
import { config } from '../src/config/index.js';
import { buildServices } from '../src/container.js';

async function main() {
  const query = process.argv[2];
  const threshold = Number(process.argv[3] ?? config.rag.similarityThreshold);
  if (!query) {
    console.log('Usage: tsx scripts/search-knowledge.ts "<query>" [threshold]');
    return;
  }

  const services = buildServices(config);
  try {
    console.log(`Total entries: ${await services.store.count()}`);

    const results = await services.store.search(query, { limit: 5, threshold });
    console.log(`Found ${results.length} results:`);
    results.forEach((r, i) => {
      console.log(`${i + 1}. ${r.content.substring(0, 100)}... (similarity: ${r.similarity.toFixed(3)})`);
    });

    const suggestion = await services.synthesizer.generateAnswer(query, { similarityThreshold: threshold });
    console.log(`\nSuggestion (confidence ${suggestion.confidence.toFixed(2)}):\n${suggestion.answer}`);
  } finally {
    services.cleanup();
  }
}

main().catch(console.error);
