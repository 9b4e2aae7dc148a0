import { readFileSync } from 'fs';
import { ListingExtractorService } from './services/listing-extractor.service';
import { CONFIG } from './config';
import { TABLE_NAMES } from './types';

/**
 * Run the pipeline over a saved page without touching MongoDB or Redis.
 *
 *   node dist/extract-document.js <url> <page.html> [page.md]
 */
function run(argv: string[]): void {
  const [url, htmlPath, markdownPath] = argv;
  if (!url || !htmlPath) {
    console.error('Usage: extract-document <url> <page.html> [page.md]');
    process.exit(1);
  }

  console.log('=== Listing Extraction (No DB) ===\n');

  const extractor = new ListingExtractorService(CONFIG.extraction);
  console.log('Registered grammars:', extractor.getRegisteredGrammars());

  const html = readFileSync(htmlPath, 'utf-8');
  const renderedText = markdownPath ? readFileSync(markdownPath, 'utf-8') : undefined;
  const { rows, metadata } = extractor.extract({ sourceUrl: url, html, renderedText });

  console.log(`✓ Source: ${metadata.sourceId}${metadata.blocked ? ' (blocked)' : ''}`);
  console.log(`✓ Strategies used: ${metadata.strategiesUsed.join(', ') || 'none'}`);
  if (metadata.errors) {
    console.log('⚠️  Errors:', metadata.errors);
  }

  console.log('\n📊 Rows per table:');
  for (const table of TABLE_NAMES) {
    console.log(`  ${table}: ${rows[table].length}`);
  }

  console.log('\n🏠 Listing row:');
  console.log(JSON.stringify(rows.listings[0], null, 2));
}

try {
  run(process.argv.slice(2));
} catch (error) {
  console.error('❌ Extraction failed:', error);
  process.exit(1);
}
