/**
 * Example 01: Parsing a Saved Page
 *
 * This example demonstrates:
 * - Parsing a site-info page that was saved to disk
 * - Reading the extracted record
 * - Handling the no-data page as an expected outcome
 *
 * Usage: tsx examples/01-parse-saved-page.ts [path/to/page.html]
 */

import { Effect } from 'effect';
import { fileURLToPath } from 'url';
import { makeSiteInfoParserLayer, SiteInfoParser } from '../src/index.js';

const defaultPage = fileURLToPath(
  new URL('../src/test/fixtures/site-info.html', import.meta.url)
);
const pagePath = process.argv[2] ?? defaultPage;

const program = Effect.gen(function* () {
  console.log('📄 Example 01: Parsing a Saved Page');
  console.log(`Reading ${pagePath}\n`);

  const parser = yield* SiteInfoParser;
  const site = yield* parser.parseFile(pagePath);

  console.log(site.title);
  console.log(`  ${site.description}\n`);
  console.log(`- Global rank: ${site.globalRank}`);
  console.log(`- Rank in ${site.mainCountry}: ${site.localRank}`);
  console.log(`- Sites linking in: ${site.linkingTotal}`);

  console.log('\n🌍 Visitors by country:');
  for (const visitor of site.visitors) {
    console.log(
      `  ${visitor.country.padEnd(16)} ${visitor.percent.padStart(7)}  rank ${visitor.localRank}`
    );
  }

  console.log('\n🔑 Top keywords:');
  for (const keyword of site.keywords) {
    console.log(`  ${keyword.word} (${keyword.percent})`);
  }

  console.log(`\n🔗 Related: ${site.related.join(', ')}`);
  console.log(`📂 Categories: ${site.categories.join(' > ')}`);
}).pipe(
  Effect.catchTag('InsufficientDataError', (error) =>
    Effect.sync(() => console.log(`⚠️  ${error.message}`))
  )
);

Effect.runPromise(program.pipe(Effect.provide(makeSiteInfoParserLayer())))
  .then(() => {
    console.log('\n✅ Example completed successfully!');
    process.exit(0);
  })
  .catch((error) => {
    console.error('\n❌ Example failed:', error);
    process.exit(1);
  });
