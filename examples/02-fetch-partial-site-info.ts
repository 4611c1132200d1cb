/**
 * Example 02: Fetching Site Info with Partial Results
 *
 * This example demonstrates:
 * - Fetching a domain's page through the client
 * - Collecting every field failure instead of stopping at the first
 * - Overriding a selector whose markup has moved
 *
 * Usage: tsx examples/02-fetch-partial-site-info.ts example.com
 */

import { Effect } from 'effect';
import { makeSiteInfoClientLayer, SiteInfoClient } from '../src/index.js';

const domain = process.argv[2] ?? 'example.com';

const program = Effect.gen(function* () {
  console.log('🌐 Example 02: Fetching Site Info');

  const client = yield* SiteInfoClient;
  const url = yield* client.siteInfoUrl(domain);
  console.log(`Fetching ${url}\n`);

  const { site, errors } = yield* client.siteInfoPartial(domain);

  console.log(`- Title: ${site.title || '(none)'}`);
  console.log(`- Global rank: ${site.globalRank}`);
  console.log(`- Upstream sites: ${site.upstreams.map((u) => u.site).join(', ')}`);
  console.log(`- Subdomains: ${site.subdomains.length}`);

  if (errors.length > 0) {
    console.log(`\n⚠️  ${errors.length} field(s) could not be extracted:`);
    for (const error of errors) {
      console.log(`  [${error._tag}] ${error.field}: ${error.message}`);
    }
  }

  return errors.length;
});

const layer = makeSiteInfoClientLayer({
  extractionMode: 'collect-all',
  requestTimeoutMs: 15_000,
  userAgent: 'SiteInfoExample/1.0',
  selectorOverrides: {
    title: 'div.siteinfo-site-summary p.site-title',
  },
});

Effect.runPromise(program.pipe(Effect.provide(layer)))
  .then((failures) => {
    console.log(`\n✅ Example completed with ${failures} field failure(s).`);
    process.exit(0);
  })
  .catch((error) => {
    console.error('\n❌ Example failed:', error);
    process.exit(1);
  });
