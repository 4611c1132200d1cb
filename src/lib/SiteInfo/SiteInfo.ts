import { Schema } from 'effect';

const UnsignedInt = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0)
);

/** Share of visitors coming from a single country. */
export const VisitorSchema = Schema.Struct({
  country: Schema.String,
  /** Raw text as rendered, e.g. "83.8%" */
  percent: Schema.String,
  /** Rank of the site within that country */
  localRank: UnsignedInt,
});

/** One of the top search keywords sending traffic to the site. */
export const KeywordSchema = Schema.Struct({
  word: Schema.String,
  percent: Schema.String,
});

/** A site people visited immediately before this one. */
export const UpstreamSchema = Schema.Struct({
  site: Schema.String,
  percent: Schema.String,
});

/** A subdomain visitors go to, with its share of traffic. */
export const SubdomainSchema = Schema.Struct({
  domain: Schema.String,
  percent: Schema.String,
});

/** A site, and the page on it, that links to the domain. */
export const LinkSchema = Schema.Struct({
  site: Schema.String,
  page: Schema.String,
});

/**
 * Traffic statistics for one domain as shown on the provider's site-info page.
 *
 * List fields keep the order of the page, which is the provider's ranking
 * order. Percentages are left as text.
 */
export const SiteInfoSchema = Schema.Struct({
  title: Schema.String,
  description: Schema.String,
  mainCountry: Schema.String,
  globalRank: UnsignedInt,
  localRank: UnsignedInt,
  linkingTotal: UnsignedInt,
  visitors: Schema.Array(VisitorSchema),
  keywords: Schema.Array(KeywordSchema),
  upstreams: Schema.Array(UpstreamSchema),
  related: Schema.Array(Schema.String),
  subdomains: Schema.Array(SubdomainSchema),
  categories: Schema.Array(Schema.String),
  linksFrom: Schema.Array(LinkSchema),
});

export type Visitor = Schema.Schema.Type<typeof VisitorSchema>;
export type Keyword = Schema.Schema.Type<typeof KeywordSchema>;
export type Upstream = Schema.Schema.Type<typeof UpstreamSchema>;
export type Subdomain = Schema.Schema.Type<typeof SubdomainSchema>;
export type Link = Schema.Schema.Type<typeof LinkSchema>;
export type SiteInfo = Schema.Schema.Type<typeof SiteInfoSchema>;

/** The zero record: every field unset, lists included frozen. */
export const emptySiteInfo: SiteInfo = Object.freeze({
  title: '',
  description: '',
  mainCountry: '',
  globalRank: 0,
  localRank: 0,
  linkingTotal: 0,
  visitors: Object.freeze([]),
  keywords: Object.freeze([]),
  upstreams: Object.freeze([]),
  related: Object.freeze([]),
  subdomains: Object.freeze([]),
  categories: Object.freeze([]),
  linksFrom: Object.freeze([]),
});
