/**
 * Where each field lives in the provider's site-info markup.
 *
 * Scalar fields point at the node holding the value. Tabular fields point at
 * the row container (a `tbody`); rows inside it are read by the extractors.
 * When the provider changes its markup, this table is what breaks.
 *
 * @group Selectors
 * @public
 */
export const SITE_INFO_SELECTORS = Object.freeze({
  globalRank: 'span.globleRank span div strong',
  localRank: 'span.countryRank span div strong',
  mainCountry: 'span.countryRank span h4 a',
  linkingTotal:
    'section#linksin-panel-content div span div span.font-4.box1-r',
  title: 'div.row-fluid.siteinfo-site-summary span div p',
  description:
    'section#contact-panel-content div.row-fluid span.span8 p.color-s3',
  visitors: 'table#demographics_div_country_table tbody',
  keywords: 'table#keywords_top_keywords_table tbody',
  upstreams: 'table#keywords_upstream_site_table tbody',
  linksFrom: 'table#linksin_table tbody',
  related: 'table#audience_overlap_table tbody',
  categories: 'table#category_link_table tbody',
  subdomains: 'table#subdomain_table tbody',
  noData: 'section#no-enough-data',
});

export type SelectorTable = {
  readonly [K in keyof typeof SITE_INFO_SELECTORS]: string;
};

export type SelectorField = keyof SelectorTable;

export const isSelectorField = (key: string): key is SelectorField =>
  Object.prototype.hasOwnProperty.call(SITE_INFO_SELECTORS, key);

/**
 * Builds a frozen selector table with some entries replaced.
 */
export const withSelectorOverrides = (
  overrides: Partial<SelectorTable> = {}
): SelectorTable => {
  const pick = (field: SelectorField): string =>
    overrides[field] ?? SITE_INFO_SELECTORS[field];

  return Object.freeze({
    globalRank: pick('globalRank'),
    localRank: pick('localRank'),
    mainCountry: pick('mainCountry'),
    linkingTotal: pick('linkingTotal'),
    title: pick('title'),
    description: pick('description'),
    visitors: pick('visitors'),
    keywords: pick('keywords'),
    upstreams: pick('upstreams'),
    linksFrom: pick('linksFrom'),
    related: pick('related'),
    categories: pick('categories'),
    subdomains: pick('subdomains'),
    noData: pick('noData'),
  });
};
