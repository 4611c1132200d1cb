import { Effect, Option } from 'effect';
import type { Queryable } from '../Document/Document.js';
import { TableAbsentError } from '../errors.js';
import type {
  Keyword,
  Link,
  Subdomain,
  Upstream,
  Visitor,
} from '../SiteInfo/SiteInfo.js';
import { cellText, parseGroupedInteger } from './FieldExtractors.js';

/**
 * Maps every row under the container matched by `selector` to a sub-record,
 * in document order.
 *
 * A missing container, or one without rows, fails with {@link TableAbsentError}.
 * Rows with blank cells are still mapped.
 */
export const extractRows = <A>(
  node: Queryable,
  field: string,
  selector: string,
  rowSelector: string,
  mapRow: (row: Queryable) => A
): Effect.Effect<ReadonlyArray<A>, TableAbsentError> => {
  const container = node.locate(selector);
  const rows = container.size === 0 ? [] : container.rows(rowSelector);
  return rows.length === 0
    ? Effect.fail(TableAbsentError.create(field, selector))
    : Effect.succeed(Object.freeze(rows.map(mapRow)));
};

export const visitorRow = (row: Queryable): Visitor =>
  Object.freeze({
    country: cellText(row, 'td a'),
    percent: row.locate('td span').first().text().trim(),
    // blank or unreadable rank cells count as unranked
    localRank: Option.getOrElse(
      parseGroupedInteger(row.locate('td span').last().text()),
      () => 0
    ),
  });

export const keywordRow = (row: Queryable): Keyword =>
  Object.freeze({
    word: cellText(row, 'td:first-child span:last-child'),
    percent: cellText(row, 'td:last-child span'),
  });

export const upstreamRow = (row: Queryable): Upstream =>
  Object.freeze({
    site: cellText(row, 'td a'),
    percent: cellText(row, 'td:last-child span'),
  });

export const linkRow = (row: Queryable): Link =>
  Object.freeze({
    site: cellText(row, 'span.word-wrap a'),
    page: Option.getOrElse(row.locate('a.word-wrap').attr('href'), () => ''),
  });

export const subdomainRow = (row: Queryable): Subdomain =>
  Object.freeze({
    domain: cellText(row, 'td:first-child span'),
    percent: cellText(row, 'td:last-child span'),
  });

export const extractVisitors = (node: Queryable, selector: string) =>
  extractRows(node, 'visitors', selector, 'tr', visitorRow);

export const extractKeywords = (node: Queryable, selector: string) =>
  extractRows(node, 'keywords', selector, 'tr', keywordRow);

export const extractUpstreams = (node: Queryable, selector: string) =>
  extractRows(node, 'upstream sites', selector, 'tr', upstreamRow);

export const extractLinksFrom = (node: Queryable, selector: string) =>
  extractRows(node, 'linking sites', selector, 'tr', linkRow);

export const extractRelated = (node: Queryable, selector: string) =>
  extractRows(node, 'related sites', selector, 'tr', (row) =>
    cellText(row, 'a')
  );

// Categories are a flat run of anchors rather than one per row
export const extractCategories = (node: Queryable, selector: string) =>
  extractRows(node, 'categories', selector, 'a', (anchor) =>
    anchor.text().trim()
  );

export const extractSubdomains = (node: Queryable, selector: string) =>
  extractRows(node, 'subdomains', selector, 'tr', subdomainRow);
