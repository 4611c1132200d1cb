import { Effect, Option } from 'effect';
import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import * as fs from 'fs/promises';
import { DocumentParseError, FileReadError } from '../errors.js';

/**
 * Narrow query capability shared by a whole document and by any node in it,
 * so row-level and document-level extraction go through the same code.
 *
 * @group Document
 * @public
 */
export interface Queryable {
  /** Number of nodes in this selection */
  readonly size: number;
  /** Descendants matching a CSS selector */
  readonly locate: (selector: string) => Queryable;
  readonly first: () => Queryable;
  readonly last: () => Queryable;
  /** Descendants matching a selector, one Queryable per node, in document order */
  readonly rows: (selector: string) => ReadonlyArray<Queryable>;
  /** Combined text content of the selection, untrimmed */
  readonly text: () => string;
  /** Attribute of the first node in the selection */
  readonly attr: (name: string) => Option.Option<string>;
}

const fromSelection = <T extends AnyNode>(selection: Cheerio<T>): Queryable => ({
  size: selection.length,
  locate: (selector) => fromSelection(selection.find(selector)),
  first: () => fromSelection(selection.first()),
  last: () => fromSelection(selection.last()),
  rows: (selector) => {
    const matched = selection.find(selector);
    return Array.from({ length: matched.length }, (_, index) =>
      fromSelection(matched.eq(index))
    );
  },
  text: () => selection.text(),
  attr: (name) => Option.fromNullable(selection.attr(name)),
});

/**
 * Decodes raw input to markup. Strings pass through; bytes must be valid UTF-8.
 */
export const decodeDocument = (
  input: string | Uint8Array
): Effect.Effect<string, DocumentParseError> =>
  typeof input === 'string'
    ? Effect.succeed(input)
    : Effect.try({
        try: () => new TextDecoder('utf-8', { fatal: true }).decode(input),
        catch: (error) => DocumentParseError.fromCause(error),
      });

/**
 * Parses input into a queryable document tree rooted at the document node.
 *
 * @example
 * ```typescript
 * const doc = yield* loadDocument('<p class="x"> hi </p>');
 * doc.locate('p.x').text(); // ' hi '
 * ```
 */
export const loadDocument = (
  input: string | Uint8Array
): Effect.Effect<Queryable, DocumentParseError> =>
  Effect.flatMap(decodeDocument(input), (html) =>
    Effect.try({
      try: () => fromSelection(cheerio.load(html).root()),
      catch: (error) => DocumentParseError.fromCause(error),
    })
  );

/**
 * Reads a saved page from disk as raw bytes.
 */
export const readDocument = (
  path: string
): Effect.Effect<Uint8Array, FileReadError> =>
  Effect.tryPromise({
    try: () => fs.readFile(path),
    catch: (error) => FileReadError.fromCause(path, error),
  });
