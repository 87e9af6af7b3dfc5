import { Parser } from 'htmlparser2';

import { getLogger } from '../../logger.js';

const LINK_ATTRIBUTES: ReadonlyMap<string, ReadonlySet<string>> = new Map([
  ['a', new Set(['href'])],
  ['script', new Set(['src', 'href'])],
  ['link', new Set(['src', 'href'])],
]);

/**
 * Tokenizes an HTML byte stream incrementally and yields the raw `href`/`src` values of anchor,
 * script and link start tags in document order. Repeated attributes on one tag are all yielded.
 *
 * The sequence ends early, without throwing, when the stream fails mid-read; whatever was
 * tokenized up to that point has already been yielded.
 */
export async function* extractLinks(
  body: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<string, void, undefined> {
  const pending: string[] = [];
  let wantedAttributes: ReadonlySet<string> | undefined;

  const parser = new Parser(
    {
      onopentagname(name) {
        wantedAttributes = LINK_ATTRIBUTES.get(name);
      },
      onattribute(name, value) {
        if (wantedAttributes?.has(name)) {
          pending.push(value);
        }
      },
      onopentag() {
        wantedAttributes = undefined;
      },
    },
    { decodeEntities: true },
  );
  const decoder = new TextDecoder('utf-8');

  try {
    for await (const chunk of body) {
      parser.write(typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true }));
      yield* pending.splice(0);
    }
  } catch (error) {
    getLogger().debug({ err: error }, 'HTML stream ended early; keeping links read so far');
    return;
  }

  parser.end(decoder.decode());
  yield* pending.splice(0);
}

/** Convenience for callers holding the whole document in memory. */
export async function collectLinks(html: string): Promise<string[]> {
  const links: string[] = [];
  for await (const link of extractLinks(singleChunk(html))) {
    links.push(link);
  }
  return links;
}

async function* singleChunk(html: string): AsyncGenerator<string, void, undefined> {
  yield html;
}
