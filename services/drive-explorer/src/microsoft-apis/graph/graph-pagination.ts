import type { z } from 'zod';
import { GraphCollectionEnvelopeSchema, type GraphPage } from './types/graph.schemas';

export function parseGraphPage<S extends z.ZodType>(raw: unknown, itemSchema: S): GraphPage<z.output<S>> {
  const envelope = GraphCollectionEnvelopeSchema.parse(raw);
  return {
    items: envelope.value.map((item) => itemSchema.parse(item)),
    nextLink: envelope['@odata.nextLink'] ?? undefined,
  };
}

export interface CollectPagesOptions {
  maxPages?: number;
  maxItems?: number;
}

/** Drains a page sequence, stopping at whichever of the bounds is hit first. */
export async function collectPages<T>(
  pages: AsyncIterable<GraphPage<T>>,
  options: CollectPagesOptions = {},
): Promise<T[]> {
  const { items, error } = await collectAvailablePages(pages, options);
  if (error !== undefined) throw error;
  return items;
}

export interface PartialCollection<T> {
  items: T[];
  /** Failure of a page after the first one; the items read before it are kept. */
  error?: unknown;
}

/**
 * Like `collectPages`, but a failure after the first page ends the sequence
 * instead of discarding it. A failing first page still throws.
 */
export async function collectAvailablePages<T>(
  pages: AsyncIterable<GraphPage<T>>,
  { maxPages = Number.POSITIVE_INFINITY, maxItems = Number.POSITIVE_INFINITY }: CollectPagesOptions = {},
): Promise<PartialCollection<T>> {
  const items: T[] = [];
  let pageCount = 0;
  try {
    for await (const page of pages) {
      items.push(...page.items);
      pageCount++;
      if (pageCount >= maxPages || items.length >= maxItems) break;
    }
  } catch (error) {
    if (pageCount === 0) throw error;
    return { items: items.slice(0, maxItems), error };
  }
  return { items: items.slice(0, maxItems) };
}
