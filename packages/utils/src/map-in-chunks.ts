import assert from 'node:assert';
import { chunk } from 'remeda';

export interface ChunkedMapOptions<TInput, TOutput> {
  items: readonly TInput[];
  chunkSize: number;
  mapper: (item: TInput, index: number) => Promise<TOutput>;
  logger: { debug: (msg: string) => void };
  logPrefix?: string;
}

/**
 * Maps `items` with at most `chunkSize` mappers in flight. Chunks run one after
 * another; items inside a chunk run concurrently. The result array keeps the
 * input order regardless of completion order. A rejecting mapper rejects the
 * whole call, so mappers that must not cancel siblings have to settle their own
 * errors.
 */
export async function mapInChunks<TInput, TOutput>({
  items,
  chunkSize,
  mapper,
  logger,
  logPrefix = '',
}: ChunkedMapOptions<TInput, TOutput>): Promise<TOutput[]> {
  assert(Number.isInteger(chunkSize) && chunkSize > 0, 'chunkSize must be a positive integer');

  const indexed = items.map((item, index) => ({ item, index }));
  const chunks = chunk(indexed, chunkSize);
  const results: TOutput[] = [];

  const shouldLogProgress = chunks.length > 1;
  if (shouldLogProgress) {
    logger.debug(`${logPrefix} Processing ${items.length} items in ${chunks.length} chunks`);
  }

  for (const [chunkIndex, entries] of chunks.entries()) {
    if (shouldLogProgress) {
      logger.debug(
        `${logPrefix} Processing chunk ${chunkIndex + 1}/${chunks.length} (${entries.length} items)`,
      );
    }

    const chunkResults = await Promise.all(
      entries.map(({ item, index }) => mapper(item, index)),
    );
    results.push(...chunkResults);
  }

  return results;
}
