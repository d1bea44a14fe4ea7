import { embedTexts } from "../clients/openai";

export async function embedInBatches(
  texts: string[],
  batchSize: number,
  onBatch?: (done: number, total: number) => void
): Promise<number[][]> {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`EMBED_BATCH_SIZE must be a positive integer, got ${batchSize}`);
  }
  const vectors: number[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    vectors.push(...(await embedTexts(batch)));
    onBatch?.(Math.min(i + batchSize, texts.length), texts.length);
  }
  return vectors;
}
