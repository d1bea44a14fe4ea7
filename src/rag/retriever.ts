import { embedText } from "../clients/openai";
import { searchKnowledgeChunks, type ChunkHit } from "../clients/db";

export async function retrieveKnowledge(question: string, k: number = 5): Promise<ChunkHit[]> {
  const embedding = await embedText(question);
  return searchKnowledgeChunks(embedding, k);
}
