import OpenAI from "openai";
import { getConfig } from "../utils/config";

let client: OpenAI | null = null;

export async function getOpenAI() {
  if (client) return client;
  const config = getConfig();
  if (!config.OPENAI_API_KEY) {
    throw new Error("Missing OPENAI_API_KEY environment variable");
  }
  client = new OpenAI({ apiKey: config.OPENAI_API_KEY });
  return client;
}

// Vectors come back in input order; callers are responsible for batching.
export async function embedTexts(texts: string[]): Promise<number[][]> {
  if (texts.length === 0) return [];
  const config = getConfig();
  const c = await getOpenAI();
  const res = await c.embeddings.create({
    model: config.EMBEDDING_MODEL,
    input: texts,
    dimensions: config.EMBEDDING_DIMENSIONS,
  });
  if (res.data.length !== texts.length) {
    throw new Error(`Expected ${texts.length} embeddings, received ${res.data.length}`);
  }
  return [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
}

export async function embedText(text: string): Promise<number[]> {
  const [embedding] = await embedTexts([text]);
  if (!embedding) {
    throw new Error("No embedding generated");
  }
  return embedding;
}
