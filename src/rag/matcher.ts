import { embedText } from "../clients/openai";
import { searchSimilarQuestions, type QuestionMatch } from "../clients/db";
import { getMatchConfig } from "../utils/config";
import { AppError, describeError } from "../utils/errors";
import { logInfo } from "../utils/logger";
import { classifyMatch, resolveThresholds, type MatchResponse } from "./policy";

export async function findSimilarQuestion(question: string): Promise<MatchResponse> {
  const config = getMatchConfig();
  const thresholds = resolveThresholds(config);

  let embedding: number[];
  try {
    embedding = await embedText(question);
  } catch (err) {
    throw new AppError("embedding_failed", 500, `Failed to encode question: ${describeError(err)}`);
  }

  let matches: QuestionMatch[];
  try {
    matches = await searchSimilarQuestions(embedding, { numCandidates: config.numCandidates, limit: 1 });
  } catch (err) {
    throw new AppError("db_query_failed", 500, `Database query failed: ${describeError(err)}`);
  }

  const result = classifyMatch(matches[0] ?? null, thresholds);
  logInfo("question_classified", { action: result.action, score: result.score });
  return result;
}
