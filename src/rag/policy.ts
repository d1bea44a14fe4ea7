import type { QuestionMatch } from "../clients/db";

export const ACTIONS = ["auto-reply", "draft-for-review", "escalate-to-human"] as const;

export type ReplyAction = (typeof ACTIONS)[number];

export type MatchResponse = {
  action: ReplyAction;
  message: string;
  score: number;
  retrieved_question: string | null;
};

export type Thresholds = {
  autoReply: number;
  draft: number;
};

export const DEFAULT_THRESHOLDS: Thresholds = { autoReply: 0.95, draft: 0.8 };

export const NO_MATCH_MESSAGE = "No similar question found in knowledge base.";
export const LOW_CONFIDENCE_MESSAGE = "No highly similar answer found in knowledge base.";

export function resolveThresholds(config: { autoReplyThreshold: number; draftThreshold: number }): Thresholds {
  const { autoReplyThreshold, draftThreshold } = config;
  for (const [name, value] of [
    ["AUTO_REPLY_THRESHOLD", autoReplyThreshold],
    ["DRAFT_THRESHOLD", draftThreshold],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new Error(`${name} must be a number between 0 and 1, got ${value}`);
    }
  }
  if (draftThreshold >= autoReplyThreshold) {
    throw new Error(
      `DRAFT_THRESHOLD (${draftThreshold}) must be lower than AUTO_REPLY_THRESHOLD (${autoReplyThreshold})`
    );
  }
  return { autoReply: autoReplyThreshold, draft: draftThreshold };
}

/**
 * Map the top match to a reply tier.
 *
 * score >= autoReply          -> auto-reply with the stored answer
 * draft < score < autoReply   -> draft-for-review with the stored answer
 * otherwise, or no match      -> escalate-to-human with a fixed message
 *
 * A match without an answer has nothing to send and is escalated.
 */
export function classifyMatch(match: QuestionMatch | null, thresholds: Thresholds = DEFAULT_THRESHOLDS): MatchResponse {
  if (!match) {
    return { action: "escalate-to-human", message: NO_MATCH_MESSAGE, score: 0, retrieved_question: null };
  }

  const { score, questionText, answerText } = match;
  const answer = answerText?.trim() ? answerText : null;

  if (answer !== null && score >= thresholds.autoReply) {
    return { action: "auto-reply", message: answer, score, retrieved_question: questionText };
  }
  if (answer !== null && score > thresholds.draft) {
    return { action: "draft-for-review", message: answer, score, retrieved_question: questionText };
  }
  return { action: "escalate-to-human", message: LOW_CONFIDENCE_MESSAGE, score, retrieved_question: questionText };
}
