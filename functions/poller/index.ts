import { getEnvConfig } from "../../src/utils/config";
import {
  listUnreadLimited,
  getMessageFull,
  extractPlainTextFromMessage,
  sendReply,
  createDraftReply,
  labelMessage,
  replyAddress,
} from "../../src/clients/gmail";
import { findSimilarQuestion } from "../../src/rag/matcher";
import { LOW_CONFIDENCE_MESSAGE, type MatchResponse, type ReplyAction } from "../../src/rag/policy";
import { errorFields, logError, logInfo } from "../../src/utils/logger";

export type PollerResult = {
  processed: number;
  failed: number;
  actions: Record<ReplyAction, number>;
};

const NO_TEXT: MatchResponse = {
  action: "escalate-to-human",
  message: LOW_CONFIDENCE_MESSAGE,
  score: 0,
  retrieved_question: null,
};

// A failed send hands the message to a person: tier label swapped for the escalation label, unread again.
async function deliver(messageId: string, tierLabel: string, escalatedLabel: string, send: () => Promise<void>) {
  try {
    await send();
  } catch (err) {
    try {
      await labelMessage({ messageId, addLabel: escalatedLabel, removeLabel: tierLabel, restoreUnread: true });
    } catch (labelErr) {
      logError("escalate_after_send_failed", { messageId, ...errorFields(labelErr) });
    }
    throw err;
  }
}

export const handler = async (): Promise<PollerResult> => {
  const env = getEnvConfig();
  const result: PollerResult = {
    processed: 0,
    failed: 0,
    actions: { "auto-reply": 0, "draft-for-review": 0, "escalate-to-human": 0 },
  };

  const tierLabels = [env.gmailLabelReplied, env.gmailLabelDrafted, env.gmailLabelEscalated];
  const messages = await listUnreadLimited(env.batchSize, tierLabels);
  if (!messages.length) return result;

  for (const m of messages) {
    try {
      const full = await getMessageFull(m.id);
      const meta = extractPlainTextFromMessage(full);
      const question = meta.bodyText.trim() || meta.subject.trim();

      const match = question ? await findSimilarQuestion(question) : NO_TEXT;
      const reply = {
        threadId: m.threadId,
        to: replyAddress(meta.from),
        subject: meta.subject || "Your question",
        body: match.message,
        inReplyTo: meta.messageIdHeader,
      };

      // labelled before delivery: a failed label must not lead to a second reply next run
      switch (match.action) {
        case "auto-reply":
          await labelMessage({ messageId: m.id, addLabel: env.gmailLabelReplied, removeUnread: true });
          await deliver(m.id, env.gmailLabelReplied, env.gmailLabelEscalated, () => sendReply(reply));
          break;
        case "draft-for-review":
          await labelMessage({ messageId: m.id, addLabel: env.gmailLabelDrafted, removeUnread: true });
          await deliver(m.id, env.gmailLabelDrafted, env.gmailLabelEscalated, () => createDraftReply(reply));
          break;
        case "escalate-to-human":
          // stays unread so a person picks it up
          await labelMessage({ messageId: m.id, addLabel: env.gmailLabelEscalated, removeUnread: false });
          break;
      }

      result.actions[match.action] += 1;
      result.processed += 1;
      logInfo("message_routed", { messageId: m.id, action: match.action, score: match.score });
    } catch (err) {
      result.failed += 1;
      logError("process_error", { messageId: m.id, ...errorFields(err) });
    }
  }

  return result;
};
