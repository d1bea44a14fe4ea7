import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { handler } from "../../functions/poller/index";
import { findSimilarQuestion } from "../rag/matcher";
import type { MatchResponse } from "../rag/policy";

type StoredMessage = { id: string; threadId: string; subject: string; body: string; labelIds: Set<string> };

const mailbox = vi.hoisted(() => {
  const messages = new Map<string, StoredMessage>();
  const labels: Array<{ id: string; name: string }> = [];
  const sent: string[] = [];

  const queryName = (name: string) => name.trim().replace(/\s+/g, "-").toLowerCase();

  function hasLabel(message: StoredMessage, token: string): boolean {
    if (message.labelIds.has(token.toUpperCase())) return true;
    const label = labels.find((l) => queryName(l.name) === token.toLowerCase());
    return label ? message.labelIds.has(label.id) : false;
  }

  function matches(message: StoredMessage, q: string): boolean {
    return q.split(" ").every((term) => {
      if (term.startsWith("label:")) return hasLabel(message, term.slice("label:".length));
      if (term.startsWith("-label:")) return !hasLabel(message, term.slice("-label:".length));
      return true;
    });
  }

  const api = {
    users: {
      messages: {
        list: async ({ q, maxResults }: { q: string; maxResults: number }) => ({
          data: {
            messages: [...messages.values()]
              .filter((m) => matches(m, q))
              .slice(0, maxResults)
              .map((m) => ({ id: m.id, threadId: m.threadId })),
          },
        }),
        get: async ({ id }: { id: string }) => {
          const m = messages.get(id);
          if (!m) throw new Error(`no message ${id}`);
          return {
            data: {
              id: m.id,
              threadId: m.threadId,
              payload: {
                mimeType: "text/plain",
                headers: [
                  { name: "Subject", value: m.subject },
                  { name: "From", value: "Ana Lima <ana@example.com>" },
                ],
                body: { data: Buffer.from(m.body).toString("base64url") },
              },
            },
          };
        },
        modify: async ({
          id,
          requestBody,
        }: {
          id: string;
          requestBody: { addLabelIds: string[]; removeLabelIds: string[] };
        }) => {
          const m = messages.get(id);
          if (!m) throw new Error(`no message ${id}`);
          requestBody.addLabelIds.forEach((l) => m.labelIds.add(l));
          requestBody.removeLabelIds.forEach((l) => m.labelIds.delete(l));
          return { data: {} };
        },
        send: async ({ requestBody }: { requestBody: { threadId: string } }) => {
          sent.push(requestBody.threadId);
          return { data: {} };
        },
      },
      labels: {
        list: async () => ({ data: { labels: [...labels] } }),
        create: async ({ requestBody }: { requestBody: { name: string } }) => {
          const label = { id: `Label_${labels.length + 1}`, name: requestBody.name };
          labels.push(label);
          return { data: label };
        },
      },
      drafts: {
        create: async () => ({ data: {} }),
      },
    },
  };

  function reset(): void {
    messages.clear();
    labels.length = 0;
    sent.length = 0;
  }

  function deliverUnread(id: string, body: string): void {
    messages.set(id, { id, threadId: `t-${id}`, subject: "Question", body, labelIds: new Set(["INBOX", "UNREAD"]) });
  }

  return { api, messages, labels, sent, reset, deliverUnread };
});

vi.mock("googleapis", () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials(): void {}
      },
    },
    gmail: () => mailbox.api,
  },
}));

vi.mock("../rag/matcher", () => ({
  findSimilarQuestion: vi.fn(),
}));

const findMock = vi.mocked(findSimilarQuestion);

function tier(action: MatchResponse["action"], message: string, score: number): MatchResponse {
  return { action, message, score, retrieved_question: "stored question" };
}

beforeEach(() => {
  mailbox.reset();
  vi.stubEnv("GMAIL_CLIENT_ID", "test-client");
  vi.stubEnv("GMAIL_CLIENT_SECRET", "test-secret");
  vi.stubEnv("GMAIL_REFRESH_TOKEN", "test-refresh");
  vi.stubEnv("BATCH_SIZE", "1");
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.clearAllMocks();
});

describe("poller against a mailbox that keeps state", () => {
  it("moves past escalated messages on later runs", async () => {
    mailbox.deliverUnread("m1", "unknown question");
    mailbox.deliverUnread("m2", "another question");
    findMock.mockResolvedValue(tier("escalate-to-human", "No highly similar answer found in knowledge base.", 0.3));

    const first = await handler();
    const second = await handler();
    const third = await handler();

    expect(findMock.mock.calls).toEqual([["unknown question"], ["another question"]]);
    expect(first.processed).toBe(1);
    expect(second.processed).toBe(1);
    expect(third.processed).toBe(0);
    expect(mailbox.messages.get("m1")?.labelIds.has("UNREAD")).toBe(true);
    expect(mailbox.messages.get("m2")?.labelIds.has("UNREAD")).toBe(true);
  });

  it("replies once to an auto-reply message across runs", async () => {
    mailbox.deliverUnread("m1", "is the webinar recorded?");
    findMock.mockResolvedValue(tier("auto-reply", "Yes.", 0.99));

    await handler();
    const second = await handler();

    expect(mailbox.sent).toEqual(["t-m1"]);
    expect(second.processed).toBe(0);
    expect(mailbox.messages.get("m1")?.labelIds.has("UNREAD")).toBe(false);
    expect(mailbox.labels.map((l) => l.name)).toEqual(["AI_REPLIED"]);
  });
});
