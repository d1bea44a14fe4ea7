import { google, type gmail_v1 } from "googleapis";
import type { OAuth2Client } from "google-auth-library";
import { getConfig } from "../utils/config";

export type GmailMessage = {
  id: string;
  threadId: string;
};

export type MessageText = {
  subject: string;
  from: string;
  to?: string;
  bodyText: string;
  snippet?: string;
  messageIdHeader?: string;
};

function createOAuth2Client(clientId: string, clientSecret: string): OAuth2Client {
  // Redirect URI is not needed when using refresh token in server-to-server
  const oAuth2Client = new google.auth.OAuth2(clientId, clientSecret);
  return oAuth2Client;
}

export async function getGmailClient(): Promise<gmail_v1.Gmail> {
  const config = getConfig();
  if (!config.GMAIL_CLIENT_ID || !config.GMAIL_CLIENT_SECRET || !config.GMAIL_REFRESH_TOKEN) {
    throw new Error("Missing Gmail credentials in environment variables");
  }
  const oAuth2Client = createOAuth2Client(config.GMAIL_CLIENT_ID, config.GMAIL_CLIENT_SECRET);
  oAuth2Client.setCredentials({ refresh_token: config.GMAIL_REFRESH_TOKEN });
  return google.gmail({ version: "v1", auth: oAuth2Client });
}

// Gmail search writes spaces in label names as hyphens
function labelQueryName(name: string): string {
  return name.trim().replace(/\s+/g, "-");
}

export function unreadQuery(excludeLabels: string[] = []): string {
  const excluded = excludeLabels.filter((l) => l.trim()).map((l) => `-label:${labelQueryName(l)}`);
  return ["label:INBOX", "label:UNREAD", "-category:promotions", "-category:social", ...excluded].join(" ");
}

export async function listUnreadLimited(maxResults: number, excludeLabels: string[] = []): Promise<GmailMessage[]> {
  const gmail = await getGmailClient();
  const q = unreadQuery(excludeLabels);
  const res = await gmail.users.messages.list({ userId: "me", q, maxResults });
  const messages = res.data.messages || [];
  return messages.flatMap((m) => (m.id && m.threadId ? [{ id: m.id, threadId: m.threadId }] : []));
}

export async function getMessageFull(messageId: string): Promise<gmail_v1.Schema$Message> {
  const gmail = await getGmailClient();
  const res = await gmail.users.messages.get({ userId: "me", id: messageId, format: "full" });
  return res.data;
}

function decodeBase64Url(data: string): string {
  const buff = Buffer.from(data.replace(/-/g, "+").replace(/_/g, "/"), "base64");
  return buff.toString("utf-8");
}

function encodeBase64Url(data: string): string {
  return Buffer.from(data).toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

function findPlainText(part: gmail_v1.Schema$MessagePart | undefined): string {
  if (!part) return "";
  if (part.mimeType === "text/plain" && part.body?.data) {
    return decodeBase64Url(part.body.data);
  }
  for (const child of part.parts || []) {
    const text = findPlainText(child);
    if (text) return text;
  }
  return "";
}

export function extractPlainTextFromMessage(message: gmail_v1.Schema$Message): MessageText {
  const headers = new Map(
    (message.payload?.headers || []).flatMap((h) => (h.name && h.value ? [[h.name.toLowerCase(), h.value] as const] : []))
  );

  let bodyText = findPlainText(message.payload ?? undefined);
  if (!bodyText && !message.payload?.parts?.length && message.payload?.body?.data) {
    bodyText = decodeBase64Url(message.payload.body.data);
  }

  return {
    subject: headers.get("subject") || "",
    from: headers.get("from") || "",
    to: headers.get("to"),
    bodyText,
    snippet: message.snippet ?? undefined,
    messageIdHeader: headers.get("message-id"),
  };
}

export function replyAddress(from: string): string {
  const toMatch = /<(.*?)>/.exec(from);
  return toMatch ? toMatch[1] : from;
}

type ReplyParams = { threadId: string; to: string; subject: string; body: string; inReplyTo?: string };

function buildRawReply({ to, subject, body, inReplyTo }: ReplyParams): string {
  const replySubject = subject.startsWith("Re:") ? subject : `Re: ${subject}`;
  const raw = [
    `To: ${to}`,
    `Subject: ${replySubject}`,
    ...(inReplyTo ? [`In-Reply-To: ${inReplyTo}`, `References: ${inReplyTo}`] : []),
    `Content-Type: text/plain; charset=utf-8`,
    "",
    body,
  ].join("\r\n");
  return encodeBase64Url(raw);
}

export async function sendReply(params: ReplyParams) {
  const gmail = await getGmailClient();
  await gmail.users.messages.send({
    userId: "me",
    requestBody: {
      raw: buildRawReply(params),
      threadId: params.threadId,
    },
  });
}

export async function createDraftReply(params: ReplyParams) {
  const gmail = await getGmailClient();
  await gmail.users.drafts.create({
    userId: "me",
    requestBody: {
      message: {
        raw: buildRawReply(params),
        threadId: params.threadId,
      },
    },
  });
}

async function ensureLabelIdByName(name: string): Promise<string> {
  const gmail = await getGmailClient();
  const list = await gmail.users.labels.list({ userId: "me" });
  const found = (list.data.labels || []).find((l) => l.name === name);
  if (found?.id) return found.id;
  const created = await gmail.users.labels.create({
    userId: "me",
    requestBody: { name, labelListVisibility: "labelShow", messageListVisibility: "show" },
  });
  if (!created.data.id) throw new Error("Failed to create label");
  return created.data.id;
}

export async function labelMessage({
  messageId,
  addLabel,
  removeUnread = true,
  restoreUnread = false,
  removeLabel,
}: {
  messageId: string;
  addLabel: string;
  removeUnread?: boolean;
  restoreUnread?: boolean;
  removeLabel?: string;
}) {
  const gmail = await getGmailClient();
  const labelsToAdd: string[] = [];
  const labelsToRemove: string[] = [];
  if (addLabel) {
    const id = await ensureLabelIdByName(addLabel);
    labelsToAdd.push(id);
  }
  if (removeLabel) {
    const id = await ensureLabelIdByName(removeLabel);
    labelsToRemove.push(id);
  }
  if (restoreUnread) labelsToAdd.push("UNREAD");
  else if (removeUnread) labelsToRemove.push("UNREAD");
  await gmail.users.messages.modify({
    userId: "me",
    id: messageId,
    requestBody: { addLabelIds: labelsToAdd, removeLabelIds: labelsToRemove },
  });
}
