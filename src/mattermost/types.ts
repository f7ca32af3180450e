import { z } from "zod";
import { MattermostError } from "../utils/errors.js";

export interface MattermostConfig {
  /** Server root, e.g. `https://chat.example.com` (no `/api/v4`) */
  baseUrl: string;
  /** Bot or personal access token */
  token: string;
  /** Channel every post and upload goes to */
  channelId: string;
}

/** How a POST body goes over the wire */
export type ContentKind = "json" | "raw";

export type RequestBody = string | Uint8Array;

export interface RequestOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface PostPayload {
  channelId: string;
  message: string;
  fileIds?: string[];
}

export interface Attachment {
  filename: string;
  content: Uint8Array;
}

/** An attachment given either as an object or as a `[filename, content]` pair */
export type AttachmentInput = Attachment | readonly [filename: string, content: Uint8Array];

const PostWireSchema = z.object({
  channel_id: z.string(),
  message: z.string(),
  file_ids: z.array(z.string()).nullish(),
});

export const FileUploadResponseSchema = z.object({
  file_infos: z.array(z.object({ id: z.string() })).min(1),
});

export type FileUploadResponse = z.infer<typeof FileUploadResponseSchema>;

export const ChannelResponseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    display_name: z.string(),
    type: z.string(),
  })
  .transform((c) => ({
    id: c.id,
    name: c.name,
    displayName: c.display_name,
    type: c.type,
  }));

export type ChannelInfo = z.infer<typeof ChannelResponseSchema>;

/** Encode a post for `POST /api/v4/posts`. No attachments encode as `"file_ids": null`. */
export function encodePostPayload(payload: PostPayload): string {
  return JSON.stringify({
    channel_id: payload.channelId,
    message: payload.message,
    file_ids: payload.fileIds ?? null,
  });
}

export function decodePostPayload(json: string): PostPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new MattermostError("Post payload is not valid JSON", "INVALID_PAYLOAD", err);
  }

  const parsed = PostWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MattermostError("Post payload has an unexpected shape", "INVALID_PAYLOAD", parsed.error);
  }

  const wire = parsed.data;
  const payload: PostPayload = { channelId: wire.channel_id, message: wire.message };
  if (wire.file_ids) payload.fileIds = wire.file_ids;
  return payload;
}

export function toAttachment(input: AttachmentInput): Attachment {
  if ("filename" in input) return input;
  const [filename, content] = input;
  return { filename, content };
}
