import type { AxiosInstance } from "axios";
import { loadConfig, type AppConfig } from "../config.js";
import { RequestError } from "../utils/errors.js";
import { Dispatcher, type RequestLogger } from "./dispatcher.js";
import {
  ChannelResponseSchema,
  FileUploadResponseSchema,
  encodePostPayload,
  toAttachment,
  type AttachmentInput,
  type ChannelInfo,
  type MattermostConfig,
  type RequestOptions,
} from "./types.js";

export interface MattermostClientOptions {
  logger?: RequestLogger;
  http?: AxiosInstance;
  getTimeoutMs?: number;
  /** Replaces the dispatcher built from the other options */
  dispatcher?: Dispatcher;
}

/**
 * Posts messages and files to a single Mattermost channel.
 *
 * Every call is one sequential pipeline. Nothing is retried; request and
 * response failures reach the caller as a {@link RequestError}.
 */
export class MattermostClient {
  readonly config: Readonly<MattermostConfig>;
  private readonly dispatcher: Dispatcher;

  constructor(config: MattermostConfig, options: MattermostClientOptions = {}) {
    this.config = Object.freeze({
      baseUrl: config.baseUrl.replace(/\/+$/, ""),
      token: config.token,
      channelId: config.channelId,
    });
    this.dispatcher =
      options.dispatcher ??
      new Dispatcher({
        baseUrl: this.config.baseUrl,
        token: this.config.token,
        logger: options.logger,
        http: options.http,
        getTimeoutMs: options.getTimeoutMs,
      });
  }

  /** Build a client from {@link loadConfig} (env vars, plus `.env` when no env is given). */
  static fromConfig(config: AppConfig = loadConfig(), options: MattermostClientOptions = {}): MattermostClient {
    return new MattermostClient(config, { getTimeoutMs: config.getTimeoutMs, ...options });
  }

  async sendMessage(text: string, fileIds?: string[], options: RequestOptions = {}): Promise<void> {
    const body = encodePostPayload({ channelId: this.config.channelId, message: text, fileIds });
    await this.dispatcher.post("/api/v4/posts", body, "json", options);
  }

  /** Upload raw bytes to the channel and return the new file id. */
  async uploadFile(filename: string, content: Uint8Array, options: RequestOptions = {}): Promise<string> {
    const res = await this.dispatcher.post("/api/v4/files", content, "raw", {
      ...options,
      params: { channel_id: this.config.channelId, filename },
    });

    const parsed = FileUploadResponseSchema.safeParse(res);
    if (!parsed.success) {
      throw new RequestError("Unexpected upload response shape", { cause: parsed.error });
    }
    return parsed.data.file_infos[0].id;
  }

  /**
   * Upload each attachment in order, then post once with all of their ids.
   * Stops at the first failed upload; files uploaded before it stay on the server.
   */
  async sendMessageWithFiles(
    text: string,
    attachments: readonly AttachmentInput[],
    options: RequestOptions = {},
  ): Promise<void> {
    const ids: string[] = [];
    for (const input of attachments) {
      const { filename, content } = toAttachment(input);
      ids.push(await this.uploadFile(filename, content, options));
    }

    await this.sendMessage(text, ids, options);
  }

  async getChannel(options: RequestOptions = {}): Promise<ChannelInfo> {
    const res = await this.dispatcher.get(
      `/api/v4/channels/${encodeURIComponent(this.config.channelId)}`,
      undefined,
      options,
    );

    const parsed = ChannelResponseSchema.safeParse(res);
    if (!parsed.success) {
      throw new RequestError("Unexpected channel response shape", { cause: parsed.error });
    }
    return parsed.data;
  }
}
