import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import axios, { type AxiosInstance, type AxiosResponse, type Method, type RawAxiosRequestHeaders } from "axios";
import { RequestError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { ContentKind, RequestBody, RequestOptions } from "./types.js";

export const DEFAULT_GET_TIMEOUT_MS = 10_000;

const OK_STATUSES = new Set([200, 201]);

/** The slice of a pino logger the dispatcher writes to */
export interface RequestLogger {
  info(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}

export interface DispatcherOptions {
  baseUrl: string;
  token: string;
  logger?: RequestLogger;
  /** Transport; defaults to a fresh axios instance */
  http?: AxiosInstance;
  getTimeoutMs?: number;
}

export interface DispatchOptions extends RequestOptions {
  params?: Record<string, string>;
}

interface Dispatch {
  method: Method;
  path: string;
  params?: Record<string, string>;
  headers: RawAxiosRequestHeaders;
  data?: RequestBody;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Sends single requests to the Mattermost REST API and turns the outcome
 * into decoded JSON or a {@link RequestError}.
 */
export class Dispatcher {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly log: RequestLogger;
  private readonly http: AxiosInstance;
  private readonly getTimeoutMs: number;
  // keepAlive off: every request opens and closes its own connection
  private readonly httpAgent = new HttpAgent({ keepAlive: false });
  private readonly httpsAgent = new HttpsAgent({ keepAlive: false });

  constructor(opts: DispatcherOptions) {
    this.baseUrl = opts.baseUrl;
    this.token = opts.token;
    this.log = opts.logger ?? createChildLogger("mattermost");
    this.http = opts.http ?? axios.create();
    this.getTimeoutMs = opts.getTimeoutMs ?? DEFAULT_GET_TIMEOUT_MS;
  }

  /** GET with the configured timeout. */
  async get(path: string, params?: Record<string, string>, options: RequestOptions = {}): Promise<unknown> {
    return this.dispatch({
      method: "GET",
      path,
      params,
      headers: this.authHeaders(),
      timeout: this.getTimeoutMs,
      signal: options.signal,
    });
  }

  /**
   * POST a JSON string or raw bytes. Only `json` bodies get a content type;
   * raw bodies are sent without one. No timeout is applied.
   */
  async post(
    path: string,
    body?: RequestBody,
    contentKind: ContentKind = "json",
    options: DispatchOptions = {},
  ): Promise<unknown> {
    const headers = this.authHeaders();
    if (body !== undefined && contentKind === "json") {
      headers["Content-Type"] = "application/json";
    } else if (contentKind === "raw") {
      // false keeps axios from defaulting POST bodies to form-urlencoded
      headers["Content-Type"] = false;
    }

    let data = body;
    if (data instanceof Uint8Array && !Buffer.isBuffer(data)) {
      data = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    }

    return this.dispatch({
      method: "POST",
      path,
      params: options.params,
      headers,
      data,
      signal: options.signal,
    });
  }

  private authHeaders(): RawAxiosRequestHeaders {
    return { Authorization: `Bearer ${this.token}` };
  }

  private async dispatch(req: Dispatch): Promise<unknown> {
    const { method, path } = req;
    this.log.info({ method, path }, `${method} ${path}`);

    const res = await this.send(req);

    if (!OK_STATUSES.has(res.status)) {
      this.log.debug({ method, path, status: res.status }, "Error status from Mattermost");
      if (res.status === 404) {
        throw new RequestError("Resource not found", { kind: "not_found", status: 404 });
      }
      throw new RequestError(`Got error status code ${res.status}`, { status: res.status });
    }

    try {
      return JSON.parse(res.data);
    } catch (err) {
      throw new RequestError("Response body is not valid JSON", { status: res.status, cause: err });
    }
  }

  private async send(req: Dispatch): Promise<AxiosResponse<string>> {
    const { method, path } = req;
    try {
      return await this.http.request<string>({
        method,
        baseURL: this.baseUrl,
        url: path,
        params: req.params,
        headers: req.headers,
        data: req.data,
        timeout: req.timeout,
        signal: req.signal,
        responseType: "text",
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent,
        // redirects and status codes are mapped by dispatch(), never followed
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (err) {
      if (!axios.isAxiosError(err)) throw err;
      this.log.debug({ method, path, code: err.code }, "Request did not complete");
      throw new RequestError(`${method} ${path} failed: ${err.message}`, { cause: err });
    }
  }
}
