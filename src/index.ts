export { loadConfig, type AppConfig, type LoadConfigOptions } from "./config.js";
export { MattermostClient, type MattermostClientOptions } from "./mattermost/client.js";
export {
  DEFAULT_GET_TIMEOUT_MS,
  Dispatcher,
  type DispatchOptions,
  type DispatcherOptions,
  type RequestLogger,
} from "./mattermost/dispatcher.js";
export {
  decodePostPayload,
  encodePostPayload,
  type Attachment,
  type AttachmentInput,
  type ChannelInfo,
  type ContentKind,
  type MattermostConfig,
  type PostPayload,
  type RequestBody,
  type RequestOptions,
} from "./mattermost/types.js";
export {
  ConfigError,
  MattermostError,
  RequestError,
  isNotFoundError,
  isRequestError,
  type NotFoundError,
  type RequestErrorKind,
  type RequestErrorOptions,
} from "./utils/errors.js";
export { createChildLogger, logger, type Logger } from "./utils/logger.js";
