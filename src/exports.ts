export { GeminiWebuiClient } from "./gemini-webui-client.js";
export type {
  GeminiWebuiClientOptions,
  GenerateContentInput,
  GenerateOptions,
  SessionInfo,
} from "./gemini-webui-client.js";
export { ChatSession } from "./chat-session.js";
export type { ChatSessionOptions, ContentGenerator } from "./chat-session.js";
export {
  APIError,
  AuthError,
  ClientError,
  GeminiError,
  ImageGenerationError,
  ModelInvalid,
  TemporarilyBlocked,
  TimeoutError,
  UsageLimitExceeded,
} from "./errors.js";
export { Candidate, GemJar, GeneratedImage, Image, ModelOutput, WebImage } from "./types.js";
export type { CookieJar, Gem, Lineage } from "./types.js";
export { MODELS, ErrorCode } from "./constants.js";
export { FetchTransport } from "./transport.js";
export type { Transport, TransportFactory, TransportRequest, TransportResponse } from "./transport.js";
export type { FileUploader } from "./uploader.js";
