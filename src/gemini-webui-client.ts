import { ChatSession, type ChatSessionOptions } from "./chat-session.js";
import { type ClientConfig, type ClientConfigOptions, type LifecycleSettings, resolveClientConfig } from "./config.js";
import { ENDPOINTS, GEMINI_HEADERS, MODELS, resolveModel } from "./constants.js";
import { CredentialStore, acquireCredential, rotateSessionCookie } from "./credentials.js";
import { APIError, TimeoutError, shouldResetConnection, toErrorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { buildFormBody, encodeGemsRequest, encodeGenerateRequest } from "./request-codec.js";
import { parseGemsResponse, parseGenerateResponse } from "./response-parser.js";
import { RetryingInvoker } from "./retrying-invoker.js";
import { TaskRegistry, scheduleOnce } from "./task-registry.js";
import { TokenRefresher } from "./token-refresher.js";
import { FetchTransport, type Transport, type TransportFactory, type TransportResponse } from "./transport.js";
import type { CookieJar, Gem, GemJar, ModelOutput } from "./types.js";
import { type FileUploader, uploadAttachments, uploadFile } from "./uploader.js";

export type GeminiWebuiClientOptions = ClientConfigOptions & {
  transportFactory?: TransportFactory;
  uploader?: FileUploader;
  env?: Record<string, string | undefined>;
  /** Pause between retries; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
};

export type GenerateContentInput = {
  prompt: string;
  /** Local paths, uploaded before the prompt is sent. */
  files?: readonly string[];
  model?: string;
  gem?: Gem | string;
  /** `[cid, rid, rcid]` of the turn to continue from. */
  lineage?: readonly (string | null)[] | null;
};

export type GenerateOptions = {
  /** Retries after the first attempt. Default 2. */
  retry?: number;
};

export type SessionInfo = {
  running: boolean;
  cookieNames: string[];
  issuedAt: string | null;
};

const IDLE_CLOSE_TASK = "idle-close";
const DEFAULT_RETRY = 2;

/**
 * Client for the Gemini web app, authenticated with the browser session
 * cookies. Connects lazily: the first call (or an explicit `init`) performs the
 * token handshake, and any call after a reset handshakes again.
 */
export class GeminiWebuiClient {
  readonly #config: ClientConfig;
  readonly #store: CredentialStore;
  readonly #tasks = new TaskRegistry();
  readonly #refresher: TokenRefresher;
  readonly #invoker: RetryingInvoker;
  readonly #transportFactory: TransportFactory;
  readonly #uploader: FileUploader;
  #lifecycle: LifecycleSettings;
  #transport: Transport | null = null;
  #running = false;
  #initializing: Promise<void> | null = null;
  #gems: GemJar | null = null;

  constructor(options: GeminiWebuiClientOptions = {}) {
    this.#config = resolveClientConfig(options, options.env ?? process.env);
    this.#lifecycle = {
      timeoutMs: this.#config.timeoutMs,
      autoClose: this.#config.autoClose,
      closeDelayMs: this.#config.closeDelayMs,
      autoRefresh: this.#config.autoRefresh,
      refreshIntervalMs: this.#config.refreshIntervalMs,
    };
    this.#store = new CredentialStore(this.#config.cookies);
    this.#transportFactory =
      options.transportFactory ?? (() => new FetchTransport({ defaultTimeoutMs: this.#lifecycle.timeoutMs }));
    this.#uploader = options.uploader ?? uploadFile;
    this.#refresher = new TokenRefresher(this.#tasks, (cookies) => this.#rotateCookie(cookies));
    this.#invoker = new RetryingInvoker(this, { delayMs: this.#config.retryDelayMs, sleep: options.sleep });
  }

  get running(): boolean {
    return this.#running;
  }

  get settings(): Readonly<LifecycleSettings> {
    return { ...this.#lifecycle };
  }

  get cookies(): Readonly<CookieJar> {
    return this.#store.cookies;
  }

  get autoRefreshActive(): boolean {
    return this.#refresher.isRunning(this.#store);
  }

  /** Gems from the last `fetchGems` call. */
  get gems(): GemJar {
    if (!this.#gems) {
      throw new Error("gems_not_fetched: call fetchGems() first");
    }
    return this.#gems;
  }

  static listModels(): string[] {
    return MODELS.map((model) => model.name);
  }

  /**
   * Performs the token handshake and opens a connection. `overrides` replace
   * the lifecycle settings for this and every later re-initialisation.
   * Callers arriving while a handshake is in flight wait for that handshake.
   */
  async init(overrides: Partial<LifecycleSettings> = {}): Promise<void> {
    this.#lifecycle = { ...this.#lifecycle, ...overrides };
    if (!this.#initializing) {
      this.#initializing = this.#handshake().finally(() => {
        this.#initializing = null;
      });
    }
    await this.#initializing;
  }

  async #handshake(): Promise<void> {
    const transport = this.#transportFactory();

    try {
      const credential = await acquireCredential(transport, this.#store.cookies, this.#lifecycle.timeoutMs);
      this.#store.replace(credential);

      const previous = this.#transport;
      this.#transport = transport;
      this.#running = true;
      if (previous && previous !== transport) {
        await previous.close();
      }

      if (this.#lifecycle.autoClose) {
        this.#resetCloseTask();
      }

      this.#refresher.stop(this.#store);
      if (this.#lifecycle.autoRefresh) {
        this.#refresher.start(this.#store, this.#lifecycle.refreshIntervalMs);
      }

      logger.info("gemini client initialized", {
        autoClose: this.#lifecycle.autoClose,
        autoRefresh: this.#lifecycle.autoRefresh,
      });
    } catch (error) {
      await transport.close();
      await this.close();
      throw error;
    }
  }

  /** Drops the connection. The next call re-initialises; cookie refresh keeps running. */
  async close(): Promise<void> {
    this.#running = false;
    this.#tasks.cancel(IDLE_CLOSE_TASK);

    const transport = this.#transport;
    this.#transport = null;
    if (transport) {
      await transport.close();
    }
  }

  stopAutoRefresh(): boolean {
    return this.#refresher.stop(this.#store);
  }

  /** Closes the connection and cancels every background task. */
  async dispose(): Promise<void> {
    await this.close();
    this.#tasks.cancelAll();
  }

  async describeSession(): Promise<SessionInfo> {
    if (!this.#running) {
      await this.init();
    }

    return {
      running: this.#running,
      cookieNames: Object.keys(this.#store.cookies).sort(),
      issuedAt: this.#store.hasCredential ? this.#store.read().issuedAt.toISOString() : null,
    };
  }

  startChat(options: ChatSessionOptions = {}): ChatSession {
    return new ChatSession(this, options);
  }

  async generateContent(input: GenerateContentInput, options: GenerateOptions = {}): Promise<ModelOutput> {
    if (!input.prompt.trim()) {
      throw new TypeError("missing_prompt");
    }
    const prompt = input.prompt;

    const model = resolveModel(input.model);
    const gemId = typeof input.gem === "string" ? input.gem : input.gem?.id;

    return await this.#invoker.invoke({
      name: "generateContent",
      retry: options.retry ?? DEFAULT_RETRY,
      run: async () => {
        const transport = this.#requireTransport();
        if (this.#lifecycle.autoClose) {
          this.#resetCloseTask();
        }

        const attachments = await uploadAttachments(
          input.files ?? [],
          transport,
          this.#uploader,
          this.#lifecycle.timeoutMs,
        );

        const credential = this.#store.read();
        const response = await this.#post(transport, "generate_content", {
          url: ENDPOINTS.generate,
          headers: { ...GEMINI_HEADERS, ...model.header },
          cookies: credential.cookies,
          form: buildFormBody(
            credential.accessToken,
            encodeGenerateRequest({ prompt, attachments, lineage: input.lineage, gemId }),
          ),
        });

        if (response.status !== 200) {
          await this.close();
          throw new APIError(`generate_content_failed_${response.status}: client will re-initialize on next request`);
        }

        try {
          return parseGenerateResponse(response.text, {
            modelName: model.name,
            cookies: credential.cookies,
            imageScanLimit: this.#config.imageScanLimit,
          });
        } catch (error) {
          if (shouldResetConnection(error)) {
            await this.close();
          }
          throw error;
        }
      },
    });
  }

  /** Fetches predefined and custom gems; the result replaces `gems` wholesale. */
  async fetchGems(options: GenerateOptions = {}): Promise<GemJar> {
    return await this.#invoker.invoke({
      name: "fetchGems",
      retry: options.retry ?? DEFAULT_RETRY,
      run: async () => {
        const transport = this.#requireTransport();
        const credential = this.#store.read();
        const response = await this.#post(transport, "fetch_gems", {
          url: ENDPOINTS.batchExecute,
          headers: GEMINI_HEADERS,
          cookies: credential.cookies,
          form: buildFormBody(credential.accessToken, encodeGemsRequest()),
        });

        if (response.status !== 200) {
          await this.close();
          throw new APIError(`fetch_gems_failed_${response.status}`);
        }

        try {
          this.#gems = parseGemsResponse(response.text);
        } catch (error) {
          await this.close();
          throw error;
        }
        return this.#gems;
      },
    });
  }

  #requireTransport(): Transport {
    const transport = this.#transport;
    if (!this.#running || !transport || transport.closed) {
      this.#running = false;
      throw new APIError("client_not_running: connection was closed");
    }
    return transport;
  }

  async #post(
    transport: Transport,
    operation: string,
    request: { url: string; headers: Record<string, string>; cookies: Readonly<CookieJar>; form: Record<string, string> },
  ): Promise<TransportResponse> {
    try {
      return await transport.request({ method: "POST", timeoutMs: this.#lifecycle.timeoutMs, ...request });
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new TimeoutError(
          `${operation}_timed_out after ${this.#lifecycle.timeoutMs}ms; consider a higher timeoutMs`,
        );
      }
      throw error;
    }
  }

  #resetCloseTask(): void {
    this.#tasks.startOrReplace(
      IDLE_CLOSE_TASK,
      scheduleOnce(this.#lifecycle.closeDelayMs, () => {
        logger.info("closing idle gemini client", { closeDelayMs: this.#lifecycle.closeDelayMs });
        this.close().catch((error: unknown) => {
          logger.warn("idle close failed", { error: toErrorMessage(error) });
        });
      }),
    );
  }

  async #rotateCookie(cookies: Readonly<CookieJar>): Promise<string | null> {
    const transport = this.#transportFactory();
    try {
      return await rotateSessionCookie(transport, cookies, this.#lifecycle.timeoutMs);
    } finally {
      await transport.close();
    }
  }
}
