import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { APIError } from "./errors.js";

export type CookieJar = Record<string, string>;

/** `[conversationId, replyId, replyCandidateId]`; each slot may be unset. */
export type Lineage = [string | null, string | null, string | null];

export type ImageFetchOptions = {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

const DEFAULT_IMAGE_TIMEOUT_MS = 60000;

function inferFileName(url: string): string {
  let last = "";
  try {
    last = new URL(url).pathname.split("/").pop() ?? "";
  } catch {
    last = "";
  }

  const cleaned = last.replace(/[^\w.-]+/g, "_");
  if (!cleaned) {
    return `image-${Date.now()}.png`;
  }

  return /\.\w+$/.test(cleaned) ? cleaned : `${cleaned}.png`;
}

export abstract class Image {
  readonly url: string;
  readonly title: string;
  readonly alt: string;
  readonly #fetch: typeof fetch;
  readonly #timeoutMs: number;

  constructor(url: string, title: string, alt: string, options: ImageFetchOptions = {}) {
    this.url = url;
    this.title = title;
    this.alt = alt;
    this.#fetch = options.fetchImpl ?? fetch;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_IMAGE_TIMEOUT_MS;
  }

  abstract readonly requiresCredentials: boolean;

  describe(): string {
    return `${this.title}(${this.url}) - ${this.alt}`;
  }

  abstract fetchBytes(): Promise<Uint8Array>;

  /** Writes the image into `directory` and returns the written path. */
  async save(directory: string, filename?: string): Promise<string> {
    const bytes = await this.fetchBytes();
    const target = path.join(directory, filename ?? inferFileName(this.url));
    await mkdir(directory, { recursive: true });
    await writeFile(target, bytes);
    return target;
  }

  protected async download(url: string, headers: Record<string, string>): Promise<Uint8Array> {
    const response = await this.#fetch(url, {
      headers,
      redirect: "follow",
      signal: AbortSignal.timeout(this.#timeoutMs),
    });

    if (!response.ok) {
      throw new APIError(`image_fetch_failed_${response.status}: ${this.url}`);
    }

    return new Uint8Array(await response.arrayBuffer());
  }
}

/** An image the answer links to from the open web. */
export class WebImage extends Image {
  readonly requiresCredentials = false;

  async fetchBytes(): Promise<Uint8Array> {
    return await this.download(this.url, {});
  }
}

/** An image the service generated; only reachable with the account's cookies. */
export class GeneratedImage extends Image {
  readonly requiresCredentials = true;
  readonly #cookies: CookieJar;

  constructor(url: string, title: string, alt: string, cookies: CookieJar, options: ImageFetchOptions = {}) {
    super(url, title, alt, options);
    this.#cookies = { ...cookies };
  }

  async fetchBytes(fullSize = true): Promise<Uint8Array> {
    const url = fullSize ? `${this.url}=s2048` : this.url;
    const cookie = Object.entries(this.#cookies)
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
    return await this.download(url, cookie ? { Cookie: cookie } : {});
  }
}

export class Candidate {
  constructor(
    readonly rcid: string,
    readonly text: string,
    readonly thoughts: string | null,
    readonly webImages: readonly WebImage[],
    readonly generatedImages: readonly GeneratedImage[],
  ) {}

  get images(): Image[] {
    return [...this.webImages, ...this.generatedImages];
  }
}

/**
 * Result of one generation call. Everything is fixed at construction except the
 * chosen candidate, which a chat session may switch.
 */
export class ModelOutput {
  readonly lineage: readonly (string | null)[];
  readonly candidates: readonly Candidate[];
  #chosenIndex = 0;

  constructor(lineage: readonly (string | null)[], candidates: readonly Candidate[]) {
    this.lineage = [...lineage];
    this.candidates = [...candidates];
  }

  get chosenIndex(): number {
    return this.#chosenIndex;
  }

  choose(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.candidates.length) {
      throw new RangeError(`candidate_index_out_of_range: ${index} (candidates: ${this.candidates.length})`);
    }
    this.#chosenIndex = index;
  }

  get chosen(): Candidate {
    const candidate = this.candidates[this.#chosenIndex];
    if (!candidate) {
      throw new RangeError("model_output_has_no_candidates");
    }
    return candidate;
  }

  get text(): string {
    return this.chosen.text;
  }

  get thoughts(): string | null {
    return this.chosen.thoughts;
  }

  get images(): Image[] {
    return this.chosen.images;
  }

  get rcid(): string {
    return this.chosen.rcid;
  }

  toString(): string {
    return this.text;
  }
}

export type Gem = {
  readonly id: string;
  readonly name: string;
  readonly description: string | null;
  readonly prompt: string | null;
  readonly predefined: boolean;
};

/** Snapshot of the account's gems. Never mutated; a new fetch builds a new jar. */
export class GemJar implements Iterable<Gem> {
  readonly #gems: ReadonlyMap<string, Gem>;

  constructor(gems: Iterable<Gem>) {
    const byId = new Map<string, Gem>();
    for (const gem of gems) {
      byId.set(gem.id, gem);
    }
    this.#gems = byId;
  }

  get size(): number {
    return this.#gems.size;
  }

  [Symbol.iterator](): Iterator<Gem> {
    return this.#gems.values();
  }

  get(query: { id?: string; name?: string }): Gem | undefined {
    if (query.id !== undefined) {
      const gem = this.#gems.get(query.id);
      if (gem && (query.name === undefined || gem.name === query.name)) {
        return gem;
      }
      return undefined;
    }

    if (query.name !== undefined) {
      for (const gem of this.#gems.values()) {
        if (gem.name === query.name) {
          return gem;
        }
      }
    }

    return undefined;
  }

  filter(query: { predefined?: boolean; name?: string } = {}): GemJar {
    const matches = Array.from(this.#gems.values()).filter(
      (gem) =>
        (query.predefined === undefined || gem.predefined === query.predefined) &&
        (query.name === undefined || gem.name === query.name),
    );
    return new GemJar(matches);
  }
}
