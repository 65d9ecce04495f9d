import { ErrorCode } from "./constants.js";
import {
  APIError,
  GeminiError,
  ImageGenerationError,
  ModelInvalid,
  TemporarilyBlocked,
  UsageLimitExceeded,
} from "./errors.js";
import { logger } from "./logger.js";
import {
  type FieldPath,
  RESPONSE_LAYOUT,
  isFilled,
  pick,
  pickArray,
  pickString,
  safeJsonParse,
} from "./wire-layout.js";
import {
  Candidate,
  type CookieJar,
  type Gem,
  GemJar,
  GeneratedImage,
  type ImageFetchOptions,
  ModelOutput,
  WebImage,
} from "./types.js";

const CARD_CONTENT_PATTERN = /^http:\/\/googleusercontent\.com\/card_content\/\d+/;
const IMAGE_GENERATION_PLACEHOLDER = /http:\/\/googleusercontent\.com\/image_generation_content\/\d+/g;
const DEFAULT_IMAGE_SCAN_LIMIT = 64;
const RAW_PREVIEW_CHARS = 500;

export type ParseGenerateOptions = {
  /** Model name, only used to word classified errors. */
  modelName?: string;
  /** Cookies handed to generated images so they can be fetched later. */
  cookies?: CookieJar;
  /** How many parts, counted from the body part, to search for generated images. */
  imageScanLimit?: number;
  imageFetch?: ImageFetchOptions;
};

type LocatedBody = {
  body: unknown[];
  index: number;
};

function preview(raw: string): string {
  return raw.length > RAW_PREVIEW_CHARS ? `${raw.slice(0, RAW_PREVIEW_CHARS)}…` : raw;
}

/** Lines 0 and 1 are framing; line 2 is the parts array. */
export function parsePartsLine(raw: string): unknown[] | null {
  const line = raw.split("\n")[RESPONSE_LAYOUT.partsLine];
  const parsed = safeJsonParse(line);
  return Array.isArray(parsed) ? parsed : null;
}

function parsePartPayload(part: unknown): unknown[] | null {
  const payload = safeJsonParse(pick(part, RESPONSE_LAYOUT.partPayload));
  return Array.isArray(payload) ? payload : null;
}

export function locateBody(parts: readonly unknown[]): LocatedBody | null {
  for (let index = 0; index < parts.length; index += 1) {
    const payload = parsePartPayload(parts[index]);
    if (payload && isFilled(pick(payload, RESPONSE_LAYOUT.bodyCandidates))) {
      return { body: payload, index };
    }
  }

  return null;
}

/**
 * Maps the service's rejection code, when there is one, to its error kind.
 * Returns `null` for unknown codes and for payloads without a code.
 */
export function classifyRejection(parts: readonly unknown[] | null, modelName = "unspecified"): Error | null {
  const code = pick(parts, RESPONSE_LAYOUT.errorCode);
  switch (code) {
    case ErrorCode.USAGE_LIMIT_EXCEEDED:
      return new UsageLimitExceeded(`usage_limit_exceeded: model ${modelName}; try another model`);
    case ErrorCode.MODEL_HEADER_INVALID:
      return new ModelInvalid(`model_unavailable: ${modelName} is not accepted by the service`);
    case ErrorCode.IP_TEMPORARILY_BLOCKED:
      return new TemporarilyBlocked("ip_temporarily_blocked: wait a while or use another network");
    default:
      return null;
  }
}

function parseWebImages(candidate: unknown, options: ParseGenerateOptions): WebImage[] {
  const layout = RESPONSE_LAYOUT.webImage;
  const entries = pickArray(candidate, RESPONSE_LAYOUT.candidate.webImages) ?? [];
  return entries.map((entry) => {
    const url = pickString(entry, layout.url);
    if (url === null) {
      throw new APIError("invalid_response_structure: web image without url");
    }
    return new WebImage(url, pickString(entry, layout.title) ?? "", pickString(entry, layout.alt) ?? "", options.imageFetch);
  });
}

function parseGeneratedImages(entries: readonly unknown[], options: ParseGenerateOptions): GeneratedImage[] {
  const layout = RESPONSE_LAYOUT.generatedImage;
  return entries.map((entry, imageIndex) => {
    const url = pickString(entry, layout.url);
    if (url === null) {
      throw new APIError("invalid_response_structure: generated image without url");
    }

    const alts = pickArray(entry, layout.alts) ?? [];
    const altCandidate = alts[imageIndex] ?? alts[0];
    const alt = typeof altCandidate === "string" ? altCandidate : "";
    const number = pick(entry, layout.number);
    return new GeneratedImage(url, `[Generated Image ${String(number ?? "")}]`, alt, options.cookies ?? {}, options.imageFetch);
  });
}

/**
 * Generated images arrive in a later part than the text that announces them.
 * Searches forward from the body part, at most `limit` parts, for the first
 * payload whose marker for this candidate carries at least one image url.
 */
function findGeneratedImagePayload(
  parts: readonly unknown[],
  fromIndex: number,
  candidateIndex: number,
  limit: number,
): unknown[] | null {
  const markerPath: FieldPath = [
    ...RESPONSE_LAYOUT.bodyCandidates,
    candidateIndex,
    ...RESPONSE_LAYOUT.candidate.generatedImages,
  ];
  const end = Math.min(parts.length, fromIndex + limit);
  for (let index = fromIndex; index < end; index += 1) {
    const payload = parsePartPayload(parts[index]);
    const delivered = pickArray(payload, markerPath) ?? [];
    if (payload && delivered.some((entry) => pickString(entry, RESPONSE_LAYOUT.generatedImage.url) !== null)) {
      return payload;
    }
  }

  return null;
}

function parseCandidate(
  candidate: unknown,
  candidateIndex: number,
  parts: readonly unknown[],
  bodyIndex: number,
  options: ParseGenerateOptions,
): Candidate {
  const layout = RESPONSE_LAYOUT.candidate;
  const rcid = pickString(candidate, layout.id);
  let text = pickString(candidate, layout.text);
  if (rcid === null || text === null) {
    throw new APIError("invalid_response_structure: candidate without id or text");
  }

  if (CARD_CONTENT_PATTERN.test(text)) {
    const altText = pickString(candidate, layout.altText);
    text = altText || text;
  }

  const thoughts = pickString(candidate, layout.thoughts);
  const webImages = parseWebImages(candidate, options);

  let generatedImages: GeneratedImage[] = [];
  if (isFilled(pick(candidate, layout.generatedImages))) {
    const imagePayload = findGeneratedImagePayload(
      parts,
      bodyIndex,
      candidateIndex,
      options.imageScanLimit ?? DEFAULT_IMAGE_SCAN_LIMIT,
    );
    if (!imagePayload) {
      throw new ImageGenerationError("generated_images_not_found: images were announced but never delivered");
    }

    const imageCandidate = pick(imagePayload, [...RESPONSE_LAYOUT.bodyCandidates, candidateIndex]);
    const imageText = pickString(imageCandidate, layout.text) ?? text;
    text = imageText.replace(IMAGE_GENERATION_PLACEHOLDER, "").trimEnd();
    generatedImages = parseGeneratedImages(pickArray(imageCandidate, layout.generatedImages) ?? [], options);
  }

  return new Candidate(rcid, text, thoughts, webImages, generatedImages);
}

/**
 * Decodes a generation response.
 *
 * @throws {APIError} no body part could be found, and no known rejection code is present
 * @throws {UsageLimitExceeded | ModelInvalid | TemporarilyBlocked} the service refused
 * @throws {ImageGenerationError} generated images were announced but not delivered
 * @throws {GeminiError} a body was found but held no candidates
 */
export function parseGenerateResponse(raw: string, options: ParseGenerateOptions = {}): ModelOutput {
  const parts = parsePartsLine(raw);
  const located = parts ? locateBody(parts) : null;

  if (!parts || !located) {
    const rejection = classifyRejection(parts, options.modelName);
    if (rejection) {
      throw rejection;
    }

    logger.debug("invalid generate response", { raw: preview(raw) });
    throw new APIError("invalid_response: no body part found in generate response");
  }

  const entries = pickArray(located.body, RESPONSE_LAYOUT.bodyCandidates) ?? [];
  const candidates = entries.map((entry, candidateIndex) =>
    parseCandidate(entry, candidateIndex, parts, located.index, options),
  );

  if (candidates.length === 0) {
    throw new GeminiError("no_output: response body held no candidates");
  }

  const lineage = (pickArray(located.body, RESPONSE_LAYOUT.bodyLineage) ?? [])
    .slice(0, 3)
    .map((slot) => (typeof slot === "string" ? slot : null));

  return new ModelOutput(lineage, candidates);
}

function parseGem(entry: unknown, predefined: boolean): Gem {
  const layout = RESPONSE_LAYOUT.gems;
  const id = pickString(entry, layout.id);
  const name = pickString(entry, layout.name);
  if (id === null || name === null) {
    throw new APIError("invalid_response_structure: gem without id or name");
  }

  return {
    id,
    name,
    description: pickString(entry, layout.description),
    prompt: pickString(entry, layout.prompt) || null,
    predefined,
  };
}

/**
 * Decodes the gem listing batch response. Parts are told apart by the tag in
 * their last slot (`"system"` or `"custom"`).
 */
export function parseGemsResponse(raw: string): GemJar {
  const parts = parsePartsLine(raw);
  if (!parts) {
    logger.debug("invalid gems response", { raw: preview(raw) });
    throw new APIError("invalid_response: gems payload line missing");
  }

  let predefined: unknown[] = [];
  let custom: unknown[] = [];
  for (const part of parts) {
    if (!Array.isArray(part) || part.length === 0) {
      continue;
    }

    const tag = part[part.length - 1];
    const list = pickArray(parsePartPayload(part), RESPONSE_LAYOUT.gems.list) ?? [];
    if (tag === "system") {
      predefined = list;
    } else if (tag === "custom") {
      custom = list;
    }
  }

  if (predefined.length === 0 && custom.length === 0) {
    logger.debug("invalid gems response", { raw: preview(raw) });
    throw new APIError("invalid_response: no gems found in response");
  }

  return new GemJar([
    ...predefined.map((entry) => parseGem(entry, true)),
    ...custom.map((entry) => parseGem(entry, false)),
  ]);
}
