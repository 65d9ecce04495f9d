import { GEMS_BATCH_CALLS } from "./constants.js";
import type { Lineage } from "./types.js";

export type Attachment = {
  uploadRef: string;
  fileName: string;
};

export type GenerateRequestInput = {
  prompt: string;
  attachments?: readonly Attachment[];
  /** Omit, or pass all-null, for a conversation that has not completed a turn. */
  lineage?: readonly (string | null)[] | null;
  gemId?: string | null;
};

/** Slots the service reserves between the lineage and the gem id. */
const RESERVED_TURN_SLOTS = 16;

export type ContentEnvelope = [string] | [string, 0, null, Array<[[string], string]>];

export function buildContentEnvelope(prompt: string, attachments: readonly Attachment[] = []): ContentEnvelope {
  if (attachments.length === 0) {
    return [prompt];
  }

  return [prompt, 0, null, attachments.map((file): [[string], string] => [[file.uploadRef], file.fileName])];
}

function normalizeLineage(lineage: GenerateRequestInput["lineage"]): Lineage | null {
  if (!lineage || lineage.every((slot) => slot === null || slot === undefined)) {
    return null;
  }

  return [lineage[0] ?? null, lineage[1] ?? null, lineage[2] ?? null];
}

export function buildTurnEnvelope(input: GenerateRequestInput): unknown[] {
  const envelope: unknown[] = [
    buildContentEnvelope(input.prompt, input.attachments),
    null,
    normalizeLineage(input.lineage),
  ];

  if (input.gemId) {
    for (let slot = 0; slot < RESERVED_TURN_SLOTS; slot += 1) {
      envelope.push(null);
    }
    envelope.push(input.gemId);
  }

  return envelope;
}

/** Value of the `f.req` form field for a generation call. */
export function encodeGenerateRequest(input: GenerateRequestInput): string {
  return JSON.stringify([null, JSON.stringify(buildTurnEnvelope(input))]);
}

/** Value of the `f.req` form field for the gem listing batch call. */
export function encodeGemsRequest(): string {
  return JSON.stringify([GEMS_BATCH_CALLS]);
}

export function buildFormBody(accessToken: string, fReq: string): Record<string, string> {
  return {
    at: accessToken,
    "f.req": fReq,
  };
}
