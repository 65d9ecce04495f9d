export type FieldPath = readonly number[];

/**
 * Positions of every field the client reads from the service's untyped nested
 * arrays. Nothing outside this table should index into a payload by literal
 * number; when the service shifts a field, this is the place to bump.
 */
export const RESPONSE_LAYOUT = {
  version: 1,
  /** Zero-based line of the response text holding the parts array. */
  partsLine: 2,
  /** Each part carries its JSON-encoded payload here. */
  partPayload: [2],
  bodyLineage: [1],
  bodyCandidates: [4],
  candidate: {
    id: [0],
    text: [1, 0],
    altText: [22, 0],
    thoughts: [37, 0, 0],
    webImages: [12, 1],
    generatedImages: [12, 7, 0],
  },
  webImage: {
    url: [0, 0, 0],
    title: [7, 0],
    alt: [0, 4],
  },
  generatedImage: {
    url: [0, 3, 3],
    number: [3, 6],
    alts: [3, 5],
  },
  /** Read from the outer parts array, not from a body. */
  errorCode: [0, 5, 2, 0, 1, 0],
  gems: {
    list: [2],
    id: [0],
    name: [1, 0],
    description: [1, 1],
    prompt: [2, 0],
  },
} as const;

/** Walks `path` through nested arrays; any missing step yields `undefined`. */
export function pick(value: unknown, path: FieldPath): unknown {
  let current: unknown = value;
  for (const index of path) {
    if (!Array.isArray(current) || index < 0 || index >= current.length) {
      return undefined;
    }
    current = current[index];
  }

  return current;
}

export function pickString(value: unknown, path: FieldPath): string | null {
  const found = pick(value, path);
  return typeof found === "string" ? found : null;
}

export function pickArray(value: unknown, path: FieldPath): unknown[] | null {
  const found = pick(value, path);
  return Array.isArray(found) ? found : null;
}

/**
 * Presence test used on payload slots: the service marks absent fields with
 * `null`, `0`, `""` or `[]` interchangeably.
 */
export function isFilled(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }

  return Boolean(value);
}

export function safeJsonParse(raw: unknown): unknown {
  if (typeof raw !== "string") {
    return undefined;
  }

  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
