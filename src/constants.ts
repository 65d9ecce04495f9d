export const ENDPOINTS = {
  google: "https://www.google.com",
  init: "https://gemini.google.com/app",
  generate: "https://gemini.google.com/_/BardChatUi/data/assistant.lamda.BardFrontendService/StreamGenerate",
  rotateCookies: "https://accounts.google.com/RotateCookies",
  upload: "https://content-push.googleapis.com/upload",
  batchExecute: "https://gemini.google.com/_/BardChatUi/data/batchexecute",
} as const;

export const SESSION_COOKIE = "__Secure-1PSID";
export const ROTATING_COOKIE = "__Secure-1PSIDTS";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export const GEMINI_HEADERS: Record<string, string> = {
  "Content-Type": "application/x-www-form-urlencoded;charset=utf-8",
  Origin: "https://gemini.google.com",
  Referer: "https://gemini.google.com/",
  "User-Agent": USER_AGENT,
  "X-Same-Domain": "1",
};

export const ROTATE_COOKIES_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
};

export const ROTATE_COOKIES_BODY = '[000,"-0000000000000000000"]';

export const UPLOAD_HEADERS: Record<string, string> = {
  "Push-ID": "feeds/mcudyrk2a4khkz",
};

export const ACCESS_TOKEN_PATTERN = /"SNlM0e":"(.*?)"/;

export const MODEL_HEADER_NAME = "x-goog-ext-525001261-jspb";

export type ModelSpec = {
  name: string;
  header: Record<string, string>;
  advancedOnly: boolean;
};

export const MODELS: readonly ModelSpec[] = [
  { name: "unspecified", header: {}, advancedOnly: false },
  {
    name: "gemini-2.0-flash",
    header: { [MODEL_HEADER_NAME]: '[1,null,null,null,"f299729663a2343f"]' },
    advancedOnly: false,
  },
  {
    name: "gemini-2.0-flash-thinking",
    header: { [MODEL_HEADER_NAME]: '[null,null,null,null,"7ca48d02d802f20a"]' },
    advancedOnly: false,
  },
  {
    name: "gemini-2.5-flash",
    header: { [MODEL_HEADER_NAME]: '[1,null,null,null,"35609594dbe934d8"]' },
    advancedOnly: false,
  },
  {
    name: "gemini-2.5-pro",
    header: { [MODEL_HEADER_NAME]: '[1,null,null,null,"2525e3954d185b3c"]' },
    advancedOnly: false,
  },
];

export const DEFAULT_MODEL = "unspecified";

export function resolveModel(name: string | undefined): ModelSpec {
  const wanted = String(name ?? DEFAULT_MODEL).trim() || DEFAULT_MODEL;
  const model = MODELS.find((entry) => entry.name === wanted);
  if (!model) {
    const available = MODELS.map((entry) => entry.name).join(", ");
    throw new TypeError(`unknown_model_${wanted}; available: ${available}`);
  }

  return model;
}

/** Numeric codes the service reports at a fixed position when it refuses a generation. */
export enum ErrorCode {
  USAGE_LIMIT_EXCEEDED = 1037,
  MODEL_HEADER_INVALID = 1052,
  IP_TEMPORARILY_BLOCKED = 1060,
}

export const GEMS_RPC_ID = "CNgdBe";

export const GEMS_BATCH_CALLS = [
  [GEMS_RPC_ID, '[2,["en"],0]', null, "custom"],
  [GEMS_RPC_ID, '[3,["en"],0]', null, "system"],
] as const;
