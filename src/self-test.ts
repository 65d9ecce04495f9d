import { parseCliFlags, parseOptionalBoolean, readSecretFromFile } from "./config.js";
import { GeminiWebuiClient } from "./gemini-webui-client.js";

const flags = parseCliFlags(process.argv.slice(2));

function flagValue(name: string): string | null {
  return flags.values.get(name) || null;
}

function resolveSessionCookie(): string {
  const fromFlag = flagValue("--psid") ?? (String(process.env.GEMINI_SECURE_1PSID ?? "").trim() || null);
  if (fromFlag) {
    return fromFlag;
  }

  const cookieFile = flagValue("--psid-file") ?? (String(process.env.GEMINI_SECURE_1PSID_FILE ?? "").trim() || null);
  const fromFile = cookieFile ? readSecretFromFile(cookieFile) : "";
  if (fromFile) {
    return fromFile;
  }

  throw new Error(
    "GEMINI_SECURE_1PSID is required (env GEMINI_SECURE_1PSID, --psid, or GEMINI_SECURE_1PSID_FILE/--psid-file)",
  );
}

async function main(): Promise<void> {
  const client = new GeminiWebuiClient({
    secure1psid: resolveSessionCookie(),
    secure1psidts: flagValue("--psidts") ?? undefined,
    autoRefresh: false,
  });

  try {
    const session = await client.describeSession();
    console.log(`[ok] session: cookies=${session.cookieNames.join(",")}`);

    const single = await client.generateContent({ prompt: "Reply exactly with SELF_TEST_SINGLE_OK" });
    if (!single.text.includes("SELF_TEST_SINGLE_OK")) {
      throw new Error(`single_mismatch: ${single.text.slice(0, 200)}`);
    }
    console.log("[ok] single turn");

    const chat = client.startChat();
    await chat.send("Remember the word PELICAN. Reply with OK.");
    const recall = await chat.send("Which word did I ask you to remember? Reply with the word only.");
    if (!/pelican/i.test(recall.text)) {
      throw new Error(`chat_recall_mismatch: ${recall.text.slice(0, 200)}`);
    }
    console.log(`[ok] chat: ${chat.toString()}`);

    const gems = await client.fetchGems();
    console.log(`[ok] gems: ${gems.size}`);

    const wantsImage = flags.switches.has("--images") || parseOptionalBoolean(process.env.SELF_TEST_IMAGES) === true;
    if (wantsImage) {
      const image = await client.generateContent({
        prompt: "Generate a flat two-colour icon of a chat bubble with a small sparkle, no text.",
      });
      if (image.images.length === 0) {
        throw new Error(`image_missing: ${image.text.slice(0, 200)}`);
      }
      console.log(`[ok] images: ${image.images.map((entry) => entry.describe()).join("; ")}`);
    }
  } finally {
    await client.dispose();
  }
}

main().catch((error: unknown) => {
  console.error("self-test failed:", error);
  process.exit(1);
});
