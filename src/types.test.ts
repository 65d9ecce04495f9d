import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { APIError } from "./errors.js";
import { Candidate, GemJar, GeneratedImage, ModelOutput, WebImage } from "./types.js";

describe("ModelOutput", () => {
  const output = new ModelOutput(
    ["c_1", "r_1"],
    [
      new Candidate("rc_1", "first", "thinking", [new WebImage("https://example.com/a.jpg", "A", "alt a")], []),
      new Candidate("rc_2", "second", null, [], []),
    ],
  );

  it("reads through the chosen candidate", () => {
    expect(output.text).toBe("first");
    expect(output.thoughts).toBe("thinking");
    expect(output.rcid).toBe("rc_1");
    expect(output.images).toHaveLength(1);
    expect(String(output)).toBe("first");
  });

  it("switches candidates and validates the index", () => {
    const switched = new ModelOutput(output.lineage, output.candidates);
    switched.choose(1);

    expect(switched.text).toBe("second");
    expect(switched.rcid).toBe("rc_2");
    expect(() => switched.choose(2)).toThrow(RangeError);
    expect(() => switched.choose(-1)).toThrow(RangeError);
    expect(switched.chosenIndex).toBe(1);
  });
});

describe("GemJar", () => {
  const jar = new GemJar([
    { id: "coding-partner", name: "Coding partner", description: null, prompt: null, predefined: true },
    { id: "c-1", name: "Editor", description: "Edits", prompt: "Be terse.", predefined: false },
    { id: "c-2", name: "Editor", description: null, prompt: null, predefined: false },
  ]);

  it("looks gems up by id or name", () => {
    expect(jar.get({ id: "c-2" })?.name).toBe("Editor");
    expect(jar.get({ name: "Editor" })?.id).toBe("c-1");
    expect(jar.get({ id: "c-2", name: "Coding partner" })).toBeUndefined();
    expect(jar.get({})).toBeUndefined();
  });

  it("filters into a new jar", () => {
    const custom = jar.filter({ predefined: false });

    expect(custom.size).toBe(2);
    expect(Array.from(custom, (gem) => gem.id)).toEqual(["c-1", "c-2"]);
    expect(jar.filter({ name: "Coding partner" }).size).toBe(1);
    expect(jar.size).toBe(3);
  });
});

describe("images", () => {
  const directories: string[] = [];

  afterEach(async () => {
    for (const directory of directories.splice(0)) {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("describes itself", () => {
    const image = new WebImage("https://example.com/a.jpg", "A", "alt a");

    expect(image.describe()).toBe("A(https://example.com/a.jpg) - alt a");
  });

  it("fetches web images without credentials", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([1, 2, 3])));
    const image = new WebImage("https://example.com/a.jpg", "A", "alt a", { fetchImpl });

    await expect(image.fetchBytes()).resolves.toEqual(new Uint8Array([1, 2, 3]));
    expect(fetchImpl).toHaveBeenCalledWith("https://example.com/a.jpg", expect.objectContaining({ headers: {} }));
  });

  it("fetches generated images at full size with the account cookies", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([9])));
    const image = new GeneratedImage(
      "https://lh3.googleusercontent.com/gen-a",
      "[Generated Image 1]",
      "",
      { "__Secure-1PSID": "test-psid", "__Secure-1PSIDTS": "ts-1" },
      { fetchImpl },
    );

    await image.fetchBytes();
    await image.fetchBytes(false);

    expect(fetchImpl).toHaveBeenNthCalledWith(
      1,
      "https://lh3.googleusercontent.com/gen-a=s2048",
      expect.objectContaining({ headers: { Cookie: "__Secure-1PSID=test-psid; __Secure-1PSIDTS=ts-1" } }),
    );
    expect(fetchImpl).toHaveBeenNthCalledWith(2, "https://lh3.googleusercontent.com/gen-a", expect.anything());
  });

  it("reports a failed download", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("nope", { status: 403 }));
    const image = new WebImage("https://example.com/a.jpg", "A", "", { fetchImpl });

    await expect(image.fetchBytes()).rejects.toThrow(new APIError("image_fetch_failed_403: https://example.com/a.jpg"));
  });

  it("saves under a name taken from the url", async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), "gemini-images-"));
    directories.push(directory);
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([7, 8])));
    const image = new GeneratedImage("https://lh3.googleusercontent.com/gen-a", "", "", {}, { fetchImpl });

    const saved = await image.save(path.join(directory, "nested"));

    expect(saved).toBe(path.join(directory, "nested", "gen-a.png"));
    expect(new Uint8Array(await readFile(saved))).toEqual(new Uint8Array([7, 8]));
  });

  it("saves under an explicit name", async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), "gemini-images-"));
    directories.push(directory);
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([1])));
    const image = new WebImage("https://example.com/a.jpg", "A", "", { fetchImpl });

    await expect(image.save(directory, "cover.jpg")).resolves.toBe(path.join(directory, "cover.jpg"));
  });
});
