/** Builders for generation / gem responses in the service's positional layout. */

export type WebImageFixture = { url: string; title: string; alt: string };
export type GeneratedImageFixture = { url: string; number: number; alts: string[] };

export type CandidateFixture = {
  rcid: string;
  text: string;
  altText?: string;
  thoughts?: string;
  webImages?: WebImageFixture[];
  /** Truthy marker only: announces images delivered by a later part. */
  announcesImages?: boolean;
  generatedImages?: GeneratedImageFixture[];
};

function slots(length: number): unknown[] {
  return new Array<unknown>(length).fill(null);
}

function webImageEntry(image: WebImageFixture): unknown[] {
  const entry = slots(8);
  entry[0] = [[image.url], null, null, null, image.alt];
  entry[7] = [image.title];
  return entry;
}

function generatedImageEntry(image: GeneratedImageFixture): unknown[] {
  const entry = slots(4);
  entry[0] = [null, null, null, [null, null, null, image.url]];
  entry[3] = [null, null, null, null, null, image.alts, image.number];
  return entry;
}

export function candidateEntry(fixture: CandidateFixture): unknown[] {
  const entry = slots(38);
  entry[0] = fixture.rcid;
  entry[1] = [fixture.text];
  if (fixture.altText !== undefined) {
    entry[22] = [fixture.altText];
  }
  if (fixture.thoughts !== undefined) {
    entry[37] = [[fixture.thoughts]];
  }

  const container = slots(8);
  let hasContainer = false;
  if (fixture.webImages && fixture.webImages.length > 0) {
    container[1] = fixture.webImages.map(webImageEntry);
    hasContainer = true;
  }
  if (fixture.generatedImages && fixture.generatedImages.length > 0) {
    container[7] = [fixture.generatedImages.map(generatedImageEntry)];
    hasContainer = true;
  } else if (fixture.announcesImages) {
    container[7] = [[["pending"]]];
    hasContainer = true;
  }
  if (hasContainer) {
    entry[12] = container;
  }

  return entry;
}

export function bodyPayload(lineage: Array<string | null>, candidates: CandidateFixture[]): unknown[] {
  return [null, lineage, null, null, candidates.map(candidateEntry)];
}

export function part(payload: unknown): unknown[] {
  return ["wrb.fr", null, payload === null ? null : JSON.stringify(payload)];
}

/** Two framing lines, then the parts array on line 2. */
export function responseText(parts: unknown[]): string {
  return `)]}'\n\n${JSON.stringify(parts)}\n`;
}

export function generateResponse(lineage: Array<string | null>, candidates: CandidateFixture[]): string {
  return responseText([part(bodyPayload(lineage, candidates))]);
}

export function rejectionResponse(code: number): string {
  return responseText([["wrb.fr", null, null, null, null, [null, null, [[null, [code]]]]]]);
}

export type GemFixture = { id: string; name: string; description: string; prompt?: string };

function gemEntry(gem: GemFixture): unknown[] {
  return [gem.id, [gem.name, gem.description], gem.prompt === undefined ? null : [gem.prompt]];
}

export function gemsResponse(system: GemFixture[], custom: GemFixture[]): string {
  return responseText([
    ["wrb.fr", "CNgdBe", JSON.stringify([null, null, custom.map(gemEntry)]), null, null, null, "custom"],
    ["wrb.fr", "CNgdBe", JSON.stringify([null, null, system.map(gemEntry)]), null, null, null, "system"],
  ]);
}

export const TOKEN_PAGE = '<script>WIZ_global_data = {"SNlM0e":"test-access-token","other":"x"};</script>';
