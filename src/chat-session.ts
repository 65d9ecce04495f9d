import type { GenerateContentInput, GenerateOptions } from "./gemini-webui-client.js";
import type { Gem, Lineage, ModelOutput } from "./types.js";

/** The part of the client a chat session calls into. */
export interface ContentGenerator {
  generateContent(input: GenerateContentInput, options?: GenerateOptions): Promise<ModelOutput>;
}

export type ChatSessionOptions = {
  lineage?: readonly (string | null)[];
  cid?: string;
  rid?: string;
  rcid?: string;
  model?: string;
  gem?: Gem | string;
};

/**
 * One multi-turn conversation. Holds the `[cid, rid, rcid]` lineage the service
 * needs to continue it; the session does not own the client it sends through.
 */
export class ChatSession {
  readonly #client: ContentGenerator;
  #lineage: Lineage = [null, null, null];
  #lastOutput: ModelOutput | null = null;
  model: string | undefined;
  gem: Gem | string | undefined;

  constructor(client: ContentGenerator, options: ChatSessionOptions = {}) {
    this.#client = client;
    this.model = options.model;
    this.gem = options.gem;

    if (options.lineage) {
      this.setLineage(options.lineage);
    }
    if (options.cid) {
      this.cid = options.cid;
    }
    if (options.rid) {
      this.rid = options.rid;
    }
    if (options.rcid) {
      this.rcid = options.rcid;
    }
  }

  get lineage(): Lineage {
    return [...this.#lineage];
  }

  /** Overwrites the leading slots with `values`; slots past its length keep their value. */
  setLineage(values: readonly (string | null)[]): void {
    if (values.length > 3) {
      throw new RangeError(`lineage_too_long: expected at most 3 elements, got ${values.length}`);
    }
    values.forEach((value, index) => {
      this.#lineage[index] = value;
    });
  }

  get cid(): string | null {
    return this.#lineage[0];
  }

  set cid(value: string | null) {
    this.#lineage[0] = value;
  }

  get rid(): string | null {
    return this.#lineage[1];
  }

  set rid(value: string | null) {
    this.#lineage[1] = value;
  }

  get rcid(): string | null {
    return this.#lineage[2];
  }

  set rcid(value: string | null) {
    this.#lineage[2] = value;
  }

  get lastOutput(): ModelOutput | null {
    return this.#lastOutput;
  }

  /**
   * Records a successful turn: keeps `output` as the last output, takes cid/rid
   * from its lineage and rcid from its chosen candidate.
   */
  applyOutput(output: ModelOutput): void {
    this.#lastOutput = output;
    this.setLineage(output.lineage);
    this.rcid = output.rcid;
  }

  async send(prompt: string, files?: readonly string[], options?: GenerateOptions): Promise<ModelOutput> {
    const output = await this.#client.generateContent(
      {
        prompt,
        files,
        model: this.model,
        gem: this.gem,
        lineage: this.lineage,
      },
      options,
    );
    this.applyOutput(output);
    return output;
  }

  /** Continues the conversation from another candidate of the last output. */
  chooseCandidate(index: number): ModelOutput {
    const output = this.#lastOutput;
    if (!output) {
      throw new RangeError("no_previous_output: send a message before choosing a candidate");
    }
    if (index >= output.candidates.length) {
      throw new RangeError(`candidate_index_out_of_range: ${index} (candidates: ${output.candidates.length})`);
    }

    output.choose(index);
    this.rcid = output.rcid;
    return output;
  }

  toString(): string {
    return `ChatSession(cid=${this.cid}, rid=${this.rid}, rcid=${this.rcid})`;
  }
}
