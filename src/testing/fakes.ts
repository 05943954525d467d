/**
 * In-process stand-ins for the external providers, used by the test suite.
 */
import { readFileSync } from "node:fs";
import type { EmbeddingProvider } from "../embeddings";
import type { Completion, CompletionOptions, GenerationProvider } from "../generation";
import type { ContractDocument, PageText, TokenUsage } from "../types";

export const CONTRACT_VOCABULARY = [
  "rent",
  "monthly",
  "deposit",
  "security",
  "late",
  "penalty",
  "pets",
  "maintenance",
  "repairs",
  "termination",
  "notice",
  "landlord",
  "tenant",
  "property",
  "term",
];

/**
 * Deterministic bag-of-words embedder: one dimension per vocabulary word,
 * holding that word's count. Text sharing no vocabulary word embeds to the
 * zero vector.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  public readonly modelName: string;
  public calls = 0;
  public embeddedTexts = 0;
  private readonly vocabulary: readonly string[];
  private failures: Error[] = [];

  public constructor(vocabulary: readonly string[] = CONTRACT_VOCABULARY, modelName = "keyword-test") {
    this.vocabulary = vocabulary;
    this.modelName = modelName;
  }

  /** Queue errors thrown by the next calls, in order. */
  public failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  public vectorFor(text: string): Float32Array {
    const v = new Float32Array(this.vocabulary.length);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const i = this.vocabulary.indexOf(token);
      if (i >= 0) v[i] += 1;
    }
    return v;
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.embeddedTexts += texts.length;
    return texts.map((t) => this.vectorFor(t));
  }
}

export const FAKE_USAGE: TokenUsage = { promptTokens: 100, completionTokens: 20, totalTokens: 120 };

/** Generation provider whose replies come from a callback over the prompt. */
export class ScriptedGenerationProvider implements GenerationProvider {
  public readonly modelName = "scripted-test";
  public readonly prompts: string[] = [];
  public readonly options: CompletionOptions[] = [];
  private failures: Error[] = [];
  private readonly respond: (prompt: string) => string;

  public constructor(respond: (prompt: string) => string) {
    this.respond = respond;
  }

  public get calls(): number {
    return this.prompts.length;
  }

  public failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  public async complete(prompt: string, opts: CompletionOptions): Promise<Completion> {
    this.prompts.push(prompt);
    this.options.push(opts);
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { text: this.respond(prompt), tokenUsage: FAKE_USAGE };
  }
}

/** Answers the rent question from the context it is given, like a grounded model would. */
export function tenancyResponder(prompt: string): string {
  const rent = /Monthly Rent: (SGD \$\d{1,3}(?:,\d{3})*)/.exec(prompt);
  if (rent) return `The monthly rent is ${rent[1]}, payable on the 1st day of each month.`;
  return "The contract does not say.";
}

interface FixtureFile {
  title: string;
  pages: PageText[];
}

export function loadTenancyAgreement(
  overrides: Partial<Pick<ContractDocument, "id" | "ownerId">> = {},
): ContractDocument {
  const raw = readFileSync(new URL("../__fixtures__/tenancy-agreement.json", import.meta.url), "utf8");
  const fixture: FixtureFile = JSON.parse(raw);
  return {
    id: overrides.id ?? "lease-2024",
    ownerId: overrides.ownerId ?? "user-1",
    title: fixture.title,
    pages: fixture.pages,
    createdAt: "2024-03-01T00:00:00.000Z",
  };
}
