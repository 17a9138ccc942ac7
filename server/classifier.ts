import OpenAI from "openai";
import pRetry, { AbortError } from "p-retry";
import { z } from "zod";
import { ClassifierError, ErrorCodes, errorMessage } from "./errors";
import { warn } from "./logger";

/**
 * The only transaction fields that ever leave the process. Account numbers,
 * balances, references, provider ids and hashes stay local.
 */
export interface ClassifierInput {
  date: string;
  description: string;
  amount: number;
}

export interface ClassifierResult {
  category: string | null;
  vendor?: string;
}

export interface TransactionClassifier {
  /** One result per input, in the same order. Unknown categories come back as null. */
  categorize(batch: ClassifierInput[]): Promise<ClassifierResult[]>;
}

export function toClassifierInput(txn: { date: string; description: string; amount: number | string }): ClassifierInput {
  return {
    date: txn.date,
    description: txn.description,
    amount: Number(txn.amount),
  };
}

export interface ChatRequest {
  systemPrompt: string;
  prompt: string;
}

export type CompletionFn = (request: ChatRequest) => Promise<string>;

export interface RetryOptions {
  retries: number;
  minTimeout: number;
  maxTimeout: number;
}

export interface OpenAIClassifierOptions {
  categories: string[];
  apiKey?: string;
  baseURL?: string;
  model?: string;
  retry?: Partial<RetryOptions>;
  complete?: CompletionFn;
}

const DEFAULT_RETRY: RetryOptions = {
  retries: 5,
  minTimeout: 2000,
  maxTimeout: 60000,
};

const SYSTEM_PROMPT =
  "You categorize personal bank and credit card transactions for bookkeeping. " +
  "Always respond with a single JSON object and nothing else.";

const responseSchema = z.object({
  rows: z.array(
    z.object({
      index: z.number().int(),
      category: z.string().nullable(),
      vendor: z.string().nullable().optional(),
    })
  ),
});

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.status === 429) return true;
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes("429") ||
    message.includes("ratelimit_exceeded") ||
    message.includes("quota") ||
    message.includes("rate limit")
  );
}

export function buildPrompt(batch: ClassifierInput[], categories: string[]): string {
  const rows = batch.map((input, index) => JSON.stringify({ index, ...input })).join("\n");

  return `Assign each transaction below to exactly one of these categories:
${categories.join(", ")}

Amounts are negative for money spent and positive for money received.
If none of the categories fit, use null for the category.
Also give a short, clean merchant name as "vendor" when one is apparent.

Return JSON with this structure:
{
  "rows": [
    { "index": number, "category": string | null, "vendor": string | null }
  ]
}

Transactions (one JSON object per line):
${rows}`;
}

/** Maps a raw model reply back onto the batch, by position. */
export function parseClassifierResponse(
  content: string,
  batchSize: number,
  categories: string[]
): ClassifierResult[] {
  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new ClassifierError(`Classifier returned invalid JSON: ${errorMessage(error)}`);
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ClassifierError("Classifier response did not match the expected shape", ErrorCodes.CLASSIFIER_FAILED, {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  const byName = new Map(categories.map((name) => [name.toLowerCase(), name]));
  const results: ClassifierResult[] = Array.from({ length: batchSize }, () => ({ category: null }));

  for (const row of parsed.data.rows) {
    if (row.index < 0 || row.index >= batchSize) continue;
    const category = row.category ? byName.get(row.category.trim().toLowerCase()) ?? null : null;
    if (row.category && !category) {
      warn(`Discarding unknown category "${row.category}" for row ${row.index}`, "classifier");
    }
    const vendor = row.vendor?.trim();
    results[row.index] = vendor ? { category, vendor: vendor.slice(0, 100) } : { category };
  }

  return results;
}

export class OpenAIClassifier implements TransactionClassifier {
  private readonly complete: CompletionFn;
  private readonly retry: RetryOptions;

  constructor(private readonly options: OpenAIClassifierOptions) {
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.complete = options.complete ?? this.createCompletion();
  }

  private createCompletion(): CompletionFn {
    const client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseURL });
    const model = this.options.model ?? "gpt-4o-mini";

    return async ({ systemPrompt, prompt }) => {
      const completion = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: prompt },
        ],
        temperature: 0,
        response_format: { type: "json_object" },
      });
      return completion.choices[0]?.message?.content || "";
    };
  }

  async categorize(batch: ClassifierInput[]): Promise<ClassifierResult[]> {
    if (batch.length === 0) return [];

    const request: ChatRequest = {
      systemPrompt: SYSTEM_PROMPT,
      prompt: buildPrompt(batch, this.options.categories),
    };

    let content: string;
    try {
      content = await pRetry(
        async () => {
          try {
            return await this.complete(request);
          } catch (error) {
            if (isRateLimitError(error)) {
              throw error;
            }
            throw new AbortError(errorMessage(error));
          }
        },
        {
          retries: this.retry.retries,
          minTimeout: this.retry.minTimeout,
          maxTimeout: this.retry.maxTimeout,
          factor: 2,
          onFailedAttempt: (error) => {
            warn(`Rate limited, attempt ${error.attemptNumber} (${error.retriesLeft} retries left)`, "classifier");
          },
        }
      );
    } catch (error) {
      const code = isRateLimitError(error) ? ErrorCodes.CLASSIFIER_RATE_LIMITED : ErrorCodes.CLASSIFIER_FAILED;
      throw new ClassifierError(`Classifier request failed: ${errorMessage(error)}`, code, {
        batchSize: batch.length,
      });
    }

    return parseClassifierResponse(content, batch.length, this.options.categories);
  }
}
