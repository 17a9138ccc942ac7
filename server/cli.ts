import { parseArgs } from "node:util";
import { z } from "zod";
import { reviewActionEnum } from "@shared/schema";
import { runCategorization } from "./categorization";
import { OpenAIClassifier, type TransactionClassifier } from "./classifier";
import { loadConfig, type AppConfig } from "./config";
import { closeDb, getDb } from "./db";
import { ConfigError, ErrorCodes, LedgerError, handleError, logError } from "./errors";
import { runImport } from "./ingestion/ingest";
import type { ImportRunSummary } from "./ingestion/types";
import { getReviewQueue, reviewDuplicateGroup } from "./review";
import { addVendorRule, listVendorRules } from "./rules";
import { seedDefaultCategories } from "./seed";
import { checkConnection, getSpendingSummary } from "./stats";
import { DatabaseStorage, type RecordStore } from "./storage";

export const USAGE = `Usage: ledgerline <command> [options]

Commands:
  import [--input <dir>] [--recursive] [--since YYYY-MM-DD] [--dry-run]
         [--source-from filename|<column>] [--encoding utf8|latin1]
         [--date-format <pattern>] [--expense-positive]
  categorize [--batch N] [--limit N]
  dups
  review <groupId> --action keep|merge|delete|ignore [--keep <id>] [--by <name>] [--notes <text>]
  rules list
  rules add --pattern P --category C [--regex] [--priority N]
  stats
  check
  seed`;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must be YYYY-MM-DD");
const positiveInt = z.coerce.number().int().positive();

const importSchema = z.object({
  name: z.literal("import"),
  inputDir: z.string().min(1).optional(),
  recursive: z.boolean().default(false),
  since: isoDate.optional(),
  dryRun: z.boolean().default(false),
  sourceFrom: z.string().min(1).optional(),
  encoding: z.enum(["utf8", "utf-8", "latin1", "ascii", "utf16le"]).optional(),
  dateFormat: z.string().min(1).optional(),
  expensePositive: z.boolean().default(false),
});

const categorizeSchema = z.object({
  name: z.literal("categorize"),
  batchSize: positiveInt.optional(),
  limit: positiveInt.optional(),
});

const reviewSchema = z.object({
  name: z.literal("review"),
  groupId: z.string().min(1, "review needs a group id"),
  action: z.enum(reviewActionEnum.enumValues),
  keep: z.string().min(1).optional(),
  by: z.string().min(1).optional(),
  notes: z.string().optional(),
});

const rulesAddSchema = z.object({
  name: z.literal("rules-add"),
  pattern: z.string().min(1, "--pattern is required"),
  category: z.string().min(1, "--category is required"),
  regex: z.boolean().default(false),
  priority: z.coerce.number().int().optional(),
});

const commandSchema = z.discriminatedUnion("name", [
  importSchema,
  categorizeSchema,
  z.object({ name: z.literal("dups") }),
  reviewSchema,
  z.object({ name: z.literal("rules-list") }),
  rulesAddSchema,
  z.object({ name: z.literal("stats") }),
  z.object({ name: z.literal("check") }),
  z.object({ name: z.literal("seed") }),
  z.object({ name: z.literal("help") }),
]);

export type Command = z.infer<typeof commandSchema>;

const ARG_OPTIONS = {
  input: { type: "string", short: "i" },
  recursive: { type: "boolean", short: "r" },
  since: { type: "string" },
  "dry-run": { type: "boolean" },
  "source-from": { type: "string" },
  encoding: { type: "string" },
  "date-format": { type: "string" },
  "expense-positive": { type: "boolean" },
  batch: { type: "string" },
  limit: { type: "string" },
  action: { type: "string" },
  keep: { type: "string" },
  by: { type: "string" },
  notes: { type: "string" },
  pattern: { type: "string" },
  category: { type: "string" },
  regex: { type: "boolean" },
  priority: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function readArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: ARG_OPTIONS });
}

export function parseCommand(argv: string[]): Command {
  let parsedArgs: ReturnType<typeof readArgs>;
  try {
    parsedArgs = readArgs(argv);
  } catch (error) {
    throw new LedgerError(handleError(error).message, ErrorCodes.VALIDATION_ERROR);
  }

  const { values, positionals } = parsedArgs;
  const [name, ...rest] = positionals;

  let candidate: Record<string, unknown>;
  if (values.help || !name || name === "help") {
    candidate = { name: "help" };
  } else if (name === "import") {
    candidate = {
      name,
      inputDir: values.input ?? rest[0],
      recursive: values.recursive,
      since: values.since,
      dryRun: values["dry-run"],
      sourceFrom: values["source-from"],
      encoding: values.encoding,
      dateFormat: values["date-format"],
      expensePositive: values["expense-positive"],
    };
  } else if (name === "categorize") {
    candidate = { name, batchSize: values.batch, limit: values.limit };
  } else if (name === "review") {
    candidate = {
      name,
      groupId: rest[0] ?? "",
      action: values.action,
      keep: values.keep,
      by: values.by,
      notes: values.notes,
    };
  } else if (name === "rules" && rest[0] === "add") {
    candidate = {
      name: "rules-add",
      pattern: values.pattern ?? "",
      category: values.category ?? "",
      regex: values.regex,
      priority: values.priority,
    };
  } else if (name === "rules" && (rest[0] === undefined || rest[0] === "list")) {
    candidate = { name: "rules-list" };
  } else {
    candidate = { name };
  }

  const parsed = commandSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new LedgerError(`Invalid arguments: ${issues.join("; ")}`, ErrorCodes.VALIDATION_ERROR, { argv });
  }
  return parsed.data;
}

export interface CliDeps {
  store?: RecordStore;
  classifier?: TransactionClassifier;
  env?: NodeJS.ProcessEnv;
  today?: Date;
}

function printImportSummary(summary: ImportRunSummary): void {
  console.log(`${summary.dryRun ? "[dry run] " : ""}Import ${summary.status}`);
  console.log(`  files:      ${summary.filesProcessed} (${summary.filesFailed} failed)`);
  console.log(`  processed:  ${summary.processed}`);
  console.log(`  inserted:   ${summary.inserted}`);
  console.log(`  updated:    ${summary.updated}`);
  console.log(`  skipped:    ${summary.skipped}`);
  console.log(`  errored:    ${summary.errored}`);
  console.log(`  to review:  ${summary.reviewCandidates}`);
  console.log(`  for AI:     ${summary.uncategorized}`);
  for (const file of summary.files) {
    if (file.error) console.log(`  ${file.file}: ${file.error.message}`);
    for (const rowError of file.rowErrors) {
      console.log(`  ${file.file}:${rowError.rowNumber} ${rowError.code}`);
    }
  }
}

function createClassifier(config: AppConfig, categories: string[]): TransactionClassifier {
  if (!config.openai.apiKey) {
    throw new ConfigError("OPENAI_API_KEY must be set to run categorize");
  }
  return new OpenAIClassifier({
    categories,
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    model: config.openai.model,
  });
}

async function execute(command: Command, store: RecordStore, config: AppConfig, deps: CliDeps): Promise<number> {
  switch (command.name) {
    case "help":
      console.log(USAGE);
      return 0;

    case "import": {
      const summary = await runImport(store, {
        inputDir: command.inputDir ?? config.csvInputPath,
        recursive: command.recursive,
        since: command.since,
        dryRun: command.dryRun,
        sourceFrom: command.sourceFrom,
        encoding: command.encoding,
        profile: {
          dateFormat: command.dateFormat,
          signConvention: command.expensePositive ? "expense_positive" : "expense_negative",
        },
      });
      printImportSummary(summary);
      return summary.status === "completed" && summary.errored === 0 ? 0 : 1;
    }

    case "categorize": {
      const classifier =
        deps.classifier ?? createClassifier(config, (await store.getCategories()).map((category) => category.name));
      const summary = await runCategorization(store, classifier, {
        batchSize: command.batchSize ?? config.aiBatchSize,
        limit: command.limit,
        concurrency: config.aiConcurrency,
      });
      console.log(
        `Categorization ${summary.status}: ${summary.ruleCategorized} by rule, ${summary.aiCategorized} by AI, ` +
          `${summary.uncategorized} left uncategorized`
      );
      return summary.status === "completed" ? 0 : 1;
    }

    case "dups": {
      const queue = await getReviewQueue(store);
      if (queue.length === 0) {
        console.log("No duplicate groups pending review");
        return 0;
      }
      for (const group of queue) {
        console.log(`${group.groupId} (${group.members.length} members)`);
        for (const { review, transaction } of group.members) {
          console.log(
            transaction
              ? `  ${transaction.id}  ${transaction.date}  ${transaction.amount}  ${transaction.description}  [${transaction.source ?? ""}]`
              : `  ${review.id}  (transaction deleted)`
          );
        }
      }
      return 0;
    }

    case "review": {
      const outcome = await reviewDuplicateGroup(store, {
        groupId: command.groupId,
        action: command.action,
        keepTransactionId: command.keep,
        reviewedBy: command.by,
        notes: command.notes,
      });
      console.log(`${outcome.groupId}: ${outcome.action}, ${outcome.reviewed} reviewed, ${outcome.deleted} deleted`);
      return 0;
    }

    case "rules-list": {
      const rules = await listVendorRules(store);
      for (const rule of rules) {
        console.log(`${rule.priority}\t${rule.isRegex ? "regex" : "text"}\t${rule.pattern} -> ${rule.category}`);
      }
      if (rules.length === 0) console.log("No vendor rules");
      return 0;
    }

    case "rules-add": {
      const rule = await addVendorRule(store, {
        pattern: command.pattern,
        category: command.category,
        isRegex: command.regex,
        priority: command.priority,
      });
      console.log(`Added rule ${rule.id}`);
      return 0;
    }

    case "stats": {
      const stats = await getSpendingSummary(store, deps.today);
      console.log(`Transactions: ${stats.total} (${stats.categorized} categorized, ${stats.uncategorized} uncategorized)`);
      console.log(`Duplicate groups pending review: ${stats.pendingDuplicateGroups}`);
      console.log(`Spending ${stats.from} to ${stats.to}:`);
      for (const row of stats.categoryTotals) {
        console.log(`  ${row.category ?? "Uncategorized"}: ${row.total.toFixed(2)} (${row.count})`);
      }
      if (stats.categoryTotals.length === 0) console.log("  no transactions");
      return 0;
    }

    case "check": {
      const report = await checkConnection(store, config);
      console.log("Database: connected");
      console.log(`OpenAI API key: ${report.apiKeyConfigured ? "configured" : "missing"} (model ${report.model})`);
      console.log(`Transactions: ${report.total} (${report.uncategorized} uncategorized)`);
      return 0;
    }

    case "seed":
      await seedDefaultCategories(store);
      return 0;
  }
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    console.error(handleError(error).message);
    console.error(USAGE);
    return 1;
  }

  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(deps.env);
    const store = deps.store ?? new DatabaseStorage(getDb(config.databaseUrl));
    return await execute(command, store, config, deps);
  } catch (error) {
    logError(error, "cli");
    console.error(handleError(error).message);
    return 1;
  } finally {
    if (!deps.store) await closeDb();
  }
}
