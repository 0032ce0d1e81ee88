import { Command, InvalidArgumentError } from "commander";
import { writeFile } from "fs/promises";
import { getProvider } from "./adapters";
import type { ConversationProvider, StreamOptions } from "./adapters/provider";
import { getAllConfigPaths, loadConfig, type ChatdigConfig } from "./core/config";
import { ChatdigError, ValidationError, formatError } from "./core/errors";
import type { Conversation } from "./core/models";
import { calculateConversationStatistics, calculateStatistics } from "./core/statistics";
import { renderConversationMarkdown } from "./export/markdown";
import { parseSearchQuery, type SearchResult } from "./search/query";
import {
  formatDate,
  formatDuration,
  formatLargeNumber,
  formatScore,
  getTitleWidth,
  singleLine,
  truncateWithEllipsis,
} from "./utils/format";
import { logger } from "./utils/logger";

// ============================================
// Option parsing
// ============================================

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

interface ProviderOptions {
  provider?: string;
  json?: boolean;
}

interface ListOptions extends ProviderOptions {
  limit?: number;
}

interface SearchOptions extends ProviderOptions {
  keywords?: string[];
  phrase?: string[];
  matchMode?: string;
  exclude?: string[];
  role?: string;
  title?: string;
  from?: string;
  to?: string;
  minMessages?: number;
  maxMessages?: number;
  sort?: string;
  order?: string;
  limit?: number;
}

interface StatsOptions extends ProviderOptions {
  conversation?: string;
}

interface MessageOptions extends ProviderOptions {
  conversation?: string;
}

interface ExportOptions extends ProviderOptions {
  output?: string;
  includeSystem?: boolean;
  title?: string;
}

/**
 * Run a command body, turning library errors into a message and exit code
 * (2 for invalid input, 1 for everything else).
 */
async function run(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (!(error instanceof ChatdigError)) throw error;
    logger.error(`Error: ${formatError(error)}`);
    process.exitCode = error instanceof ValidationError ? 2 : 1;
  }
}

async function resolveProvider(
  file: string,
  options: ProviderOptions,
  config: ChatdigConfig
): Promise<ConversationProvider> {
  return getProvider(options.provider ?? config.defaultProvider, file);
}

function streamOptions(config: ChatdigConfig): StreamOptions {
  return {
    progressInterval: config.progressInterval,
    onProgress: (count) => logger.debug(`Processed ${count} conversations`),
  };
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ============================================
// Table output
// ============================================

function printConversationRow(conversation: Conversation, titleWidth: number, score?: number): void {
  const id = conversation.id.slice(0, 8).padEnd(10);
  const title = truncateWithEllipsis(singleLine(conversation.title), titleWidth - 1).padEnd(titleWidth);
  const created = formatDate(conversation.createdAt).padEnd(18);
  const msgs = String(conversation.messages.length).padEnd(6);
  const scoreCol = score === undefined ? "" : formatScore(score);
  console.log(`${id}${title}${created}${msgs}${scoreCol}`);
}

function printTableHeader(titleWidth: number, withScore: boolean): void {
  console.log("");
  console.log("ID".padEnd(10) + "TITLE".padEnd(titleWidth) + "CREATED".padEnd(18) + "MSGS".padEnd(6) + (withScore ? "SCORE" : ""));
  console.log("─".repeat(10 + titleWidth + 18 + 6 + (withScore ? 7 : 0)));
}

function printSearchResults(results: SearchResult[]): void {
  if (results.length === 0) {
    console.log("No matching conversations.");
    return;
  }
  const titleWidth = getTitleWidth();
  printTableHeader(titleWidth, true);
  for (const result of results) {
    printConversationRow(result.conversation, titleWidth, result.score);
    if (result.snippet) {
      console.log(`          ${singleLine(result.snippet)}`);
    }
  }
  console.log("");
}

function printConversation(conversation: Conversation): void {
  console.log(`\n${conversation.title}`);
  console.log(`ID:       ${conversation.id}`);
  console.log(`Created:  ${formatDate(conversation.createdAt)}`);
  console.log(`Updated:  ${formatDate(conversation.updatedAt)}`);
  console.log(`Messages: ${conversation.messages.length}`);
  console.log("─".repeat(60));
  for (const message of conversation.messages) {
    console.log(`[${message.role}] ${formatDate(message.timestamp)}`);
    console.log(message.content);
    console.log("");
  }
}

// ============================================
// Commands
// ============================================

const program = new Command();

program
  .name("chatdig")
  .description("Stream and search exported ChatGPT and Claude conversation archives")
  .version("0.1.0");

program
  .command("list <file>")
  .description("List conversations in file order")
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .option("-l, --limit <n>", "Maximum conversations to list", parsePositiveInt)
  .option("-j, --json", "Output as JSON")
  .action((file: string, options: ListOptions) =>
    run(async () => {
      const config = loadConfig();
      const provider = await resolveProvider(file, options, config);
      const conversations: Conversation[] = [];

      for await (const conversation of provider.streamConversations(file, streamOptions(config))) {
        conversations.push(conversation);
        if (options.limit !== undefined && conversations.length >= options.limit) break;
      }

      if (options.json) {
        printJson(conversations.map(({ messages, ...rest }) => ({ ...rest, messageCount: messages.length })));
        return;
      }
      if (conversations.length === 0) {
        console.log("No conversations found.");
        return;
      }

      const titleWidth = getTitleWidth();
      printTableHeader(titleWidth, false);
      for (const conversation of conversations) {
        printConversationRow(conversation, titleWidth);
      }
      console.log("");
    })
  );

program
  .command("search <file>")
  .description("Search conversations with BM25 ranking")
  .option("-k, --keywords <words...>", "Keywords (OR by default)")
  .option("--phrase <phrases...>", "Exact phrases (OR)")
  .option("-m, --match-mode <mode>", "any or all keywords", "any")
  .option("-e, --exclude <words...>", "Drop conversations containing these keywords")
  .option("-r, --role <role>", "Only search user, assistant or system messages")
  .option("-t, --title <text>", "Title contains (case-insensitive)")
  .option("--from <date>", "Created on or after YYYY-MM-DD")
  .option("--to <date>", "Created on or before YYYY-MM-DD")
  .option("--min-messages <n>", "At least n messages", parsePositiveInt)
  .option("--max-messages <n>", "At most n messages", parsePositiveInt)
  .option("-s, --sort <field>", "score, date, title or messages", "score")
  .option("-o, --order <order>", "asc or desc", "desc")
  .option("-l, --limit <n>", "Maximum results", parsePositiveInt)
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .option("-j, --json", "Output as JSON")
  .action((file: string, options: SearchOptions) =>
    run(async () => {
      const config = loadConfig();
      // zod validates the enum-valued options
      const query = parseSearchQuery({
        keywords: options.keywords,
        phrases: options.phrase,
        matchMode: options.matchMode,
        excludeKeywords: options.exclude,
        roleFilter: options.role,
        titleFilter: options.title,
        fromDate: options.from,
        toDate: options.to,
        minMessages: options.minMessages,
        maxMessages: options.maxMessages,
        sortBy: options.sort,
        sortOrder: options.order,
        limit: options.limit ?? config.defaultLimit,
      });
      const provider = await resolveProvider(file, options, config);

      const results: SearchResult[] = [];
      for await (const result of provider.search(file, query, streamOptions(config))) {
        results.push(result);
      }

      if (options.json) {
        printJson(results);
        return;
      }
      printSearchResults(results);
    })
  );

const get = program.command("get").description("Look up a conversation or message");

get
  .command("conversation <file> <id>")
  .description("Show a conversation by id or 4+ character prefix")
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .option("-j, --json", "Output as JSON")
  .action((file: string, id: string, options: ProviderOptions) =>
    run(async () => {
      const provider = await resolveProvider(file, options, loadConfig());
      const conversation = await provider.getConversationById(file, id);
      if (!conversation) {
        logger.error(`Conversation not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      if (options.json) {
        printJson(conversation);
        return;
      }
      printConversation(conversation);
    })
  );

get
  .command("message <file> <id>")
  .description("Show a message and the conversation it belongs to")
  .option("-c, --conversation <id>", "Conversation id hint (faster)")
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .option("-j, --json", "Output as JSON")
  .action((file: string, id: string, options: MessageOptions) =>
    run(async () => {
      const provider = await resolveProvider(file, options, loadConfig());
      const match = await provider.getMessageById(file, id, { conversationId: options.conversation });
      if (!match) {
        logger.error(`Message not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      if (options.json) {
        printJson({ message: match.message, conversationId: match.conversation.id, conversationTitle: match.conversation.title });
        return;
      }
      console.log(`\n${match.conversation.title} (${match.conversation.id})`);
      console.log(`[${match.message.role}] ${formatDate(match.message.timestamp)}`);
      console.log(match.message.content);
      console.log("");
    })
  );

program
  .command("stats <file>")
  .description("Show export or conversation statistics")
  .option("-c, --conversation <id>", "Statistics for one conversation")
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .option("-j, --json", "Output as JSON")
  .action((file: string, options: StatsOptions) =>
    run(async () => {
      const config = loadConfig();
      const provider = await resolveProvider(file, options, config);

      if (options.conversation) {
        const conversation = await provider.getConversationById(file, options.conversation);
        if (!conversation) {
          logger.error(`Conversation not found: ${options.conversation}`);
          process.exitCode = 1;
          return;
        }
        const stats = calculateConversationStatistics(conversation);
        if (options.json) {
          printJson(stats);
          return;
        }
        console.log("\n┌─ Conversation Statistics ───────────────────┐");
        console.log(`│ Messages:        ${String(stats.messageCount).padEnd(27)}│`);
        console.log(`│   user:          ${String(stats.messageCountByRole.user).padEnd(27)}│`);
        console.log(`│   assistant:     ${String(stats.messageCountByRole.assistant).padEnd(27)}│`);
        console.log(`│   system:        ${String(stats.messageCountByRole.system).padEnd(27)}│`);
        console.log(`│ Duration:        ${formatDuration(stats.durationSeconds).padEnd(27)}│`);
        const gap = stats.averageGapSeconds === null ? "—" : formatDuration(stats.averageGapSeconds);
        console.log(`│ Average gap:     ${gap.padEnd(27)}│`);
        console.log("└──────────────────────────────────────────────┘\n");
        return;
      }

      const stats = await calculateStatistics(file, provider, streamOptions(config));
      if (options.json) {
        printJson(stats);
        return;
      }
      console.log("\n┌─ Export Statistics ─────────────────────────┐");
      console.log(`│ Conversations:   ${formatLargeNumber(stats.totalConversations).padEnd(27)}│`);
      console.log(`│ Messages:        ${formatLargeNumber(stats.totalMessages).padEnd(27)}│`);
      console.log(`│ Avg messages:    ${stats.averageMessages.toFixed(1).padEnd(27)}│`);
      console.log(`│ Earliest:        ${formatDate(stats.earliestDate).padEnd(27)}│`);
      console.log(`│ Latest:          ${formatDate(stats.latestDate).padEnd(27)}│`);
      console.log(`│ Skipped:         ${String(stats.skippedCount).padEnd(27)}│`);
      console.log("└──────────────────────────────────────────────┘\n");
    })
  );

/** Single conversation whose title contains `text`, case-insensitively. */
async function findByTitle(
  provider: ConversationProvider,
  file: string,
  text: string,
  config: ChatdigConfig
): Promise<Conversation | undefined> {
  const needle = text.toLowerCase();
  const matches: Conversation[] = [];
  for await (const conversation of provider.streamConversations(file, streamOptions(config))) {
    if (conversation.title.toLowerCase().includes(needle)) matches.push(conversation);
  }
  if (matches.length > 1) {
    const ids = matches.map((c) => c.id).join(", ");
    throw new ValidationError(`Title "${text}" matches ${matches.length} conversations: ${ids}`);
  }
  return matches[0];
}

program
  .command("export <file> [id]")
  .description("Export a conversation as markdown")
  .option("-t, --title <text>", "Select the conversation by title instead of id")
  .option("-o, --output <path>", "Write to a file instead of stdout")
  .option("--include-system", "Include system messages")
  .option("-p, --provider <name>", "Export format: openai or claude (detected by default)")
  .action((file: string, id: string | undefined, options: ExportOptions) =>
    run(async () => {
      if ((id === undefined) === (options.title === undefined)) {
        throw new ValidationError("Pass either a conversation id or --title, not both");
      }
      const config = loadConfig();
      const provider = await resolveProvider(file, options, config);
      const conversation =
        id !== undefined
          ? await provider.getConversationById(file, id)
          : await findByTitle(provider, file, options.title ?? "", config);
      if (!conversation) {
        logger.error(`Conversation not found: ${id ?? options.title}`);
        process.exitCode = 1;
        return;
      }
      const markdown = renderConversationMarkdown(conversation, { includeSystem: options.includeSystem });
      if (options.output) {
        await writeFile(options.output, markdown, "utf-8");
        logger.success(`Exported "${conversation.title}" to ${options.output}`);
        return;
      }
      process.stdout.write(markdown);
    })
  );

program
  .command("config")
  .description("Show configuration paths and effective settings")
  .action(() =>
    run(async () => {
      const paths = getAllConfigPaths();
      const config = loadConfig();
      console.log("\n┌─ chatdig ───────────────────────────────────┐");
      console.log(`│ Home:          ${paths.chatdigDir.padEnd(29)}│`);
      console.log(`│ Config file:   ${paths.configFile.padEnd(29)}│`);
      console.log(`│ Provider:      ${(config.defaultProvider ?? "auto").padEnd(29)}│`);
      console.log(`│ Limit:         ${String(config.defaultLimit).padEnd(29)}│`);
      console.log(`│ Progress:      ${String(config.progressInterval).padEnd(29)}│`);
      console.log("└──────────────────────────────────────────────┘\n");
    })
  );

export { program };
