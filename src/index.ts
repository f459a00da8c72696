#!/usr/bin/env node

import { Command } from "commander";
import { addCommand, type AddOptions } from "./cli/add.js";
import { chatCommand } from "./cli/chat.js";
import { diagnoseCommand } from "./cli/diagnose.js";
import { extractCommand } from "./cli/extract.js";
import { ingestCommand } from "./cli/ingest.js";
import { listCommand } from "./cli/list.js";
import { promptCommand } from "./cli/prompt.js";
import { rememberCommand, type RememberOptions } from "./cli/remember.js";
import { resetCommand } from "./cli/reset.js";
import { searchCommand, type SearchOptions } from "./cli/search.js";
import { collectKeyValue, loadCliConfig, parsePositiveInt, type GlobalOptions } from "./cli/util.js";
import { parseFormat, parseRules, validateCommand } from "./cli/validate.js";
import { toErrorMessage } from "./core/errors.js";
import { createLogger } from "./core/logger.js";
import { createMemoryManager } from "./core/manager.js";
import { startMcpServer } from "./mcp/server.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("factkeeper")
  .description("Extract, validate, store and recall personal facts")
  .version(VERSION)
  .option("--config <path>", "Configuration file (defaults to ./config.json when present)");

const globals = () => program.opts<GlobalOptions>();

program
  .command("extract")
  .description("Extract facts from conversation text without storing them")
  .option("-t, --text <text>", "Conversation text")
  .option("-f, --file <path>", "Read the conversation from a file")
  .option("-c, --context <label>", "Section or topic label", "")
  .option("-d, --date <date>", "Date of the conversation, e.g. 2024-03-10")
  .option("--json", "Print facts as JSON")
  .action(extractCommand);

program
  .command("validate")
  .description("Validate candidate facts")
  .argument("[facts...]", "Fact sentences (or use --file, one per line)")
  .option("-f, --file <path>", "Read facts from a file")
  .option("--disable <rules>", "Comma-separated rules to skip", parseRules, [])
  .option("--format <format>", "sections or json", parseFormat, "sections")
  .option("--prompt", "Print the model prompt for these facts instead of validating them")
  .action(validateCommand);

program
  .command("diagnose")
  .description("Diagnose a failed operation")
  .requiredOption("-m, --message <message>", "Error message")
  .option("-o, --operation <name>", "Operation that failed", "unknown")
  .option("-s, --state <state>", "System state snapshot (JSON or text)")
  .option("--json", "Print the report as JSON")
  .action(diagnoseCommand);

program
  .command("prompt")
  .description("Render a prompt template")
  .argument("<category>", "Prompt category, e.g. chat")
  .argument("<name>", "Prompt name, e.g. user_interaction")
  .option("--var <key=value>", "Template variable (repeatable)", collectKeyValue, {})
  .option("--placeholders", "List the template's placeholders instead of rendering")
  .action(promptCommand);

program
  .command("add")
  .description("Validate a single fact and store it")
  .argument("<fact>", "Fact sentence, e.g. \"Bruce lives in Seattle.\"")
  .option("-u, --user <id>", "User the fact belongs to")
  .option("-c, --context <label>", "Section or topic label")
  .option("--metadata <key=value>", "Metadata entry (repeatable)", collectKeyValue, {})
  .action((fact: string, options: AddOptions) => addCommand(fact, options, globals()));

program
  .command("remember")
  .description("Extract facts from conversation text and store the valid ones")
  .option("-t, --text <text>", "Conversation text")
  .option("-f, --file <path>", "Read the conversation from a file")
  .option("-u, --user <id>", "User the facts belong to")
  .option("-c, --context <label>", "Section or topic label", "")
  .option("-d, --date <date>", "Date of the conversation, e.g. 2024-03-10")
  .action((options: RememberOptions) => rememberCommand(options, globals()));

program
  .command("search")
  .description("Search stored memories")
  .argument("<query>", "What to look for")
  .option("-u, --user <id>", "User whose memories to search")
  .option("-l, --limit <n>", "Maximum results", parsePositiveInt, 5)
  .option("--json", "Print results as JSON")
  .action((query: string, options: SearchOptions) => searchCommand(query, options, globals()));

program
  .command("list")
  .description("List all memories of a user")
  .option("-u, --user <id>", "User whose memories to list")
  .action((options: { user?: string }) => listCommand(options, globals()));

program
  .command("reset")
  .description("Delete all memories of a user")
  .option("-u, --user <id>", "User whose memories to delete")
  .option("-y, --yes", "Do not ask for confirmation")
  .action((options: { user?: string; yes?: boolean }) => resetCommand(options, globals()));

program
  .command("chat")
  .description("Ask about a user; without a query, start an interactive session")
  .argument("[query]", "Question, e.g. \"What's my favorite food?\"")
  .option("-u, --user <id>", "User to ask about")
  .action((query: string | undefined, options: { user?: string }) => chatCommand(query, options, globals()));

program
  .command("ingest")
  .description("Extract and store facts from markdown directories")
  .argument("[directories...]", "Directories to scan (defaults to markdown_directories)")
  .action((directories: string[]) => ingestCommand(directories, globals()));

program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(async () => {
    // the manager stays open until the server shuts down
    const config = loadCliConfig(globals());
    const logger = createLogger(config.logging);
    await startMcpServer({ manager: createMemoryManager(config, logger), logger });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(toErrorMessage(err));
  process.exit(1);
});
