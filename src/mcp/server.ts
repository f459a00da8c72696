import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { ErrorDiagnostician, formatDiagnosticReport } from "../core/diagnostics.js";
import { FactkeeperError, toErrorMessage } from "../core/errors.js";
import { FactExtractor } from "../core/extractor.js";
import { getLexicon } from "../core/lexicon.js";
import type { Logger } from "../core/logger.js";
import type { MemoryManager } from "../core/manager.js";
import { detectLanguage } from "../core/text.js";
import { FactValidator, VALIDATION_RULES } from "../core/validator.js";
import type { ValidationCriteria } from "../types.js";
import { VERSION } from "../version.js";

export interface McpDeps {
  manager: MemoryManager;
  logger: Logger;
  extractor?: FactExtractor;
  validator?: FactValidator;
  diagnostician?: ErrorDiagnostician;
}

type ToolResult = { content: { type: "text"; text: string }[]; isError?: boolean };

function text(body: string): ToolResult {
  return { content: [{ type: "text" as const, text: body }] };
}

const RULE = z.enum(["subject", "specificity", "consistency", "temporal"]);

/**
 * Registers the memory tools on a new server. Transport is up to the caller
 * so tests can connect in process.
 */
export function createMcpServer(deps: McpDeps): McpServer {
  const { manager } = deps;
  const logger = deps.logger.child({ component: "mcp" });
  const extractor = deps.extractor ?? new FactExtractor();
  const validator = deps.validator ?? new FactValidator();
  const diagnostician = deps.diagnostician ?? new ErrorDiagnostician();

  const server = new McpServer(
    { name: "factkeeper", version: VERSION },
    {
      instructions:
        "factkeeper remembers personal facts about users. Use remember to store what a user shares about themselves, search_memories or chat to recall it, and diagnose_error when a memory operation fails.",
    }
  );

  // Known failures become tool errors the client can show; anything else is a bug and propagates.
  async function guarded(tool: string, run: () => Promise<ToolResult> | ToolResult): Promise<ToolResult> {
    try {
      return await run();
    } catch (err) {
      if (!(err instanceof FactkeeperError)) throw err;
      logger.warn({ err, tool }, "Tool failed");
      return { ...text(`${err.code}: ${toErrorMessage(err)}`), isError: true };
    }
  }

  server.tool(
    "extract_facts",
    "Extract atomic personal facts from conversation text without storing them.",
    {
      content: z.string().describe("Conversation text."),
      context: z.string().optional().describe("Section or topic label, e.g. 'social'."),
      time_context: z
        .string()
        .optional()
        .describe("Date of the conversation (YYYY-MM-DD). Relative phrases like 'yesterday' are pinned to it."),
    },
    async ({ content, context, time_context }) =>
      guarded("extract_facts", () => {
        const facts = extractor.extract({ content, context: context ?? "", timeContext: time_context });
        return text(JSON.stringify(facts, null, 2));
      })
  );

  server.tool(
    "validate_facts",
    "Check candidate facts for an explicit subject, concrete detail, contradictions and valid dates.",
    {
      facts: z.array(z.string()).describe("Candidate fact sentences."),
      disable: z.array(RULE).optional().describe(`Rules to skip: ${VALIDATION_RULES.join(", ")}.`),
      format: z.enum(["sections", "json"]).optional().describe("Output format. Defaults to sections."),
    },
    async ({ facts, disable, format }) =>
      guarded("validate_facts", () => {
        const lexicon = getLexicon();
        const criteria: ValidationCriteria = {};
        for (const rule of disable ?? []) criteria[rule] = false;
        const candidates = facts.map((f) => ({ text: f, language: detectLanguage(f, lexicon) }));
        return text(validator.report(candidates, { criteria, format }));
      })
  );

  server.tool(
    "remember",
    "Extract facts from text, validate them and store the valid ones for the user.",
    {
      content: z.string().describe("What the user said."),
      user_id: z.string().optional().describe("User the facts belong to. Defaults to the configured user."),
      context: z.string().optional().describe("Section or topic label."),
      time_context: z.string().optional().describe("Date of the conversation (YYYY-MM-DD)."),
    },
    async ({ content, user_id, context, time_context }) =>
      guarded("remember", async () => {
        const result = await manager.remember(content, {
          userId: user_id,
          context,
          timeContext: time_context,
        });
        const lines = [
          ...result.stored.map((r) => `Stored: ${r.text}`),
          ...result.validation.invalid.map(({ fact, reason }) => `Rejected: ${fact.text} (${reason})`),
        ];
        return text(lines.length > 0 ? lines.join("\n") : "No facts found.");
      })
  );

  server.tool(
    "search_memories",
    "Search a user's stored memories.",
    {
      query: z.string().describe("What to look for."),
      user_id: z.string().optional().describe("Defaults to the configured user."),
      limit: z.number().int().positive().max(50).optional().describe("Maximum results. Defaults to 5."),
    },
    async ({ query, user_id, limit }) =>
      guarded("search_memories", async () => {
        const results = await manager.searchMemories(query, { userId: user_id, limit });
        if (results.length === 0) return text("No matching memories.");
        return text(results.map(({ record }) => `• ${record.text}`).join("\n"));
      })
  );

  server.tool(
    "chat",
    "Answer a question about a user from their stored memories. Never invents facts.",
    {
      query: z.string().describe("The question, e.g. 'What is my favorite food?'"),
      user_id: z.string().optional().describe("Defaults to the configured user."),
    },
    async ({ query, user_id }) => guarded("chat", async () => text(await manager.chat(query, { userId: user_id })))
  );

  server.tool(
    "diagnose_error",
    "Classify a failed operation and suggest root causes, resolution steps and prevention.",
    {
      error_message: z.string().describe("The error message."),
      operation: z.string().describe("Name of the operation that failed."),
      system_state: z.string().optional().describe("Snapshot of relevant state, JSON or free text."),
    },
    async ({ error_message, operation, system_state }) => {
      const report = diagnostician.diagnose({
        errorMessage: error_message,
        operation,
        systemState: system_state,
        timestamp: new Date().toISOString(),
      });
      return text(formatDiagnosticReport(report));
    }
  );

  return server;
}

export async function startMcpServer(deps: McpDeps): Promise<void> {
  const server = createMcpServer(deps);

  // Connect transport immediately so MCP clients discover tools without delay.
  const transport = new StdioServerTransport();
  await server.connect(transport);
  deps.logger.info({ version: VERSION }, "MCP server listening on stdio");

  const shutdown = () => {
    server
      .close()
      .then(() => deps.manager.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          deps.logger.error({ err }, "Shutdown failed");
          process.exit(1);
        }
      );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
