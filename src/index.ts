#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { crawlAndIndex } from "./tools/crawl.js";
import { crawlPreview } from "./tools/preview.js";
import { askQuestion } from "./tools/ask.js";
import { searchDocs } from "./tools/search.js";
import { knowledgeBaseStats } from "./tools/stats.js";
import { deleteSource } from "./tools/delete.js";
import { createRuntime } from "./runtime.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

const runtime = createRuntime();

const server = new Server(
  {
    name: "site-qa-mcp",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

const crawlProperties = {
  url: {
    type: "string",
    description: "The base URL to crawl (must be http or https). Only pages on the same host are followed.",
  },
  max_pages: {
    type: "number",
    description: "Maximum number of pages to extract (default: 50).",
  },
  max_depth: {
    type: "number",
    description: "Maximum link distance from the base URL (default: 3, 0 = base URL only).",
  },
};

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: "crawl_and_index",
        description:
          "Crawl a website breadth-first from the given URL, split every page into overlapping chunks, embed them and store them for question answering. Re-running it for the same site replaces the earlier chunks.",
        inputSchema: {
          type: "object" as const,
          properties: {
            ...crawlProperties,
            max_chars_per_chunk: {
              type: "number",
              description: "Maximum characters per chunk (default: 800). Consecutive chunks overlap by 100 characters.",
            },
          },
          required: ["url"],
        },
      },
      {
        name: "crawl_preview",
        description: "Crawl a website without indexing it and list the URLs that were extracted or failed.",
        inputSchema: {
          type: "object" as const,
          properties: crawlProperties,
          required: ["url"],
        },
      },
      {
        name: "ask_question",
        description:
          "Answer a question from the indexed websites. Retrieves the most relevant chunks and asks the language model to answer from them, returning the answer with its source URLs.",
        inputSchema: {
          type: "object" as const,
          properties: {
            question: { type: "string", description: "The question to answer" },
            top_k: { type: "number", description: "Number of chunks to use as context (default: 5)" },
            use_llm: {
              type: "boolean",
              description: "Generate an answer with the language model (default: true); false returns the raw chunks",
            },
          },
          required: ["question"],
        },
      },
      {
        name: "search_docs",
        description: "Return the indexed chunks closest to a query, ranked by distance (lower is closer).",
        inputSchema: {
          type: "object" as const,
          properties: {
            query: { type: "string", description: "The search query" },
            top_k: { type: "number", description: "Number of results to return (default: 5)" },
          },
          required: ["query"],
        },
      },
      {
        name: "kb_stats",
        description: "Show the vector collection name and how many chunks it holds.",
        inputSchema: {
          type: "object" as const,
          properties: {},
        },
      },
      {
        name: "delete_source",
        description:
          "Delete indexed chunks. A bare origin such as https://example.com removes the whole site; any other URL removes that page.",
        inputSchema: {
          type: "object" as const,
          properties: {
            url: { type: "string", description: "The site origin or page URL to delete" },
          },
          required: ["url"],
        },
      },
    ],
  };
});

async function callTool(name: string, args: unknown): Promise<object | null> {
  switch (name) {
    case "crawl_and_index":
      return crawlAndIndex(args, runtime);
    case "crawl_preview":
      return crawlPreview(args, runtime);
    case "ask_question":
      return askQuestion(args, runtime);
    case "search_docs":
      return searchDocs(args, runtime);
    case "kb_stats":
      return knowledgeBaseStats(runtime);
    case "delete_source":
      return deleteSource(args, runtime);
    default:
      return null;
  }
}

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    const result = await callTool(name, args);
    if (result === null) {
      return {
        content: [{ type: "text" as const, text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }
    return {
      content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    return {
      content: [{ type: "text" as const, text: `Error: ${errorMessage(error)}` }],
      isError: true,
    };
  }
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Site Q&A MCP server running on stdio");
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
