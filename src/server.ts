import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { TodoTriageConfig } from './config.js';
import {
  listCategories,
  moveItem,
  prioritizeDocument,
  sortDocument,
  toggleCheckboxes,
} from './todo/api.js';
import { createCollectingNotifier } from './todo/notify.js';
import { scriptedCollaborator } from './todo/prioritize.js';

export const SERVER_NAME = 'todo-triage-mcp';
export const SERVER_VERSION = '0.1.0';

const lineRangeSchema = z.object({
  start: z.number().int().min(1),
  end: z.number().int().min(1),
});

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  line: z.number().int().nonnegative().optional(),
});

/**
 * Tool result carrying the same payload as text and as structured content.
 */
function jsonResult<T extends Record<string, unknown>>(
  value: T
): { content: { type: 'text'; text: string }[]; structuredContent: T } {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `categories.*` reads the category index of a document.
 * - `items.*` edits list items (sort, prioritize, move, toggle).
 *
 * Paths are relative to `config.rootDir`; line numbers are 1-based and inclusive.
 */
export function createMcpServer(config: TodoTriageConfig): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'categories.list',
    {
      title: 'List categories',
      description: 'List the category headings of a todo document with their one-character shortcuts.',
      inputSchema: {
        path: z.string(),
      },
      outputSchema: {
        categories: z.array(
          z.object({
            name: z.string(),
            shortcut: z.string(),
            line: z.number(),
          })
        ),
        warnings: z.array(diagnosticSchema),
        etag: z.string(),
      },
    },
    async ({ path }) => {
      const result = await listCategories(config, { path });
      return jsonResult(result);
    }
  );

  server.registerTool(
    'items.sort',
    {
      title: 'Sort items by priority',
      description:
        'Stable-sort item groups inside each category of a line range: unchecked before checked, then by priority tag, untagged last. Omitting range sorts the whole document.',
      inputSchema: {
        path: z.string(),
        range: lineRangeSchema.optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        etag: z.string(),
        changed: z.boolean(),
        blocks: z.array(z.object({ category: z.string(), groups: z.number() })),
      },
    },
    async ({ path, range, ifMatch }) => {
      const result = await sortDocument(config, { path, range, ifMatch });
      return jsonResult(result);
    }
  );

  server.registerTool(
    'items.prioritize',
    {
      title: 'Prioritize items',
      description:
        'Walk the unchecked top-level items of a range in order and apply one answer per item: "1"-"9" sets a priority, a category shortcut moves the item (it is then offered again), "s" skips, "q" quits. Running out of answers quits.',
      inputSchema: {
        path: z.string(),
        answers: z.array(z.string()),
        range: lineRangeSchema.optional(),
        skipPrioritized: z.boolean().optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        etag: z.string(),
        changed: z.boolean(),
        summary: z.object({
          outcome: z.enum(['completed', 'quit', 'no-categories']),
          candidates: z.number(),
          prioritized: z.number(),
          moved: z.number(),
          skipped: z.number(),
        }),
        messages: z.array(z.object({ severity: z.string(), message: z.string() })),
      },
    },
    async ({ path, answers, range, skipPrioritized, ifMatch }) => {
      const { notify, messages } = createCollectingNotifier({ debug: config.format.debug });
      const result = await prioritizeDocument(config, {
        path,
        range,
        skipPrioritized,
        ifMatch,
        collaborator: scriptedCollaborator(answers, notify),
      });
      return jsonResult({ ...result, messages });
    }
  );

  server.registerTool(
    'items.move',
    {
      title: 'Move an item',
      description:
        'Move an item and its sub-items to the end of the category with the given shortcut. The priority tag is removed from the moved item.',
      inputSchema: {
        path: z.string(),
        line: z.number().int().min(1),
        shortcut: z.string().length(1),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        etag: z.string(),
        changed: z.boolean(),
        line: z.number(),
        category: z.string(),
      },
    },
    async ({ path, line, shortcut, ifMatch }) => {
      const result = await moveItem(config, { path, line, shortcut, ifMatch });
      return jsonResult(result);
    }
  );

  server.registerTool(
    'items.toggle',
    {
      title: 'Toggle checkboxes',
      description:
        'Toggle the checkbox of every bullet item in a line range; bullets without a checkbox get a checked one.',
      inputSchema: {
        path: z.string(),
        range: lineRangeSchema,
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        etag: z.string(),
        toggled: z.array(
          z.object({ line: z.number(), state: z.enum(['checked', 'unchecked', 'created']) })
        ),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ path, range, ifMatch }) => {
      const result = await toggleCheckboxes(config, { path, range, ifMatch });
      return jsonResult(result);
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 */
export async function runStdioServer(config: TodoTriageConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
