/**
 * MCP server: exposes the nutrition memory tools over stdio so MCP clients can
 * read and write the same profile memory and plan history the pipelines use.
 * Run with: npm run mcp
 * Stdout carries the protocol; logs go to stderr.
 */
import 'dotenv/config';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { appConfig } from '@/config/app.config';
import type { ToolEnvelope } from '@/mcp/envelope';
import {
  handleRecallProfile,
  handleRecentConversation,
  handleSavePlan,
  handleSavePreference,
  handleSaveProfile,
} from '@/mcp/handlers';
import {
  recallProfileInputShape,
  recentConversationInputShape,
  savePlanInputShape,
  savePreferenceInputShape,
  saveProfileInputShape,
} from '@/mcp/tool-contract';
import { logger } from '@/services/logger';
import { createStores } from '@/services/pipeline-deps';

function toToolResult<T>(envelope: ToolEnvelope<T>) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(envelope, null, 2) }],
    isError: !envelope.ok,
  };
}

async function main(): Promise<void> {
  logger.settings.type = 'hidden';
  logger.attachTransport((logObj) => {
    process.stderr.write(`${JSON.stringify(logObj)}\n`);
  });

  const stores = createStores(appConfig);
  const server = new McpServer({
    name: 'nutrition-memory',
    version: '1.0.0',
  });

  server.registerTool(
    'save_user_preference',
    {
      description: 'Store one dietary preference, allergy, medical condition or dislike for a user.',
      inputSchema: savePreferenceInputShape,
    },
    async (input) => toToolResult(await handleSavePreference(stores, input)),
  );

  server.registerTool(
    'save_profile',
    {
      description: 'Store an extracted nutrition profile and its computed daily targets.',
      inputSchema: saveProfileInputShape,
    },
    async (input) => toToolResult(await handleSaveProfile(stores, input)),
  );

  server.registerTool(
    'recall_user_profile',
    {
      description: 'Recall the stored profile and the preferences relevant to the given context.',
      inputSchema: recallProfileInputShape,
    },
    async (input) => toToolResult(await handleRecallProfile(stores, input)),
  );

  server.registerTool(
    'save_meal_plan',
    {
      description: 'Save generated meal options to the user conversation history.',
      inputSchema: savePlanInputShape,
    },
    async (input) => toToolResult(await handleSavePlan(stores, input)),
  );

  server.registerTool(
    'get_recent_conversation',
    {
      description: 'Return the recent messages of a planning session as "User:" / "AI:" lines.',
      inputSchema: recentConversationInputShape,
    },
    async (input) => toToolResult(await handleRecentConversation(stores, input)),
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('mcp:ready', { tools: 5 });

  const shutdown = async () => {
    await server.close();
    stores.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err: unknown) => {
  process.stderr.write(`MCP server failed to start: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
