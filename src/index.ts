#!/usr/bin/env node

/**
 * worklog MCP Server
 *
 * Builds timesheets from Jira and GitHub activity and reports productivity
 * insights from the stored daily snapshots.
 *
 * Tools:
 *   Raw data: get_jira_activity, get_github_activity
 *   Reports:  generate_timesheet, productivity_insights
 *   Info:     get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { defaultLogger } from './log.js';
import { createRuntime } from './runtime.js';
import { callTool, TOOL_DEFINITIONS } from './tools.js';

const SERVER_INSTRUCTIONS = `worklog builds daily timesheets from Jira and GitHub activity.

Use worklog tools when the user asks about:
- Filling in a timesheet, what they worked on over some days → generate_timesheet
- Commit counts, tickets completed, project distribution, context switching → productivity_insights
- Raw Jira issues or GitHub activity for one day → get_jira_activity or get_github_activity
- Credential or profile status → get_capabilities

Common triggers: "timesheet", "hours", "what did I do this week", "productivity", "context switching"`;

const server = new Server(
  { name: 'worklog', version: '1.0.0' },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tools ───────────────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: TOOL_DEFINITIONS };
});

server.setRequestHandler(CallToolRequestSchema, (request) => {
  const { name, arguments: args } = request.params;
  return callTool(name, args, () => createRuntime(defaultLogger));
});

// ─── Prompts ─────────────────────────────────────────────────

const PROMPTS = [
  {
    name: 'weekly-timesheet',
    description: 'Build the timesheet for the last week',
    arguments: [
      {
        name: 'days',
        description: 'Number of days ending today (optional, defaults to the profile setting)',
        required: false,
      },
    ],
  },
  {
    name: 'productivity-review',
    description: 'Review productivity insights for the last week',
    arguments: [
      {
        name: 'days',
        description: 'Number of days ending today (optional, defaults to the profile setting)',
        required: false,
      },
    ],
  },
];

const PROMPT_TOOLS: Record<string, string> = {
  'weekly-timesheet': 'generate_timesheet',
  'productivity-review': 'productivity_insights',
};

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const { name, arguments: promptArgs } = request.params;
  const prompt = PROMPTS.find((p) => p.name === name);
  const tool = PROMPT_TOOLS[name];
  if (!prompt || !tool) {
    throw new Error(`Unknown prompt: ${name}`);
  }

  const days = promptArgs?.['days'];
  const argsDescription = days ? ` with ${JSON.stringify({ days: Number(days) })}` : '';

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user' as const,
        content: {
          type: 'text' as const,
          text: `Use the worklog ${tool} tool${argsDescription} and summarize the result.`,
        },
      },
    ],
  };
});

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  defaultLogger.info('MCP server v1.0.0 started');
}

main().catch((error) => {
  defaultLogger.error('Fatal error:', error);
  process.exit(1);
});
