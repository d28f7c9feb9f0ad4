// src/core/prompts.ts
/**
 * System prompt for the agent: the command grammar the model may write,
 * the configured tool servers and any memories relevant to the turn.
 */
import type { MemoryItem } from '../types/index.js';

const IDENTITY = `You are Tether, a helpful assistant running in the user's terminal.
Answer concisely. When an action is needed, write the matching command block on its own line.`;

const TOOL_SECTION = `## TOOLS
Call a tool on a configured tool server with:
TOOL_CALL = { "mcp": "server-name", "tool": "tool_name", "arguments": { ... } }

Results come back in the next message. You may call several tools in one reply.
Never repeat a TOOL_CALL whose result you already have.`;

const MEMORY_SECTION = `## MEMORY
Save something the user wants remembered with:
MEMORY_SAVE = { "content": "what to remember", "category": "preferences" }
Categories: preferences, facts, tasks, notes, reminders, general
Confirm what you saved.`;

const BROWSER_SECTION = `## BROWSER
Control a web browser with:
BROWSER_ACTION = { "action": "navigate", "params": { "url": "https://example.com" } }
Actions and params:
- navigate: { "url": "..." }
- screenshot: { "full_page": false }
- get_text: { "selector": "body" }
- get_links: {}
- click: { "selector": "button.submit" }
- fill: { "selector": "input#email", "value": "..." }
- scroll: { "direction": "down", "amount": 500 }
- status: {}`;

const SCHEDULE_SECTION = `## SCHEDULED TASKS
Reminders run on cron expressions (minute hour day month weekday):
SCHEDULE_TASK = { "action": "create", "task": { "name": "Standup", "cron": "0 9 * * 1-5", "message": "Standup in 5 minutes" } }
For a single reminder use "in_minutes": 10 or "at_time": "15:30" instead of "cron".
SCHEDULE_TASK = { "action": "list" }
SCHEDULE_TASK = { "action": "delete", "task_id": "task_1a2b3c4d" }
"enable" and "disable" take a task_id as well.`;

export interface PromptContext {
  /** Names of the configured tool servers */
  toolServers: readonly string[];
  memories: readonly MemoryItem[];
  browserAvailable: boolean;
  now?: Date;
}

export function buildSystemPrompt(context: PromptContext): string {
  const sections = [IDENTITY, `Current time: ${(context.now ?? new Date()).toISOString()}`];

  if (context.toolServers.length > 0) {
    sections.push(`${TOOL_SECTION}\nConfigured servers: ${context.toolServers.join(', ')}`);
  }
  sections.push(MEMORY_SECTION);
  if (context.browserAvailable) {
    sections.push(BROWSER_SECTION);
  }
  sections.push(SCHEDULE_SECTION);

  if (context.memories.length > 0) {
    const lines = context.memories.map(m => `- [${m.category}] ${m.content}`);
    sections.push(`## WHAT YOU REMEMBER ABOUT THE USER\n${lines.join('\n')}`);
  }

  return sections.join('\n\n');
}
