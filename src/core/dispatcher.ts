// src/core/dispatcher.ts
/**
 * Command Dispatcher
 * Turns extracted command blocks into calls on the tool, memory, browser and
 * scheduler collaborators. Each executed command yields display text for the
 * user and feedback text for the model.
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError } from './errors.js';
import { extractCommandTexts, extractToolCallBlocks } from './extractor.js';
import { isRecord, isToolCallPayload, parseCommandObject } from './json_repair.js';
import {
  isEmptySearchResult,
  loadSearchLexicon,
  simplifySearchQueryForRetry,
  tuneSearchQuery,
  type SearchLexicon,
} from './search_query.js';
import type {
  BrowserActionCommand,
  BrowserActionOutcome,
  BrowserHandle,
  BrowserPool,
  CommandKeyword,
  ExecutionResult,
  MemoryBackend,
  MemorySaveCommand,
  ParsedCommand,
  ScheduleActionCommand,
  ScheduledTask,
  ScheduleTaskFields,
  TaskHandler,
  TaskScheduler,
  ToolCallCommand,
  ToolExecutor,
} from '../types/index.js';

const ZERO_WIDTH = /[\u200B\u200C\u200D\uFEFF]/g;

const nameField = z.unknown().transform(value =>
  typeof value === 'string' && value.trim() ? value.trim() : 'unknown'
);

const argumentsField = z.unknown().transform((value): Record<string, unknown> => {
  if (typeof value === 'string') return parseCommandObject(value, { extended: true }) ?? {};
  return isRecord(value) ? value : {};
});

const toolCallSchema = z.object({
  mcp: nameField,
  tool: nameField,
  arguments: argumentsField,
});

const memorySaveSchema = z.object({
  content: z.unknown().transform(value => (typeof value === 'string' ? value.trim() : '')),
  category: z.unknown().transform(value =>
    typeof value === 'string' && value.trim() ? value.trim() : 'general'
  ),
});

const browserActionSchema = z.object({
  action: z.string().trim().min(1),
  params: z.unknown().transform((value): Record<string, unknown> => (isRecord(value) ? value : {})),
});

const optionalText = z.unknown().transform(value =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined
);

const taskFieldsSchema = z.object({
  name: optionalText.transform(value => value ?? 'Unnamed Task'),
  cron: optionalText,
  message: optionalText,
  in_minutes: z.unknown().transform(value => {
    const minutes = typeof value === 'string' ? Number(value) : value;
    return typeof minutes === 'number' && Number.isFinite(minutes) ? minutes : undefined;
  }),
  at_time: optionalText,
  id: optionalText,
});

const scheduleActionSchema = z.object({
  action: z.string().trim().min(1).transform(value => value.toLowerCase()),
  task: z.unknown(),
  task_id: optionalText,
});

/**
 * Maps a parsed command object onto its typed command.
 * @returns null when required fields are missing
 */
export function toParsedCommand(keyword: CommandKeyword, data: Record<string, unknown>): ParsedCommand | null {
  switch (keyword) {
    case 'TOOL_CALL': {
      const parsed = toolCallSchema.parse(data);
      return { kind: 'tool_call', serverName: parsed.mcp, toolName: parsed.tool, arguments: parsed.arguments };
    }
    case 'MEMORY_SAVE': {
      const parsed = memorySaveSchema.parse(data);
      return { kind: 'memory_save', content: parsed.content, category: parsed.category };
    }
    case 'BROWSER_ACTION': {
      const parsed = browserActionSchema.safeParse(data);
      return parsed.success ? { kind: 'browser_action', ...parsed.data } : null;
    }
    case 'SCHEDULE_TASK': {
      const parsed = scheduleActionSchema.safeParse(data);
      if (!parsed.success) return null;

      const command: ScheduleActionCommand = { kind: 'schedule_action', action: parsed.data.action };
      const taskData = isRecord(parsed.data.task) ? taskFieldsSchema.parse(parsed.data.task) : null;
      if (taskData) {
        const task: ScheduleTaskFields = { name: taskData.name };
        if (taskData.cron !== undefined) task.cron = taskData.cron;
        if (taskData.message !== undefined) task.message = taskData.message;
        if (taskData.in_minutes !== undefined) task.inMinutes = taskData.in_minutes;
        if (taskData.at_time !== undefined) task.atTime = taskData.at_time;
        command.task = task;
      }
      const taskId = parsed.data.task_id ?? taskData?.id;
      if (taskId !== undefined) command.taskId = taskId;
      return command;
    }
  }
}

/**
 * Cuts a tool result down for the model's context, saying how long it was.
 */
export function truncateToolResult(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) return text;
  return `${text.slice(0, Math.max(0, maxChars - 80)).trimEnd()}\n\n... [truncated; total length ${text.length} chars]\n`;
}

function cleanArguments(args: Record<string, unknown>): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    cleaned[key] = typeof value === 'string' ? value.trim().replace(ZERO_WIDTH, '') : value;
  }
  return cleaned;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM */
export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Converts "in N minutes" or "at HH:MM" into a cron expression that matches
 * one moment. A time already past today means tomorrow.
 * @returns null when neither value is usable
 */
export function naturalTimeToCron(now: Date, inMinutes?: number, atTime?: string): string | null {
  const toCron = (at: Date) => `${at.getMinutes()} ${at.getHours()} ${at.getDate()} ${at.getMonth() + 1} *`;

  if (inMinutes !== undefined && inMinutes >= 0) {
    // never the current minute
    const minutes = Math.max(1, Math.round(inMinutes));
    return toCron(new Date(now.getTime() + minutes * 60_000));
  }
  if (atTime) {
    const match = /^(\d{1,2})\s*[:.]\s*(\d{1,2})/.exec(atTime.trim());
    if (!match) return null;
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour > 23 || minute > 59) return null;

    const runAt = new Date(now);
    runAt.setHours(hour, minute, 0, 0);
    if (runAt.getTime() <= now.getTime()) {
      runAt.setDate(runAt.getDate() + 1);
    }
    return toCron(runAt);
  }
  return null;
}

/**
 * Firing handler for reminder tasks: the message lands in the user's memory.
 */
export function reminderHandler(memory: MemoryBackend): TaskHandler {
  return async task => {
    logger.info('Reminder fired', { id: task.id, name: task.name });
    await memory.addMemory(task.userId, `⏰ SCHEDULED REMINDER: ${task.message}`, 'reminders', 'scheduler');
  };
}

export interface DispatcherDeps {
  tools: ToolExecutor;
  memory: MemoryBackend;
  scheduler: TaskScheduler;
  /** Absent when browser automation is not available */
  browser?: BrowserPool | null;
  toolResultMaxChars?: number;
  /** Server and tool whose `query` argument gets search tuning */
  searchServer?: string;
  searchTool?: string;
  lexicon?: SearchLexicon;
  now?: () => Date;
}

const INVALID_SCHEDULE_FORMAT = '**❌ Invalid SCHEDULE_TASK JSON format.**\n\n';

/**
 * CommandDispatcher - Executes commands found in model output.
 */
export class CommandDispatcher {
  private readonly tools: ToolExecutor;
  private readonly memory: MemoryBackend;
  private readonly scheduler: TaskScheduler;
  private readonly browser: BrowserPool | null;
  private readonly toolResultMaxChars: number;
  private readonly searchServer: string;
  private readonly searchTool: string;
  private readonly lexicon: SearchLexicon;
  private readonly now: () => Date;

  constructor(deps: DispatcherDeps) {
    this.tools = deps.tools;
    this.memory = deps.memory;
    this.scheduler = deps.scheduler;
    this.browser = deps.browser ?? null;
    this.toolResultMaxChars = deps.toolResultMaxChars ?? config.agent.toolResultMaxChars;
    this.searchServer = deps.searchServer ?? config.agent.searchServer;
    this.searchTool = deps.searchTool ?? config.agent.searchTool;
    this.lexicon = deps.lexicon ?? loadSearchLexicon();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Finds every block for `keyword` in `text` and executes them in order.
   * Unparseable blocks are dropped, except SCHEDULE_TASK which reports them.
   * Memory saves never produce a result.
   */
  async *processBlocks(userId: string, keyword: CommandKeyword, text: string): AsyncGenerator<ExecutionResult> {
    const raws = keyword === 'TOOL_CALL'
      ? extractToolCallBlocks(text, isToolCallPayload).map(block => block.rawText)
      : extractCommandTexts(text, keyword);
    for (const raw of raws) {
      const data = parseCommandObject(raw);
      if (!data) {
        logger.warn(`${keyword} block could not be parsed`, { raw: raw.slice(0, 200) });
        if (keyword === 'SCHEDULE_TASK') {
          yield {
            displayText: INVALID_SCHEDULE_FORMAT,
            feedbackText: '[Scheduler]\nInvalid SCHEDULE_TASK JSON format.',
            succeeded: false,
            errorMessage: 'Invalid SCHEDULE_TASK JSON format',
          };
        }
        continue;
      }

      const command = toParsedCommand(keyword, data);
      if (!command) continue;

      const result = await this.execute(userId, command);
      if (result) yield result;
    }
  }

  /**
   * Runs a single command.
   * @returns null for commands that produce no output
   */
  async execute(userId: string, command: ParsedCommand): Promise<ExecutionResult | null> {
    switch (command.kind) {
      case 'tool_call':
        return this.executeToolCall(command);
      case 'memory_save':
        await this.saveMemory(userId, command);
        return null;
      case 'browser_action':
        return this.executeBrowserAction(command);
      case 'schedule_action':
        return this.executeScheduleAction(userId, command);
    }
  }

  /**
   * Calls a tool. Failures are reported in both display and feedback text.
   */
  async executeToolCall(command: ToolCallCommand): Promise<ExecutionResult> {
    const { serverName, toolName } = command;
    const label = `${serverName}.${toolName}`;
    const args = cleanArguments(command.arguments);
    const isSearch = serverName === this.searchServer && toolName === this.searchTool;

    if (isSearch && typeof args.query === 'string') {
      args.query = tuneSearchQuery(args.query, this.lexicon);
    }

    const started = Date.now();
    try {
      let result = await this.tools.callTool(serverName, toolName, args);

      const query = args.query;
      if (isSearch && typeof query === 'string' && query.length > 25 && isEmptySearchResult(result, this.lexicon)) {
        const retryQuery = simplifySearchQueryForRetry(query, this.lexicon);
        if (retryQuery !== query) {
          logger.info('Search returned nothing, retrying with a shorter query', { query, retryQuery });
          result = await this.tools.callTool(serverName, toolName, { ...args, query: retryQuery });
        }
      }

      logger.info('Tool call finished', { tool: label, durationMs: Date.now() - started, success: true });
      return {
        displayText: `\n\n**🔧 ${label}**\n${result}\n`,
        feedbackText: `[Tool result ${label}]\n${truncateToolResult(result, this.toolResultMaxChars)}`,
        succeeded: true,
      };
    } catch (e) {
      const message = describeError(e);
      logger.warn('Tool call failed', { tool: label, durationMs: Date.now() - started, error: message });
      return {
        displayText: `**❌ Tool error: ${message}**\n\n`,
        feedbackText: `[Tool error]\n${label}: ${message}`,
        succeeded: false,
        errorMessage: message,
      };
    }
  }

  private async saveMemory(userId: string, command: MemorySaveCommand): Promise<void> {
    if (!command.content) return;
    try {
      await this.memory.addMemory(userId, command.content, command.category, 'explicit_save');
      logger.info('Memory saved', { userId, category: command.category, preview: command.content.slice(0, 50) });
    } catch (e) {
      logger.warn('Memory save failed', { userId, error: describeError(e) });
    }
  }

  /**
   * Runs one browser action on a freshly acquired handle, released on every path.
   */
  async executeBrowserAction(command: BrowserActionCommand): Promise<ExecutionResult> {
    const { action, params } = command;
    const header = `\n\n**🌐 Browser: ${action}**\n`;
    const done = (result: string): ExecutionResult => ({
      displayText: `${header}${result}\n`,
      feedbackText: `[Browser ${action}]\n${result}`,
      succeeded: result.startsWith('✅'),
    });

    if (!this.browser) return done('❌ Browser automation unavailable');

    const rejected = rejectBrowserAction(action, params);
    if (rejected) return done(rejected);

    let handle: BrowserHandle;
    try {
      handle = await this.browser.acquire();
    } catch (e) {
      logger.error('Browser acquire failed', e);
      return done(`❌ Browser automation unavailable: ${describeError(e)}`);
    }

    try {
      logger.action(`browser:${action}`, params);
      const outcome = await handle.execute(action, params);
      return done(describeBrowserOutcome(action, params, outcome));
    } catch (e) {
      const message = describeError(e);
      logger.warn('Browser action failed', { action, error: message });
      return {
        displayText: `**❌ Browser error: ${message}**\n\n`,
        feedbackText: `[Browser ${action}]\nerror: ${message}`,
        succeeded: false,
        errorMessage: message,
      };
    } finally {
      try {
        await handle.release();
      } catch (e) {
        logger.warn('Browser release failed', { action, error: describeError(e) });
      }
    }
  }

  async executeScheduleAction(userId: string, command: ScheduleActionCommand): Promise<ExecutionResult> {
    const result = this.runScheduleAction(userId, command);
    return {
      displayText: `\n\n**⏰ Scheduler**\n${result}\n`,
      feedbackText: `[Scheduler]\n${result}`,
      succeeded: !result.startsWith('❌'),
    };
  }

  private runScheduleAction(userId: string, command: ScheduleActionCommand): string {
    const taskId = command.taskId;

    switch (command.action) {
      case 'create':
        return this.createTask(userId, command.task);

      case 'list': {
        const stats = this.scheduler.stats();
        if (stats.length === 0) return '📋 No scheduled tasks.';
        const lines = ['📋 **Scheduled Tasks:**\n'];
        for (const task of stats) {
          const next = task.nextRun ? formatDateTime(task.nextRun) : 'N/A';
          lines.push(`- ${task.enabled ? '✅' : '❌'} **${task.name}** (\`${task.id}\`)`);
          lines.push(`  Cron: \`${task.cron}\` | Next: ${next} | Runs: ${task.runCount}`);
        }
        return lines.join('\n');
      }

      case 'delete':
        if (!taskId) return '❌ task_id required for delete';
        return this.scheduler.unschedule(taskId) ? `✅ Task \`${taskId}\` deleted` : `❌ Task \`${taskId}\` not found`;

      case 'enable':
      case 'disable': {
        if (!taskId) return `❌ task_id required for ${command.action}`;
        const changed = command.action === 'enable' ? this.scheduler.enable(taskId) : this.scheduler.disable(taskId);
        return changed ? `✅ Task \`${taskId}\` ${command.action}d` : `❌ Task \`${taskId}\` not found`;
      }

      default:
        return `❌ Unknown scheduler action: ${command.action}. Use: create, list, delete, enable, disable`;
    }
  }

  private createTask(userId: string, fields: ScheduleTaskFields | undefined): string {
    const name = fields?.name ?? 'Unnamed Task';
    let cron = fields?.cron ?? '';
    let oneShot = false;

    if (!cron && fields && (fields.inMinutes !== undefined || fields.atTime)) {
      const converted = naturalTimeToCron(this.now(), fields.inMinutes, fields.atTime);
      if (converted) {
        cron = converted;
        oneShot = true;
      }
    }
    if (!cron) return '❌ Cron expression required (or use in_minutes / at_time, e.g. at_time: "15:30")';

    const message = fields?.message;
    if (!message) return '❌ Task message required';

    const task: ScheduledTask = {
      id: `task_${uuidv4().replace(/-/g, '').slice(0, 8)}`,
      name,
      cron,
      message,
      userId,
      enabled: true,
      oneShot,
      createdAt: this.now().toISOString(),
    };

    try {
      this.scheduler.schedule(task, reminderHandler(this.memory));
    } catch (e) {
      return `❌ Failed to schedule task: ${describeError(e)}`;
    }

    const nextRun = this.scheduler.stats().find(s => s.id === task.id)?.nextRun;
    return [
      '✅ Task scheduled!',
      `- **ID:** \`${task.id}\``,
      `- **Name:** ${name}`,
      `- **Cron:** \`${cron}\``,
      `- **Next run:** ${nextRun ? formatDateTime(nextRun) : 'unknown'}`,
    ].join('\n');
  }
}

function stringParam(params: Record<string, unknown>, key: string): string {
  const value = params[key];
  return typeof value === 'string' ? value : '';
}

const BROWSER_ACTIONS = new Set(['navigate', 'screenshot', 'get_text', 'get_links', 'click', 'fill', 'scroll', 'status']);

function rejectBrowserAction(action: string, params: Record<string, unknown>): string | null {
  if (!BROWSER_ACTIONS.has(action)) return `❌ Unknown browser action: ${action}`;
  if (action === 'navigate' && !stringParam(params, 'url')) return '❌ URL required for navigate action';
  if ((action === 'click' || action === 'fill') && !stringParam(params, 'selector')) {
    return `❌ Selector required for ${action} action`;
  }
  return null;
}

function describeBrowserOutcome(action: string, params: Record<string, unknown>, outcome: BrowserActionOutcome): string {
  const failed = (what: string) => `❌ ${what} failed: ${outcome.error ?? 'unknown error'}`;

  switch (action) {
    case 'navigate':
      return outcome.success
        ? `✅ Navigated to: **${outcome.title ?? ''}**\nURL: ${outcome.url ?? stringParam(params, 'url')}`
        : failed('Navigation');
    case 'screenshot':
      return outcome.success
        ? `✅ Screenshot saved: \`${outcome.path ?? ''}\`\nPage: ${outcome.title ?? ''}`
        : failed('Screenshot');
    case 'get_text': {
      if (!outcome.success) return failed('Get text');
      const content = outcome.content ?? '';
      const text = content.length > 2000 ? `${content.slice(0, 2000)}...` : content;
      return `✅ Page content:\n\`\`\`\n${text}\n\`\`\``;
    }
    case 'get_links':
      return outcome.success
        ? `✅ Links found:\n\`\`\`json\n${(outcome.links ?? outcome.content ?? '').slice(0, 3000)}\n\`\`\``
        : failed('Get links');
    case 'click':
      return outcome.success ? `✅ Clicked element. Now on: **${outcome.title ?? ''}**` : failed('Click');
    case 'fill':
      return outcome.success ? '✅ Filled input with value' : failed('Fill');
    case 'scroll': {
      const direction = stringParam(params, 'direction') || 'down';
      const amount = typeof params.amount === 'number' ? params.amount : 500;
      return outcome.success ? `✅ Scrolled ${direction} by ${amount}px` : failed('Scroll');
    }
    case 'status':
      return outcome.success ? `✅ Browser status:\n${outcome.message ?? ''}` : failed('Status');
    default:
      return `❌ Unknown browser action: ${action}`;
  }
}
