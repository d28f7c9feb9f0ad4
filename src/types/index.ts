// src/types/index.ts
/**
 * Core Type Definitions for Tether
 */

/** Conversation roles */
export type Role = 'system' | 'user' | 'assistant';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image';
  /** Base64 payload without a data: prefix */
  data: string;
  mimeType?: string;
}

export type ContentPart = TextPart | ImagePart;

/** Plain text or multi-part (text + images) content */
export type MessageContent = string | ContentPart[];

/**
 * One entry in a user's conversation history.
 * Never mutated once appended.
 */
export interface ConversationMessage {
  readonly role: Role;
  readonly content: MessageContent;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

/** Ordered history for one user */
export type Session = readonly ConversationMessage[];

/** Command keywords the model may write in its replies */
export type CommandKeyword = 'TOOL_CALL' | 'MEMORY_SAVE' | 'BROWSER_ACTION' | 'SCHEDULE_TASK';

/**
 * A located command in model output.
 * `rawText` spans from the opening to the matching closing brace.
 */
export interface CommandBlock {
  keyword: string;
  rawText: string;
  /** Offset of the opening brace */
  startOffset: number;
  /** Offset one past the closing brace */
  endOffset: number;
}

export interface ToolCallCommand {
  kind: 'tool_call';
  serverName: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface MemorySaveCommand {
  kind: 'memory_save';
  content: string;
  category: string;
}

export interface BrowserActionCommand {
  kind: 'browser_action';
  action: string;
  params: Record<string, unknown>;
}

export interface ScheduleTaskFields {
  name: string;
  cron?: string;
  message?: string;
  inMinutes?: number;
  atTime?: string;
}

export interface ScheduleActionCommand {
  kind: 'schedule_action';
  action: string;
  task?: ScheduleTaskFields;
  taskId?: string;
}

export type ParsedCommand =
  | ToolCallCommand
  | MemorySaveCommand
  | BrowserActionCommand
  | ScheduleActionCommand;

/**
 * Outcome of running one command.
 * `displayText` is streamed to the user, `feedbackText` goes back to the model.
 */
export interface ExecutionResult {
  displayText: string;
  feedbackText: string;
  succeeded: boolean;
  errorMessage?: string;
}

/** What the loop asks the router for */
export interface GenerationRequest {
  messages: readonly ConversationMessage[];
  temperature?: number;
  maxTokens?: number;
  providerName?: string;
  modelName?: string;
  signal?: AbortSignal;
}

/** Per-call retry bookkeeping, local to one router invocation */
export interface RetryState {
  attempt: number;
  backoffMs: number;
}

/** A fully resolved request handed to a single provider */
export interface ProviderRequest {
  messages: readonly ConversationMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * A backend able to stream completions.
 * `stream` throws the errors from core/errors.ts so the router can classify them.
 */
export interface GenerationProvider {
  stream(request: ProviderRequest): AsyncIterable<string>;
  healthCheck(): Promise<boolean>;
  listModels(): Promise<string[]>;
}

export interface ProviderRegistration {
  name: string;
  provider: GenerationProvider;
  defaultModel: string;
  isDefault?: boolean;
}

export interface LlmCallSample {
  provider: string;
  model: string;
  latencyMs: number;
  tokensOut: number;
  success: boolean;
}

export interface MetricsSink {
  recordLlmCall(sample: LlmCallSample): void;
}

/** Runs a named tool on a named tool server */
export interface ToolExecutor {
  callTool(serverName: string, toolName: string, args: Record<string, unknown>): Promise<string>;
}

export interface MemoryItem {
  id: string;
  userId: string;
  content: string;
  category: string;
  source: string;
  createdAt: string;
}

export interface MemoryBackend {
  addMemory(userId: string, content: string, category: string, source: string): Promise<MemoryItem>;
  retrieveMemory(userId: string, query: string, limit: number): Promise<MemoryItem[]>;
}

export interface BrowserActionOutcome {
  success: boolean;
  title?: string;
  url?: string;
  content?: string;
  links?: string;
  path?: string;
  message?: string;
  error?: string;
}

/** An exclusive browser page. Must be released after every action. */
export interface BrowserHandle {
  execute(action: string, params: Record<string, unknown>): Promise<BrowserActionOutcome>;
  release(): Promise<void>;
}

export interface BrowserPool {
  acquire(): Promise<BrowserHandle>;
}

/** A task as persisted and scheduled */
export interface ScheduledTask {
  id: string;
  name: string;
  cron: string;
  message: string;
  userId: string;
  enabled: boolean;
  /** Removed after the first firing */
  oneShot: boolean;
  createdAt: string;
}

export interface TaskStats {
  id: string;
  name: string;
  cron: string;
  enabled: boolean;
  nextRun: Date | null;
  runCount: number;
}

export type TaskHandler = (task: ScheduledTask) => Promise<void>;

export interface TaskScheduler {
  schedule(task: ScheduledTask, handler: TaskHandler): boolean;
  unschedule(taskId: string): boolean;
  enable(taskId: string): boolean;
  disable(taskId: string): boolean;
  stats(): TaskStats[];
}
