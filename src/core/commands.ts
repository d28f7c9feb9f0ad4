// src/core/commands.ts
/**
 * Slash Command System
 * REPL commands that inspect or reset local state without calling the model.
 */
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { messageText } from './context.js';
import { describeError } from './errors.js';
import type { MetricsSnapshot } from './metrics.js';
import type { MemoryItem, Session, TaskStats } from '../types/index.js';

/** Command handler function type */
type CommandHandler = (args: string, context: CommandContext) => Promise<CommandResult>;

/** Context passed to command handlers */
export interface CommandContext {
  /** Drop the current user's session */
  clearHistory: () => void;
  getHistory: () => Session;
  /** Memories matching a query; newest first for a blank query */
  searchMemory: (query: string) => Promise<MemoryItem[]>;
  taskStats: () => TaskStats[];
  providerHealth: () => Promise<Record<string, boolean>>;
  defaultProvider: () => string;
  listModels: (provider?: string) => Promise<string[]>;
  metrics: () => MetricsSnapshot;
}

/** Result of command execution */
export interface CommandResult {
  /** Whether to continue to agent (false = command handled it) */
  continueToAgent: boolean;
  /** Optional message to display */
  message?: string;
  /** Leave the REPL */
  exit?: boolean;
}

/** Slash command definition */
export interface SlashCommand {
  name: string;
  aliases: string[];
  description: string;
  usage: string;
  handler: CommandHandler;
}

const RULE = '─'.repeat(40);

function preview(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

/**
 * CommandRegistry - Manages slash commands.
 */
export class CommandRegistry {
  private commands: Map<string, SlashCommand> = new Map();

  constructor() {
    this.registerBuiltinCommands();
  }

  /**
   * Registers all built-in commands.
   */
  private registerBuiltinCommands(): void {
    this.register({
      name: 'help',
      aliases: ['h', '?'],
      description: 'Show available commands and their usage',
      usage: '/help [command]',
      handler: async (args) => {
        if (args) {
          const cmd = this.commands.get(args.replace(/^\//, ''));
          if (cmd) {
            return { continueToAgent: false, message: this.formatCommandHelp(cmd) };
          }
          return { continueToAgent: false, message: chalk.yellow(`Unknown command: ${args}`) };
        }
        return { continueToAgent: false, message: this.formatAllHelp() };
      }
    });

    this.register({
      name: 'clear',
      aliases: ['c', 'reset'],
      description: 'Clear conversation history',
      usage: '/clear',
      handler: async (_args, context) => {
        context.clearHistory();
        return { continueToAgent: false, message: chalk.cyan('✓ Conversation cleared. Starting fresh.') };
      }
    });

    this.register({
      name: 'history',
      aliases: [],
      description: 'Show the messages kept in this session',
      usage: '/history',
      handler: async (_args, context) => {
        const history = context.getHistory();
        if (history.length === 0) {
          return { continueToAgent: false, message: chalk.yellow('No conversation history yet.') };
        }
        const lines = history.map((m, i) =>
          `${chalk.dim(String(i + 1).padStart(3))} ${chalk.cyan(m.role.padEnd(9))} ${preview(messageText(m.content), 70)}`
        );
        return {
          continueToAgent: false,
          message: `${chalk.bold(`\nSession History (${history.length} messages)`)}\n${chalk.dim(RULE)}\n${lines.join('\n')}\n`
        };
      }
    });

    this.register({
      name: 'memory',
      aliases: ['mem'],
      description: 'Show saved memories, optionally matching a query',
      usage: '/memory [query]',
      handler: async (args, context) => {
        const items = await context.searchMemory(args);
        if (items.length === 0) {
          return {
            continueToAgent: false,
            message: chalk.yellow(args ? `No memories match "${args}".` : 'No memories saved yet.')
          };
        }
        const lines = items.map(item =>
          `  ${chalk.dim(item.createdAt.slice(0, 16).replace('T', ' '))} ${chalk.cyan(`[${item.category}]`)} ${preview(item.content, 80)}`
        );
        return { continueToAgent: false, message: `${chalk.bold('\nMemories')}\n${chalk.dim(RULE)}\n${lines.join('\n')}\n` };
      }
    });

    this.register({
      name: 'tasks',
      aliases: ['t'],
      description: 'List scheduled reminder tasks',
      usage: '/tasks',
      handler: async (_args, context) => {
        const stats = context.taskStats();
        if (stats.length === 0) {
          return { continueToAgent: false, message: chalk.yellow('No scheduled tasks.') };
        }
        const lines = stats.map(task => {
          const status = task.enabled ? chalk.green('on ') : chalk.red('off');
          const next = task.nextRun ? task.nextRun.toLocaleString() : 'N/A';
          return `  ${status} ${chalk.bold(task.name)} ${chalk.dim(`(${task.id})`)}\n      cron ${task.cron} | next ${next} | runs ${task.runCount}`;
        });
        return { continueToAgent: false, message: `${chalk.bold('\nScheduled Tasks')}\n${chalk.dim(RULE)}\n${lines.join('\n')}\n` };
      }
    });

    this.register({
      name: 'providers',
      aliases: ['status'],
      description: 'Check which LLM providers are reachable',
      usage: '/providers',
      handler: async (_args, context) => {
        const health = await context.providerHealth();
        const current = context.defaultProvider();
        const lines = Object.entries(health).map(([name, ok]) => {
          const marker = name === current ? chalk.cyan(' (default)') : '';
          return `  ${ok ? chalk.green('●') : chalk.red('○')} ${name}${marker}`;
        });
        return { continueToAgent: false, message: `${chalk.bold('\nProviders')}\n${chalk.dim(RULE)}\n${lines.join('\n')}\n` };
      }
    });

    this.register({
      name: 'models',
      aliases: ['m'],
      description: 'List the models a provider offers',
      usage: '/models [provider]',
      handler: async (args, context) => {
        const provider = args || context.defaultProvider();
        const models = await context.listModels(provider);
        if (models.length === 0) {
          return { continueToAgent: false, message: chalk.yellow(`${provider} reports no models.`) };
        }
        return {
          continueToAgent: false,
          message: `${chalk.bold(`\nModels on ${provider}`)}\n${chalk.dim(RULE)}\n${models.map(m => `  ${m}`).join('\n')}\n`
        };
      }
    });

    this.register({
      name: 'stats',
      aliases: [],
      description: 'Show LLM call statistics for this run',
      usage: '/stats',
      handler: async (_args, context) => {
        const snapshot = context.metrics();
        let message = `${chalk.bold('\nLLM Calls')}\n${chalk.dim(RULE)}\n`;
        message += `  ${chalk.dim('Calls:')}        ${snapshot.totalCalls}\n`;
        message += `  ${chalk.dim('Failures:')}     ${snapshot.totalFailures}\n`;
        message += `  ${chalk.dim('Tokens out:')}   ${snapshot.totalTokensOut}\n`;
        message += `  ${chalk.dim('Avg latency:')}  ${Math.round(snapshot.averageLatencyMs)} ms\n`;
        for (const [name, stats] of Object.entries(snapshot.byProvider)) {
          message += `  ${chalk.cyan(name)}: ${stats.calls} calls, ${stats.failures} failed, ${Math.round(stats.averageLatencyMs)} ms avg\n`;
        }
        return { continueToAgent: false, message };
      }
    });

    this.register({
      name: 'exit',
      aliases: ['quit', 'q'],
      description: 'Leave Tether',
      usage: '/exit',
      handler: async () => ({ continueToAgent: false, exit: true })
    });
  }

  /**
   * Registers a new command.
   */
  register(command: SlashCommand): void {
    this.commands.set(command.name, command);
    for (const alias of command.aliases) {
      this.commands.set(alias, command);
    }
  }

  /**
   * Checks if input is a slash command.
   */
  isCommand(input: string): boolean {
    return input.startsWith('/');
  }

  /**
   * Parses and executes a slash command.
   */
  async execute(input: string, context: CommandContext): Promise<CommandResult> {
    if (!this.isCommand(input)) {
      return { continueToAgent: true };
    }

    const [name = '', ...rest] = input.slice(1).trim().split(/\s+/);
    const commandName = name.toLowerCase();
    const args = rest.join(' ');

    const command = this.commands.get(commandName);
    if (!command) {
      return {
        continueToAgent: false,
        message: chalk.yellow(`Unknown command: /${commandName}. Type /help for available commands.`)
      };
    }

    try {
      return await command.handler(args, context);
    } catch (e) {
      logger.error(`Command error: /${commandName}`, e);
      return { continueToAgent: false, message: chalk.red(`Command failed: ${describeError(e)}`) };
    }
  }

  /**
   * Formats help for a single command.
   */
  private formatCommandHelp(cmd: SlashCommand): string {
    let help = chalk.bold(`\n/${cmd.name}`);
    if (cmd.aliases.length > 0) {
      help += chalk.dim(` (aliases: ${cmd.aliases.map(a => '/' + a).join(', ')})`);
    }
    help += '\n';
    help += cmd.description + '\n';
    help += chalk.dim(`Usage: ${cmd.usage}`) + '\n';
    return help;
  }

  /**
   * Formats help for all commands.
   */
  private formatAllHelp(): string {
    const uniqueCommands = new Map<string, SlashCommand>();
    for (const [name, cmd] of this.commands) {
      if (name === cmd.name) {
        uniqueCommands.set(name, cmd);
      }
    }

    let help = chalk.bold('\nAvailable Commands\n');
    help += chalk.dim(RULE) + '\n';

    const sorted = Array.from(uniqueCommands.values())
      .sort((a, b) => a.name.localeCompare(b.name));

    for (const cmd of sorted) {
      const aliases = cmd.aliases.length > 0
        ? chalk.dim(` (${cmd.aliases.map(a => '/' + a).join(', ')})`)
        : '';
      help += `  ${chalk.cyan('/' + cmd.name.padEnd(12))}${aliases}\n`;
      help += `    ${chalk.dim(cmd.description)}\n`;
    }

    help += chalk.dim('\nType /help <command> for detailed usage.\n');
    return help;
  }
}

/** Singleton instance */
export const commands = new CommandRegistry();
