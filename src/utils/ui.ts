// src/utils/ui.ts
/**
 * Agent UI Module
 * Terminal rendering for the REPL: the start-up banner and a single-line
 * spinner shown until the first token of a reply arrives.
 */
import logUpdate from 'log-update';
import boxen from 'boxen';
import chalk from 'chalk';
import * as readline from 'readline';
import { config } from '../config.js';

/**
 * AgentUI - Terminal UI manager for the agent.
 */
export class AgentUI {
  private readonly frames: readonly string[];
  private readonly spinnerIntervalMs: number;
  private readonly boxWidth: number;
  private readonly waitingMessages: readonly string[];

  private frameIndex = 0;
  private messageIndex = 0;
  private ticks = 0;
  private interval: NodeJS.Timeout | null = null;

  constructor() {
    this.frames = config.ui.spinnerFrames;
    this.spinnerIntervalMs = config.ui.spinnerIntervalMs;
    this.boxWidth = config.ui.boxWidth;
    this.waitingMessages = config.ui.waitingMessages;
  }

  get spinning(): boolean {
    return this.interval !== null;
  }

  /**
   * Starts the waiting spinner. Does nothing when stdout is not a terminal.
   */
  start(): void {
    if (!process.stdout.isTTY || this.interval) return;
    this.frameIndex = 0;
    this.messageIndex = 0;
    this.ticks = 0;
    this.hideCursor();
    this.render();
    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % this.frames.length;
      // rotate the message roughly every two seconds
      if (++this.ticks % 25 === 0) {
        this.messageIndex = (this.messageIndex + 1) % this.waitingMessages.length;
      }
      this.render();
    }, this.spinnerIntervalMs);
  }

  /**
   * Stops the spinner and releases the line it was drawn on.
   */
  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    logUpdate.clear();
    logUpdate.done();
    if (process.stdout.isTTY) {
      readline.cursorTo(process.stdout, 0);
    }
    this.showCursor();
  }

  /**
   * Start-up banner with the active provider and model.
   */
  banner(provider: string, model: string): string {
    const body =
      `${chalk.bold(config.app.name)} ${chalk.dim(`v${config.app.version}`)}\n` +
      `${chalk.dim('Provider:')} ${chalk.cyan(provider)}  ${chalk.dim('Model:')} ${chalk.cyan(model)}\n` +
      chalk.dim('Type /help for commands, /exit to quit.');
    return boxen(body, {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      borderStyle: 'round',
      borderColor: 'cyan',
      width: Math.min(this.boxWidth, Math.max(40, (process.stdout.columns || this.boxWidth) - 2)),
    });
  }

  private render(): void {
    const spinner = chalk.cyan(this.frames[this.frameIndex] ?? '');
    const message = chalk.dim(this.waitingMessages[this.messageIndex] ?? '');
    logUpdate(`${spinner} ${message}`);
  }

  private hideCursor(): void {
    process.stdout.write('\x1B[?25l');
  }

  private showCursor(): void {
    process.stdout.write('\x1B[?25h');
  }
}
