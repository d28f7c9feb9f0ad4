#!/usr/bin/env node
// src/index.ts
/**
 * Tether Entry Point
 * Terminal chat with an LLM that can call tools, save memories and schedule
 * reminders through command blocks in its replies.
 */
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { config } from './config.js';
import { commands, type CommandContext } from './core/commands.js';
import { describeError } from './core/errors.js';
import { router } from './core/llm.js';
import { metrics } from './core/metrics.js';
import { createRuntime, type Runtime } from './runtime.js';
import { logger } from './utils/logger.js';
import { formatCompleteResponse, responseFooter, responseHeader } from './utils/formatter.js';
import { AgentUI } from './utils/ui.js';
import type { ImagePart } from './types/index.js';

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

interface CliArgs {
  prompt?: string;
  images: string[];
  provider?: string;
  model?: string;
}

const HELP = `
${config.app.name} - LLM chat with tools, memory and reminders

Usage: tether [options] [prompt]

Options:
  -p, --prompt <text>     Run one prompt and exit
  -i, --image <file>      Attach an image to the prompt (repeatable)
  --provider <name>       Provider for this run (ollama, lmstudio, openai)
  --model <name>          Model for this run
  --help                  Show this help message
  --version               Show version

Examples:
  tether                              Start interactive mode
  tether -p "what's on my schedule?"  Run a single prompt
  tether -i chart.png -p "explain"    Ask about an image
`;

/**
 * Parses command line arguments.
 */
function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { images: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-p' || arg === '--prompt') {
      result.prompt = argv[++i];
    } else if (arg === '-i' || arg === '--image') {
      const file = argv[++i];
      if (file) result.images.push(file);
    } else if (arg === '--provider') {
      result.provider = argv[++i];
    } else if (arg === '--model') {
      result.model = argv[++i];
    } else if (arg === '--help') {
      console.log(HELP);
      process.exit(0);
    } else if (arg === '--version') {
      console.log(`${config.app.name} v${config.app.version}`);
      process.exit(0);
    } else if (arg && !result.prompt && !arg.startsWith('-')) {
      result.prompt = arg;
    }
  }

  return result;
}

/**
 * Reads image files into base64 parts.
 */
function loadImages(files: string[]): ImagePart[] {
  return files.map(file => {
    const mimeType = IMAGE_TYPES[path.extname(file).toLowerCase()];
    if (!mimeType) {
      throw new Error(`Unsupported image type: ${file}`);
    }
    return { type: 'image', data: fs.readFileSync(file).toString('base64'), mimeType };
  });
}

/**
 * Lightweight input prompt using raw readline.
 */
function promptInput(promptText: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: true,
    });

    rl.question(promptText, (answer) => {
      rl.close();
      resolve(answer);
    });

    rl.on('SIGINT', () => {
      rl.close();
      reject(new Error('User force closed'));
    });
  });
}

function commandContext(runtime: Runtime): CommandContext {
  const userId = config.agent.userId;
  return {
    clearHistory: () => runtime.agent.clearHistory(userId),
    getHistory: () => runtime.agent.getHistory(userId),
    searchMemory: (query) => runtime.memory.retrieveMemory(userId, query, 20),
    taskStats: () => runtime.scheduler.stats(),
    providerHealth: () => router.healthCheck(),
    defaultProvider: () => router.defaultProvider,
    listModels: (provider) => router.listModels(provider),
    metrics: () => metrics.getStats(),
  };
}

/**
 * Streams one turn to the terminal, with a spinner until the first chunk.
 */
async function streamTurn(runtime: Runtime, ui: AgentUI, message: string, args: CliArgs, images: ImagePart[]): Promise<void> {
  ui.start();
  let started = false;
  try {
    const stream = runtime.agent.processMessage(config.agent.userId, message, {
      images,
      providerName: args.provider,
      modelName: args.model,
    });
    for await (const chunk of stream) {
      if (!started) {
        ui.stop();
        process.stdout.write(responseHeader());
        started = true;
      }
      process.stdout.write(chunk);
    }
  } finally {
    ui.stop();
  }
  if (started) {
    process.stdout.write(responseFooter() + '\n');
  }
}

/**
 * One-shot mode: collect the whole reply, then print it wrapped.
 */
async function runOnce(runtime: Runtime, args: CliArgs, prompt: string): Promise<void> {
  if (commands.isCommand(prompt)) {
    const result = await commands.execute(prompt, commandContext(runtime));
    if (result.message) console.log(result.message);
    return;
  }

  let reply = '';
  const stream = runtime.agent.processMessage(config.agent.userId, prompt, {
    images: loadImages(args.images),
    providerName: args.provider,
    modelName: args.model,
  });
  for await (const chunk of stream) {
    reply += chunk;
  }
  console.log(process.stdout.isTTY ? formatCompleteResponse(reply) : reply);
}

/**
 * Main application loop.
 */
async function main(): Promise<void> {
  logger.init();
  const args = parseArgs(process.argv.slice(2));
  const runtime = createRuntime();

  if (args.prompt) {
    try {
      await runOnce(runtime, args, args.prompt);
    } finally {
      await runtime.shutdown();
    }
    process.exit(0);
  }

  const ui = new AgentUI();
  const provider = args.provider ?? router.defaultProvider;
  console.log(ui.banner(provider, args.model ?? runtime.defaultModel));
  const health = await router.healthCheck();
  if (!health[provider]) {
    console.log(chalk.yellow(`⚠  ${provider} is not reachable. Replies will use a fallback provider if one is up.`));
  }
  console.log();

  const context = commandContext(runtime);
  let pendingImages = loadImages(args.images);

  for (;;) {
    try {
      process.stdout.write('\x1B[?25h');
      const input = (await promptInput(chalk.bold.cyan('You > '))).trim();
      if (!input) continue;

      if (commands.isCommand(input)) {
        const result = await commands.execute(input, context);
        if (result.message) console.log(result.message);
        if (result.exit) break;
        if (!result.continueToAgent) continue;
      }

      await streamTurn(runtime, ui, input, args, pendingImages);
      pendingImages = [];
    } catch (error) {
      if (error instanceof Error && error.message.includes('User force closed')) {
        break;
      }
      logger.error('Main loop error', error);
      console.error(chalk.red('\n[!] Error:'), describeError(error));
    }
  }

  console.log(chalk.dim('\nGoodbye!'));
  await runtime.shutdown();
  process.exit(0);
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  console.error(chalk.red('\n[!] Uncaught Exception:'), error.message);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason);
  console.error(chalk.red('\n[!] Unhandled Rejection:'), describeError(reason));
});

main().catch((error: unknown) => {
  logger.error('Fatal startup error', error);
  console.error(chalk.red('Fatal Error:'), describeError(error));
  process.exit(1);
});
