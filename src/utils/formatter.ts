// src/utils/formatter.ts
/**
 * Text Formatter Module
 * Handles word wrapping and terminal output formatting.
 */
import chalk from 'chalk';
import { config } from '../config.js';

/**
 * Gets the current terminal width, with fallback.
 * @returns Terminal width in columns
 */
export function getTerminalWidth(): number {
  const width = process.stdout.columns || 80;
  return Math.max(40, Math.min(width - 2, 100));
}

/**
 * Wraps text to fit within specified width, preserving words.
 * A single word longer than the width stays on its own line.
 * @returns Wrapped text as array of lines
 */
export function wrapLine(text: string, width: number): string[] {
  if (!text || text.length <= width) {
    return [text];
  }

  const words = text.split(/\s+/);
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    if (!word) continue;

    if (currentLine.length === 0) {
      currentLine = word;
    } else if (currentLine.length + 1 + word.length <= width) {
      currentLine += ' ' + word;
    } else {
      lines.push(currentLine);
      currentLine = word;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines;
}

/**
 * Wraps a complete response. Blank lines and fenced code blocks are kept
 * as they are.
 */
export function formatAgentResponse(text: string, width: number = getTerminalWidth()): string {
  if (!text) return '';

  const outputLines: string[] = [];
  let inCode = false;

  for (const line of text.split('\n')) {
    if (line.trimStart().startsWith('```')) {
      inCode = !inCode;
      outputLines.push(line);
      continue;
    }
    if (inCode || line.trim() === '') {
      outputLines.push(line);
      continue;
    }
    outputLines.push(...wrapLine(line.trim(), width));
  }

  return outputLines.join('\n');
}

/**
 * Line printed before a streamed response.
 */
export function responseHeader(): string {
  const width = Math.min(getTerminalWidth(), 60);
  return '\n' + chalk.dim('─'.repeat(width)) + '\n' + chalk.cyan.bold(`${config.app.name}:`) + '\n';
}

export function responseFooter(): string {
  const width = Math.min(getTerminalWidth(), 60);
  return '\n' + chalk.dim('─'.repeat(width));
}

/**
 * Formats a complete agent response with header, wrapped body, and footer.
 */
export function formatCompleteResponse(text: string): string {
  if (!text) return '';
  return responseHeader() + formatAgentResponse(text) + responseFooter();
}
