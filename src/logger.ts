import pc from 'picocolors';
import { sanitizeErrorForResponse, sanitizeError } from './utils.js';

/**
 * Check Unicode symbol support (emojis)
 * Older Windows terminals may not support emojis
 */
const supportsUnicode = (): boolean => {
  if (process.platform === 'win32') {
    return process.env.WT_SESSION !== undefined || // Windows Terminal
           process.env.TERM_PROGRAM === 'vscode' || // VS Code terminal
           process.env.CONEMU_BUILD !== undefined;  // ConEmu
  }
  return true;
};

const useUnicode = supportsUnicode();

const symbols = {
  incoming: useUnicode ? '📥' : '[>]',
  outgoing: useUnicode ? '📤' : '[<]',
  check: useUnicode ? '✓' : '[OK]',
  cross: useUnicode ? '✗' : '[X]',
  arrow: useUnicode ? '→' : '->',
  error: useUnicode ? '❌' : '[E]',
  debug: useUnicode ? '🔍' : '[D]',
  info: useUnicode ? 'ℹ' : '[I]',
  success: useUnicode ? '✅' : '[OK]',
  warning: useUnicode ? '⚠' : '[!]',
};

// stdout carries the JSON-RPC stream, so everything goes to stderr
const write = (line: string): void => {
  console.error(line);
};

const isDebugEnabled = (): boolean =>
  Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';

/**
 * Console logging for the MCP server
 */
export const logger = {
  /**
   * Log incoming tool calls
   */
  request(tool: string): void {
    write(`${pc.cyan(symbols.incoming)} ${pc.bold(pc.cyan('MCP'))} ${pc.gray(tool)}`);
  },

  /**
   * Log tool results
   */
  response(tool: string, success: boolean = true, error?: unknown): void {
    if (success) {
      write(`${pc.green(symbols.outgoing)} ${pc.bold(pc.green('Response'))} ${pc.gray(tool)} ${pc.green(symbols.check)}`);
      return;
    }
    write(`${pc.red(symbols.outgoing)} ${pc.bold(pc.red('Error'))} ${pc.gray(tool)} ${pc.red(symbols.cross)}`);
    if (error) {
      write(`${pc.red(`   ${symbols.arrow}`)} ${sanitizeErrorForResponse(error)}`);
    }
  },

  error(message: string, error?: unknown): void {
    write(`${pc.red(symbols.error)} ${pc.bold(pc.red('Error'))} ${message}`);
    if (error) {
      write(`${pc.red(`   ${symbols.arrow}`)} ${sanitizeErrorForResponse(error)}`);
    }
  },

  /**
   * Debug logging (only with DEBUG set or in dev mode)
   */
  debug(message: string, data?: unknown): void {
    if (!isDebugEnabled()) return;
    write(`${pc.gray(symbols.debug)} ${pc.bold(pc.gray('Debug'))} ${message}`);
    if (data !== undefined) {
      const dataStr = sanitizeError(typeof data === 'string' ? data : JSON.stringify(data), 200);
      write(`${pc.gray(`   ${symbols.arrow}`)} ${dataStr}`);
    }
  },

  info(message: string): void {
    write(`${pc.blue(symbols.info)} ${pc.bold(pc.blue('Info'))} ${message}`);
  },

  success(message: string): void {
    write(`${pc.green(symbols.success)} ${pc.bold(pc.green('Success'))} ${message}`);
  },

  warn(message: string): void {
    write(`${pc.yellow(symbols.warning)} ${pc.bold(pc.yellow('Warning'))} ${message}`);
  },
};
