import { LOG_PREFIX, error as logError, warn } from '../output/logger';
import { handleUnknownError } from '../errors/index';

export interface DebugOptions {
  debug?: boolean;
  showPrompt?: boolean;
  showPromptTrunc?: boolean;
  debugJson?: boolean;
}

const PREVIEW_CHARS = 500;

/** Prints request metadata and, on request, the prompt (full or first 500 chars) to stderr. */
export function printRequest(
  provider: string,
  meta: Record<string, unknown>,
  systemPrompt: string,
  content: string,
  options: DebugOptions
): void {
  if (!options.debug) return;
  logError(`${LOG_PREFIX} Sending request to ${provider}:`, meta);

  if (options.showPrompt) {
    logError(`${LOG_PREFIX} System prompt (full):`);
    logError(systemPrompt);
    logError(`${LOG_PREFIX} User content (full):`);
    logError(content);
  } else if (options.showPromptTrunc) {
    logError(`${LOG_PREFIX} System prompt (first ${PREVIEW_CHARS} chars):`);
    logError(systemPrompt.slice(0, PREVIEW_CHARS));
    if (systemPrompt.length > PREVIEW_CHARS) logError('... [truncated]');
    logError(`${LOG_PREFIX} User content preview (first ${PREVIEW_CHARS} chars):`);
    logError(content.slice(0, PREVIEW_CHARS));
    if (content.length > PREVIEW_CHARS) logError('... [truncated]');
  }
}

export function printResponse(meta: Record<string, unknown>, raw: unknown, options: DebugOptions): void {
  if (!options.debug) return;
  logError(`${LOG_PREFIX} LLM response meta:`, meta);
  if (!options.debugJson) return;
  try {
    logError(`${LOG_PREFIX} Full JSON response:`);
    logError(typeof raw === 'string' ? raw : JSON.stringify(raw, null, 2));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'JSON stringify for debug');
    warn(`${LOG_PREFIX} Warning: ${err.message}`);
  }
}
