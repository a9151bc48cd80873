import type { ToolDescriptor } from '../../types/index.js';
import { createSearchWebTool } from './search-web.js';
import { createReadGmailInboxTool } from './read-gmail-inbox.js';

export type BuiltinToolOptions = {
  readonly serperApiKey: string | undefined;
  readonly fetch?: typeof globalThis.fetch;
};

export function createBuiltinTools(options: BuiltinToolOptions): ReadonlyArray<ToolDescriptor> {
  return [createSearchWebTool(options), createReadGmailInboxTool()];
}

export { createSearchWebTool, SERPER_SEARCH_URL, type SearchResult, type SearchWebOptions } from './search-web.js';
export { createReadGmailInboxTool, GMAIL_NOT_CONFIGURED } from './read-gmail-inbox.js';
