import type { ToolDescriptor } from '../../types/index.js';
import { warning } from '../../types/index.js';
import { defineTool } from '../define.js';

export const GMAIL_NOT_CONFIGURED =
  'Gmail reading is not implemented. It requires OAuth 2.0 client credentials and a Gmail API ' +
  'integration that this assistant does not ship.';

/** Declared so the model can offer it; always answers with a warning. */
export function createReadGmailInboxTool(): ToolDescriptor {
  return defineTool({
    name: 'read_gmail_inbox',
    description:
      'Reads emails from the Gmail inbox. Requires external OAuth 2.0 setup, which is not configured.',
    category: 'communication',
    parameters: {
      max_results: { kind: 'integer', description: 'Maximum number of emails to return', default: 10 },
      query: { kind: 'string', description: 'Gmail search query, e.g. "is:unread from:alice"' },
    },
    handler: async (args) =>
      warning(GMAIL_NOT_CONFIGURED, {
        details: {
          max_results: args['max_results'],
          query: args['query'] ?? null,
        },
      }),
  });
}
