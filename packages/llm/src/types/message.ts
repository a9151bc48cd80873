import type { ContentPart, Role } from './content.js';

export type Message = {
  readonly role: Role;
  /** A bare string is shorthand for one TEXT part. */
  readonly content: ReadonlyArray<ContentPart> | string;
};

type Content = Message['content'];

export const userMessage = (content: Content): Message => ({ role: 'user', content });

export const assistantMessage = (content: Content): Message => ({ role: 'assistant', content });

export function toolMessage(toolCallId: string, toolName: string, content: string, isError = false): Message {
  return { role: 'tool', content: [{ kind: 'TOOL_RESULT', toolCallId, toolName, content, isError }] };
}

/** Content as a part list; an empty string yields no parts. */
export function messageParts(message: Readonly<Message>): ReadonlyArray<ContentPart> {
  if (typeof message.content !== 'string') {
    return message.content;
  }
  return message.content ? [{ kind: 'TEXT', text: message.content }] : [];
}
