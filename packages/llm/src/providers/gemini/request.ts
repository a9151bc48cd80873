import type { ContentPart, LLMRequest, Message, ToolChoice } from '../../types/index.js';
import { messageParts } from '../../types/index.js';

export type TranslateRequestResult = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

type GeminiPart = Record<string, unknown>;

type GeminiContent = {
  readonly role: 'user' | 'model';
  readonly parts: Array<GeminiPart>;
};

function translatePart(part: ContentPart): GeminiPart | null {
  switch (part.kind) {
    case 'TEXT':
      return part.text ? { text: part.text } : null;

    case 'TOOL_CALL':
      return {
        functionCall: {
          name: part.toolName,
          args: part.args,
        },
      };

    case 'TOOL_RESULT':
      return {
        functionResponse: {
          name: part.toolName,
          response: part.isError ? { error: part.content } : { result: part.content },
        },
      };
  }
}

/**
 * Gemini wants strictly alternating roles and every function response for a
 * model turn inside one content, so adjacent same-role messages are merged.
 */
function translateContents(messages: ReadonlyArray<Message>): Array<GeminiContent> {
  const contents: Array<GeminiContent> = [];

  for (const message of messages) {
    if (message.role === 'system') {
      continue;
    }

    const role = message.role === 'assistant' ? 'model' : 'user';
    const parts = messageParts(message)
      .map(translatePart)
      .filter((part): part is GeminiPart => part !== null);

    if (parts.length === 0) {
      continue;
    }

    const previous = contents[contents.length - 1];
    if (previous && previous.role === role) {
      previous.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  }

  return contents;
}

function systemText(request: Readonly<LLMRequest>): string {
  const fragments: Array<string> = [];
  if (request.system) {
    fragments.push(request.system);
  }
  for (const message of request.messages) {
    if (message.role === 'system') {
      for (const part of messageParts(message)) {
        if (part.kind === 'TEXT') {
          fragments.push(part.text);
        }
      }
    }
  }
  return fragments.join('\n\n');
}

function translateToolChoice(choice: ToolChoice): Record<string, unknown> {
  switch (choice.mode) {
    case 'auto':
      return { mode: 'AUTO' };
    case 'none':
      return { mode: 'NONE' };
    case 'required':
      return { mode: 'ANY' };
    case 'named':
      return { mode: 'ANY', allowedFunctionNames: [choice.toolName] };
  }
}

function hasProperties(parameters: Record<string, unknown>): boolean {
  const properties = parameters['properties'];
  return typeof properties === 'object' && properties !== null && Object.keys(properties).length > 0;
}

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
): TranslateRequestResult {
  const url = `${baseUrl}/v1beta/models/${request.model}:generateContent`;

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'x-goog-api-key': apiKey,
  };

  const body: Record<string, unknown> = {};

  const system = systemText(request);
  if (system) {
    body['systemInstruction'] = {
      parts: [{ text: system }],
    };
  }

  body['contents'] = translateContents(request.messages);

  if (request.tools && request.tools.length > 0) {
    body['tools'] = [
      {
        function_declarations: request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          // Gemini rejects an object schema without properties; omit it instead
          ...(hasProperties(tool.parameters) ? { parameters: tool.parameters } : {}),
        })),
      },
    ];
  }

  if (request.toolChoice) {
    body['toolConfig'] = { functionCallingConfig: translateToolChoice(request.toolChoice) };
  }

  const generationConfig: Record<string, unknown> = {};

  if (request.maxTokens !== undefined) {
    generationConfig['maxOutputTokens'] = request.maxTokens;
  }

  if (request.temperature !== undefined) {
    generationConfig['temperature'] = request.temperature;
  }

  if (request.topP !== undefined) {
    generationConfig['topP'] = request.topP;
  }

  if (request.stopSequences && request.stopSequences.length > 0) {
    generationConfig['stopSequences'] = request.stopSequences;
  }

  if (Object.keys(generationConfig).length > 0) {
    body['generationConfig'] = generationConfig;
  }

  const geminiOptions = request.providerOptions?.['gemini'];
  if (geminiOptions) {
    Object.assign(body, geminiOptions);
  }

  return {
    url,
    headers,
    body,
  };
}
