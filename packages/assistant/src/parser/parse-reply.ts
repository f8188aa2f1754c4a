import { MalformedToolPayloadError } from '../errors.js';
import type { ParsedReply, ToolCall } from '../types/index.js';

const SHELL_KEYS = ['command', 'explanation', 'tool'];
const SEARCH_KEYS = ['query', 'tool'];

/**
 * Classifies one model reply. Only a reply that is, in its entirety, a single
 * JSON object of one of the two tool shapes becomes a tool call; anything
 * else is plain text and is returned exactly as received.
 */
export function parseReply(raw: string): ParsedReply {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('{')) {
    return { kind: 'plain_text', text: raw, malformed: null };
  }

  try {
    return { kind: 'tool_call', call: decodeToolCall(trimmed) };
  } catch (err) {
    if (err instanceof MalformedToolPayloadError) {
      return { kind: 'plain_text', text: raw, malformed: err.message };
    }
    throw err;
  }
}

/**
 * Decodes a JSON document into a ToolCall, throwing
 * MalformedToolPayloadError for anything but the two exact shapes.
 */
export function decodeToolCall(json: string): ToolCall {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    // also covers several concatenated objects and trailing prose
    throw new MalformedToolPayloadError(
      `not a single JSON object: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedToolPayloadError('payload is not a JSON object');
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const tool = fields.get('tool');

  switch (tool) {
    case 'shell': {
      requireExactKeys(fields, SHELL_KEYS);
      const command = requireString(fields, 'command');
      const explanation = requireString(fields, 'explanation');
      if (command.trim() === '') {
        throw new MalformedToolPayloadError('shell command is blank');
      }
      return { tool: 'shell', command, explanation };
    }
    case 'search': {
      requireExactKeys(fields, SEARCH_KEYS);
      const query = requireString(fields, 'query');
      if (query.trim() === '') {
        throw new MalformedToolPayloadError('search query is blank');
      }
      return { tool: 'search', query };
    }
    default:
      throw new MalformedToolPayloadError(
        tool === undefined ? "missing field 'tool'" : `unknown tool ${JSON.stringify(tool)}`,
      );
  }
}

function requireExactKeys(fields: ReadonlyMap<string, unknown>, expected: ReadonlyArray<string>): void {
  const keys = [...fields.keys()].sort();
  const extra = keys.filter((key) => !expected.includes(key));
  if (extra.length > 0) {
    throw new MalformedToolPayloadError(`unexpected field(s): ${extra.join(', ')}`);
  }
  const missing = expected.filter((key) => !fields.has(key));
  if (missing.length > 0) {
    throw new MalformedToolPayloadError(`missing field(s): ${missing.join(', ')}`);
  }
}

function requireString(fields: ReadonlyMap<string, unknown>, key: string): string {
  const value = fields.get(key);
  if (typeof value !== 'string') {
    throw new MalformedToolPayloadError(`field '${key}' must be a string`);
  }
  return value;
}
