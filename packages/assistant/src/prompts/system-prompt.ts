import type { ExecutionResult, SearchCall, ShellCall } from '../types/index.js';
import type { SystemInfo } from './system-info.js';

const TOOL_CONTRACT = `You are Tuxmate, a desktop assistant for Linux users.

Reply in the language the user writes in.

For normal conversation, answer with plain text.
To act on the system, reply with exactly one JSON object and nothing else:
- Run a command: {"tool": "shell", "command": "<command>", "explanation": "<why>"}
- Search the web: {"tool": "search", "query": "<terms>"}

Rules:
- Never wrap the JSON in markdown or code fences.
- Never mix JSON with other text.
- "tool" is either "shell" or "search"; no other fields are allowed.
- Prefer read-only commands. Commands that need root use sudo; the user is asked before they run.`;

/** Base instructions followed by an environment block. */
export function buildSystemPrompt(info: SystemInfo, model: string): string {
  return [TOOL_CONTRACT, buildEnvironmentContext(info, model)].join('\n\n');
}

function buildEnvironmentContext(info: SystemInfo, model: string): string {
  const lines = ['<environment>', `Platform: ${info.platform}`, `Kernel: ${info.osVersion}`];

  if (info.distribution) {
    lines.push(`Distribution: ${info.distribution}`);
  }
  if (info.desktop) {
    lines.push(`Desktop: ${info.desktop}`);
  }
  if (info.shell) {
    lines.push(`Shell: ${info.shell}`);
  }

  lines.push(`Today's date: ${info.date}`, `Model: ${model}`, '</environment>');
  return lines.join('\n');
}

/** The instruction sent after a tool turn to get a user-facing answer. */
export function buildSummaryInstruction(call: ShellCall | SearchCall, result: ExecutionResult): string {
  if (call.tool === 'search') {
    return `Answer my question "${call.query}" from the search results above. Be concise and mention the most relevant links.`;
  }
  const status = result.timedOut ? 'was stopped after timing out' : `finished with exit code ${result.exitCode}`;
  return `The command \`${call.command}\` ${status}. Summarize its output above for me in a friendly, concise way. Do not reply with another tool call.`;
}
