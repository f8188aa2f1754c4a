export { buildSummaryInstruction, buildSystemPrompt } from './system-prompt.js';
export { getSystemInfo, parseOsRelease, type SystemInfo } from './system-info.js';
