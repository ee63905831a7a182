export { getTools, getToolSpec, getToolSpecs, isToolExposed, toolModeFromEnv, TOOL_SPECS, TOOL_MODE_ENV } from './registry.js';
export type { ToolExposure, ToolExposureMode, ToolSpec } from './registry.js';
export { handleToolCall } from './dispatcher.js';
export type { ToolCallResponse } from './dispatcher.js';
