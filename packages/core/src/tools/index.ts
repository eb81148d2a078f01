import { captureContact } from './contact-capture';
import { escalateToHuman } from './escalation';
import type { ToolName, ToolRegistry } from './types';

export { ToolDispatcher, type ToolCallStatus, type ToolDispatcherOptions } from './dispatcher';
export { captureContact, normalizePhone } from './contact-capture';
export { escalateToHuman } from './escalation';
export { TOOL_NAMES, isToolName } from './types';
export type {
  DispatchContext,
  DispatchedEffect,
  DispatchRound,
  ExtractedContact,
  ToolEffect,
  ToolHandler,
  ToolInvocation,
  ToolName,
  ToolOutcome,
  ToolRegistry,
  ToolRoundFailure,
} from './types';

const BUILT_IN_TOOLS: Record<ToolName, NonNullable<ToolRegistry[ToolName]>> = {
  contact_capture: captureContact,
  escalate_to_human: escalateToHuman,
};

/** Registry containing the built-in handlers for the given tool names. */
export function createBuiltInRegistry(enabled: Iterable<ToolName>): ToolRegistry {
  const registry: ToolRegistry = {};
  for (const name of enabled) {
    registry[name] = BUILT_IN_TOOLS[name];
  }
  return registry;
}
