import { SimpleChatWorkflow } from './simple-chat';
import { WorkflowRegistry, workflowRegistry } from './registry';

export * from './base-workflow';
export * from './chat-node';
export * from './chat-settings';
export * from './registry';
export * from './simple-chat';

/** Every workflow shipped with the engine */
export const builtinWorkflows = [SimpleChatWorkflow] as const;

/**
 * Register the built-in workflows. Call once at start-up, before any session begins.
 */
export function registerWorkflows(
  registry: WorkflowRegistry = workflowRegistry
): WorkflowRegistry {
  for (const workflowClass of builtinWorkflows) {
    registry.register(workflowClass);
  }
  return registry;
}
