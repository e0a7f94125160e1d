/**
 * Catalog of workflow classes keyed by their profile name
 */

import { UnregisteredWorkflowError } from '../errors';
import { defaultLogger, Logger } from '../logger';
import type {
  Workflow,
  WorkflowConstructor,
  WorkflowDependencies,
  WorkflowProfile,
} from './base-workflow';

export type WorkflowDescriptor = {
  name: string;
  workflowClass: WorkflowConstructor;
};

export class WorkflowRegistry {
  private readonly items = new Map<string, WorkflowDescriptor>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Register a workflow class under its profile name.
   * Registering a name twice replaces the earlier class.
   */
  register(workflowClass: WorkflowConstructor): void {
    const name = workflowClass.profile.name;
    const previous = this.items.get(name);
    if (previous && previous.workflowClass !== workflowClass) {
      this.logger.warn(`[registry] workflow '${name}' re-registered; replacing previous class`);
    }
    this.items.set(name, { name, workflowClass });
    this.logger.debug(`[registry] registered workflow '${name}'`);
  }

  has(name: string): boolean {
    return this.items.has(name);
  }

  /**
   * Instantiate the workflow registered under `name`
   */
  create(name: string, dependencies: WorkflowDependencies): Workflow {
    const descriptor = this.items.get(name);
    if (!descriptor) {
      throw new UnregisteredWorkflowError(name);
    }
    return new descriptor.workflowClass(dependencies);
  }

  listNames(): string[] {
    return [...this.items.keys()];
  }

  listDescriptors(): WorkflowDescriptor[] {
    return [...this.items.values()];
  }

  /**
   * Profiles for the client's selection menu. When `defaultName` names a
   * registered workflow, it is the only one flagged as default.
   */
  listProfiles(defaultName?: string): WorkflowProfile[] {
    const overrideDefault = defaultName !== undefined && this.items.has(defaultName);
    return this.listDescriptors().map(({ name, workflowClass }) => ({
      ...workflowClass.profile,
      default: overrideDefault
        ? name === defaultName
        : workflowClass.profile.default ?? false,
    }));
  }

  clear(): void {
    this.items.clear();
  }
}

/** Process-wide registry, populated once at start-up by {@link registerWorkflows} */
export const workflowRegistry = new WorkflowRegistry();
