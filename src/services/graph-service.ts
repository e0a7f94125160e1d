import { DEFAULT_MAX_STEPS } from '../constants';
import { CompiledGraph } from '../graph';
import type { WorkflowState } from '../schema/state-schema';
import type {
  Workflow,
  WorkflowDependencies,
  WorkflowProfile,
} from '../workflows/base-workflow';
import { WorkflowRegistry } from '../workflows/registry';

export type CompiledWorkflow = {
  workflow: Workflow;
  graph: CompiledGraph<WorkflowState>;
};

export type GraphServiceOptions = {
  /** Maximum node executions per turn */
  maxSteps?: number;
};

/**
 * Turns registered workflow names into runnable graphs and fresh states.
 * Nothing is cached; compiling is cheap next to a model call.
 */
export class GraphService {
  private readonly maxSteps: number;

  constructor(
    private readonly registry: WorkflowRegistry,
    private readonly dependencies: WorkflowDependencies,
    options: GraphServiceOptions = {}
  ) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  /**
   * Instantiate the named workflow and compile its graph
   */
  compile(workflowName: string): CompiledWorkflow {
    const workflow = this.registry.create(workflowName, this.dependencies);
    const graph = workflow.createGraph().compile({ maxSteps: this.maxSteps });
    return { workflow, graph };
  }

  /**
   * Default state of the named workflow, stamped with its name
   */
  createNewState(workflowName: string): WorkflowState {
    const workflow = this.registry.create(workflowName, this.dependencies);
    return { ...workflow.createDefaultState(), chat_profile: workflowName };
  }

  listProfiles(defaultName?: string): WorkflowProfile[] {
    return this.registry.listProfiles(defaultName);
  }
}
