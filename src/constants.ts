/**
 * Special node ID representing the entry of a graph
 */
export const START = '__start__' as const;

/**
 * Special node ID representing the end of a graph run
 */
export const END = '__end__' as const;

/** Default number of node executions allowed in one run */
export const DEFAULT_MAX_STEPS = 25;

/** Closed set of message tags accepted when reading persisted state */
export const MESSAGE_TYPES = ['system', 'human', 'ai', 'tool'] as const;
