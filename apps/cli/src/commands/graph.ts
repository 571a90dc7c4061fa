/**
 * docqa graph command
 *
 * Print the compiled graph of a workflow.
 */

import { ConfigurationError, ValidationError, createLogger, type Capabilities } from '@docqa/core';
import { WORKFLOW_MODES, createWorkflow, isWorkflowMode } from '@docqa/engine';

async function unavailable(): Promise<never> {
  throw new ConfigurationError('Capabilities are not available while describing a graph');
}

// Compiling a graph needs capability handles but never calls them
const describeOnly: Capabilities = {
  retriever: { retrieve: unavailable },
  generator: { invoke: unavailable, invokeStructured: unavailable },
  webSearcher: { search: unavailable },
};

export async function graphCommand(mode: string): Promise<void> {
  if (!isWorkflowMode(mode)) {
    throw new ValidationError(`Unknown mode: ${mode}`, {
      fieldErrors: { mode: `expected one of ${WORKFLOW_MODES.join(', ')}` },
    });
  }

  const workflow = createWorkflow(mode, describeOnly, {
    logger: createLogger('docqa-cli', { minSeverity: 'WARNING' }),
  });
  console.log(workflow.describe());
}
