import type { Capabilities } from '@docqa/core';
import { BasicWorkflow } from './basic.js';
import { SuggestionWorkflow } from './suggestion.js';
import { SearchWorkflow } from './search.js';
import type { Workflow, WorkflowMode, WorkflowOptions } from './types.js';

/**
 * Build the workflow for a mode
 *
 * @throws {ConfigurationError} for `search` without a web searcher
 */
export function createWorkflow(
  mode: WorkflowMode,
  capabilities: Capabilities,
  options: WorkflowOptions = {}
): Workflow {
  switch (mode) {
    case 'basic':
      return new BasicWorkflow(capabilities, options);
    case 'suggestion':
      return new SuggestionWorkflow(capabilities, options);
    case 'search':
      return new SearchWorkflow(capabilities, options);
  }
}
