/**
 * Chat Service
 *
 * Front door for question answering: validates the request, dispatches
 * to the workflow for the requested mode and keeps a bounded, in-memory
 * chat history. Workflows are built once from shared capability handles.
 *
 * @module @docqa/engine/service/chat-service
 */

import {
  ConfigurationError,
  ValidationError,
  createContext,
  getLogger,
  runWithContext,
  type Capabilities,
  type Logger,
} from '@docqa/core';
import type { FinalState } from '../state/workflow-state.js';
import { createWorkflow } from '../workflows/factory.js';
import {
  WORKFLOW_MODES,
  isWorkflowMode,
  type Workflow,
  type WorkflowMode,
  type WorkflowOptions,
} from '../workflows/types.js';

export interface ChatServiceOptions extends WorkflowOptions {
  /**
   * Maximum history entries kept (oldest dropped first)
   * @default 50
   */
  historyLimit?: number;
}

export interface ChatHistoryEntry {
  role: 'user' | 'assistant';
  content: string;
  mode: WorkflowMode;
  timestamp: Date;
}

export class ChatService {
  private readonly workflows = new Map<WorkflowMode, Workflow>();
  private readonly history: ChatHistoryEntry[] = [];
  private readonly historyLimit: number;
  private readonly logger: Logger;

  constructor(capabilities: Capabilities, options: ChatServiceOptions = {}) {
    this.historyLimit = options.historyLimit ?? 50;
    this.logger = options.logger ?? getLogger();

    for (const mode of WORKFLOW_MODES) {
      if (mode === 'search' && !capabilities.webSearcher) {
        this.logger.notice('Search mode disabled: no web searcher configured');
        continue;
      }
      this.workflows.set(mode, createWorkflow(mode, capabilities, options));
    }
  }

  /**
   * Modes this service can run
   */
  availableModes(): WorkflowMode[] {
    return Array.from(this.workflows.keys());
  }

  /**
   * Answer a message with the workflow for `mode`
   *
   * @throws {ValidationError} for an empty message or unknown mode
   * @throws {ConfigurationError} when the mode is known but not configured
   */
  async chat(message: string, mode: string): Promise<FinalState> {
    const content = message.trim();
    if (!content) {
      throw new ValidationError('Message must not be empty', {
        fieldErrors: { message: 'required' },
      });
    }
    if (!isWorkflowMode(mode)) {
      throw new ValidationError(`Unknown mode: ${mode}`, {
        fieldErrors: { mode: `expected one of ${WORKFLOW_MODES.join(', ')}` },
      });
    }

    const workflow = this.workflows.get(mode);
    if (!workflow) {
      throw new ConfigurationError(`Mode ${mode} is not available`, {
        mode,
        available: this.availableModes(),
      });
    }

    const result = await runWithContext(createContext('service', { mode }), () =>
      workflow.execute(content)
    );

    this.append({ role: 'user', content, mode, timestamp: new Date() });
    this.append({ role: 'assistant', content: result.answer, mode, timestamp: new Date() });

    return result;
  }

  getHistory(): readonly ChatHistoryEntry[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history.length = 0;
  }

  private append(entry: ChatHistoryEntry): void {
    this.history.push(entry);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
