// src/graph/graph.ts
import { StateGraph, END, START } from '@langchain/langgraph';
import { FormStateAnnotation, FormGraphState, toSessionState } from './state';
import { intakeNode } from './nodes/intake';
import { extractorNode } from './nodes/extractor';
import { validatorNode } from './nodes/validator';
import { confirmationNode } from './nodes/confirmation';
import { proposalNode } from './nodes/proposal';
import { guidanceNode } from './nodes/guidance';
import { helpNode } from './nodes/help';
import { skipNode } from './nodes/skip';
import { repromptNode } from './nodes/reprompt';
import { completionNode } from './nodes/completion';
import { heard, say } from './transitions';
import { CaptureResult } from '../types';
import { SessionState, TurnResult } from '../types/graph';
import { MESSAGES } from '../prompts/templates';
import { withTimeout } from '../utils/timeout';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { errorMessage } from '../core/errors';

export function routeAfterExtraction(
  state: Pick<FormGraphState, 'confirmationPending' | 'extraction'>
): 'confirm' | 'validate' | 'help' | 'skip' | 'reprompt' {
  if (state.confirmationPending) return 'confirm';

  const extraction = state.extraction;
  if (!extraction || extraction.confidence < config.extraction.minConfidence) {
    return 'reprompt';
  }

  switch (extraction.intent) {
    case 'provide_value':
      return 'validate';
    case 'request_help':
      return 'help';
    case 'request_skip':
      return 'skip';
    default:
      // confirm/deny with nothing pending is as unusable as "other"
      return 'reprompt';
  }
}

export function routeAfterValidation(state: Pick<FormGraphState, 'validation'>): 'propose' | 'guide' {
  return state.validation?.valid ? 'propose' : 'guide';
}

export function createFormGraph() {
  const workflow = new StateGraph(FormStateAnnotation)
    .addNode('intake', intakeNode)
    .addNode('extract', extractorNode)
    .addNode('validate', validatorNode)
    .addNode('confirm', confirmationNode)
    .addNode('propose', proposalNode)
    .addNode('guide', guidanceNode)
    .addNode('help', helpNode)
    .addNode('skip', skipNode)
    .addNode('reprompt', repromptNode)
    .addNode('check_completion', completionNode);

  workflow.addEdge(START, 'intake');
  workflow.addEdge('intake', 'extract');

  workflow.addConditionalEdges('extract', routeAfterExtraction, {
    confirm: 'confirm',
    validate: 'validate',
    help: 'help',
    skip: 'skip',
    reprompt: 'reprompt',
  });

  workflow.addConditionalEdges('validate', routeAfterValidation, {
    propose: 'propose',
    guide: 'guide',
  });

  // committing transitions re-run the completion check
  workflow.addEdge('confirm', 'check_completion');
  workflow.addEdge('skip', 'check_completion');
  workflow.addEdge('check_completion', END);

  workflow.addEdge('propose', END);
  workflow.addEdge('guide', END);
  workflow.addEdge('help', END);
  workflow.addEdge('reprompt', END);

  return workflow.compile();
}

let compiledGraph: ReturnType<typeof createFormGraph> | null = null;

function getFormGraph(): ReturnType<typeof createFormGraph> {
  if (!compiledGraph) {
    compiledGraph = createFormGraph();
  }
  return compiledGraph;
}

function replyFor(before: SessionState, after: SessionState): string | null {
  const added = after.messages
    .slice(before.messages.length)
    .filter(entry => entry.speaker === 'assistant')
    .map(entry => entry.text);
  return added.length > 0 ? added.join('\n\n') : null;
}

/**
 * Processes one user turn. The incoming session is never mutated; the new
 * session is only produced once the whole turn has run. Failures inside the
 * turn leave the prior state in place with an apology appended.
 */
export async function advance(session: SessionState, userText: string): Promise<TurnResult> {
  const text = userText.trim();

  if (!text) {
    return { session, accepted: false, reply: null };
  }

  if (session.complete) {
    const next: SessionState = {
      ...session,
      messages: [...session.messages, heard(text), say(MESSAGES.ALREADY_COMPLETE)],
      updatedAt: new Date().toISOString(),
    };
    return { session: next, accepted: true, reply: MESSAGES.ALREADY_COMPLETE };
  }

  const startTime = Date.now();

  try {
    const result = await withTimeout(
      getFormGraph().invoke({ ...session, userText: text, extraction: null, validation: null }),
      config.execution.turnTimeout,
      'Turn timeout exceeded'
    );

    const next = toSessionState(result);

    logger.info('Turn processed', {
      sessionId: session.sessionId,
      executionTime: Date.now() - startTime,
      currentField: next.currentField,
      complete: next.complete,
    });

    return { session: next, accepted: true, reply: replyFor(session, next) };
  } catch (error) {
    logger.error('Turn failed', {
      sessionId: session.sessionId,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    const recovered: SessionState = {
      ...session,
      messages: [...session.messages, heard(text), say(MESSAGES.TROUBLE)],
      updatedAt: new Date().toISOString(),
    };
    return { session: recovered, accepted: true, reply: MESSAGES.TROUBLE, error: errorMessage(error) };
  }
}

/**
 * Entry point for the speech-to-text layer. A failed or empty capture leaves
 * the session untouched and hands the error back for display.
 */
export async function advanceWithCapture(session: SessionState, capture: CaptureResult): Promise<TurnResult> {
  if (!capture.success || !capture.text || !capture.text.trim()) {
    const error = capture.error || 'No speech was detected';
    logger.warn('Capture unusable', { sessionId: session.sessionId, error });
    return { session, accepted: false, reply: null, error };
  }
  return advance(session, capture.text);
}
