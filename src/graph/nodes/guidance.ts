import { guidanceService } from '../../services/guidance.service';
import { logger } from '../../core/logger';
import { FormGraphState } from '../state';
import { activeField, say } from '../transitions';

export function guidanceNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);
  const attempts = state.extractionAttempts + 1;
  const outcome = state.validation ?? {
    valid: false,
    error: { code: 'missing' as const, message: 'No value was provided.' },
  };

  logger.info('Validation failed', {
    sessionId: state.sessionId,
    field: field.name,
    code: outcome.error?.code,
    attempts,
  });

  return {
    extractionAttempts: attempts,
    messages: [...state.messages, say(guidanceService.compose(field.name, outcome, attempts))],
  };
}
