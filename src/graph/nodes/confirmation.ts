import { validationService } from '../../services/validation.service';
import { formatValue } from '../../services/guidance.service';
import { MESSAGES } from '../../prompts/templates';
import { logger } from '../../core/logger';
import { config } from '../../core/config';
import { FormGraphState } from '../state';
import { activeField, commitField, say } from '../transitions';

/**
 * Handles the reply to "Is that correct?". Only a confirmation at or above
 * the minimum confidence commits; every other reply re-asks the same field.
 */
export function confirmationNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);
  const intent = state.extraction?.intent ?? 'other';
  const confidence = state.extraction?.confidence ?? 0;

  if (intent === 'confirm' && confidence >= config.extraction.minConfidence) {
    const outcome = validationService.validate(field, state.pendingValue);

    if (outcome.valid && outcome.value !== undefined) {
      logger.info('Field confirmed', { sessionId: state.sessionId, field: field.name });
      return commitField(state, field.name, outcome.value, MESSAGES.SAVED(field.label, formatValue(outcome.value)));
    }

    logger.warn('Pending value failed re-validation, asking again', {
      field: field.name,
      code: outcome.error?.code,
    });
  } else if (intent !== 'deny') {
    logger.info('Unclear reply to confirmation treated as a denial', { field: field.name, intent, confidence });
  }

  return {
    pendingValue: null,
    confirmationPending: false,
    extractionAttempts: 0,
    messages: [...state.messages, say(MESSAGES.RETRY(field.label))],
  };
}
