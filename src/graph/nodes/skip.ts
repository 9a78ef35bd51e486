import { MESSAGES } from '../../prompts/templates';
import { logger } from '../../core/logger';
import { FormGraphState } from '../state';
import { activeField, commitField, say } from '../transitions';

export function skipNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);

  if (field.required) {
    return { messages: [...state.messages, say(MESSAGES.CANNOT_SKIP(field.label))] };
  }

  logger.info('Optional field skipped', { sessionId: state.sessionId, field: field.name });
  return commitField(state, field.name, null, MESSAGES.SKIPPED(field.label));
}
