import { formatValue } from '../../services/guidance.service';
import { MESSAGES } from '../../prompts/templates';
import { FormGraphState } from '../state';
import { activeField, say } from '../transitions';

export function proposalNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);
  const value = state.validation?.value ?? null;

  return {
    pendingValue: value,
    confirmationPending: true,
    messages: [...state.messages, say(MESSAGES.CONFIRMATION(field.label, formatValue(value)))],
  };
}
