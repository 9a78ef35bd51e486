import { FieldName, FieldValue, FormFieldSpec } from '../types';
import { ConversationEntry, FORM_COMPLETE } from '../types/graph';
import { FormGraphState } from './state';
import { formSchema } from '../services/schema.service';
import { guidanceService } from '../services/guidance.service';
import { FormAssistantError } from '../core/errors';

export function say(text: string): ConversationEntry {
  return { speaker: 'assistant', text };
}

export function heard(text: string): ConversationEntry {
  return { speaker: 'user', text };
}

export function activeField(state: Pick<FormGraphState, 'currentField'>): FormFieldSpec {
  if (state.currentField === FORM_COMPLETE) {
    throw new FormAssistantError('No field is being elicited on a completed form', 'INVALID_STATE');
  }
  return formSchema.field(state.currentField);
}

/**
 * Stores `value` for `field`, clears the confirmation loop and moves the
 * pointer to the next schema field, or past the end of the form.
 */
export function commitField(
  state: FormGraphState,
  field: FieldName,
  value: FieldValue,
  notice: string
): Partial<FormGraphState> {
  const nextField = formSchema.nextField(field);
  const messages = [...state.messages, say(notice)];

  if (nextField) {
    messages.push(say(guidanceService.composePrompt(nextField)));
  }

  return {
    fieldValues: { ...state.fieldValues, [field]: value },
    completedFields: state.completedFields.includes(field)
      ? state.completedFields
      : [...state.completedFields, field],
    currentField: nextField ?? FORM_COMPLETE,
    pendingValue: null,
    confirmationPending: false,
    extractionAttempts: 0,
    messages,
  };
}
