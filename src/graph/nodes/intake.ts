import { FormGraphState } from '../state';
import { heard } from '../transitions';

export function intakeNode(state: FormGraphState): Partial<FormGraphState> {
  return {
    messages: [...state.messages, heard(state.userText)],
    extraction: null,
    validation: null,
  };
}
