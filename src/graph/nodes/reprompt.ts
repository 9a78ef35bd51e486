import { MESSAGES } from '../../prompts/templates';
import { FormGraphState } from '../state';
import { say } from '../transitions';

export function repromptNode(state: FormGraphState): Partial<FormGraphState> {
  return { messages: [...state.messages, say(MESSAGES.NOT_UNDERSTOOD)] };
}
