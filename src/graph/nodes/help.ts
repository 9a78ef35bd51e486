import { guidanceService } from '../../services/guidance.service';
import { FormGraphState } from '../state';
import { activeField, say } from '../transitions';

export function helpNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);
  return { messages: [...state.messages, say(guidanceService.composeHelp(field.name))] };
}
