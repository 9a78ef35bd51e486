import { FieldValues } from '../../types';
import { FORM_COMPLETE } from '../../types/graph';
import { formSchema } from '../../services/schema.service';
import { guidanceService } from '../../services/guidance.service';
import { validationService } from '../../services/validation.service';
import { MESSAGES } from '../../prompts/templates';
import { logger } from '../../core/logger';
import { FormGraphState } from '../state';
import { say } from '../transitions';

type CompletionInput = Pick<
  FormGraphState,
  'sessionId' | 'currentField' | 'completedFields' | 'fieldValues' | 'messages' | 'summaryAnnounced'
>;

export function collectFinalOutput(values: FieldValues): FieldValues {
  const output: FieldValues = {};
  for (const field of formSchema.fields()) {
    const value = values[field.name];
    if (value !== undefined && value !== null) {
      output[field.name] = value;
    }
  }
  return output;
}

/**
 * The form is complete once the pointer has walked past the last field and
 * every required field has been accepted. A record that fails the final
 * check sends the pointer back to the first failing field. The summary is
 * announced once.
 */
export function completionNode(state: CompletionInput): Partial<FormGraphState> {
  if (state.currentField !== FORM_COMPLETE) return {};

  const missing = formSchema.requiredFields().find(name => !state.completedFields.includes(name));
  if (missing) {
    logger.warn('Reached the end of the form with a required field open', { field: missing });
    return {
      currentField: missing,
      messages: [...state.messages, say(guidanceService.composePrompt(missing))],
    };
  }

  if (state.summaryAnnounced) return { complete: true };

  const finalOutput = collectFinalOutput(state.fieldValues);

  const [problem] = validationService.validateForm(finalOutput);
  if (problem) {
    logger.warn('Stored value failed the final check, asking again', {
      sessionId: state.sessionId,
      field: problem.field,
      code: problem.error.code,
    });
    const { [problem.field]: _discarded, ...fieldValues } = state.fieldValues;
    return {
      currentField: problem.field,
      completedFields: state.completedFields.filter(name => name !== problem.field),
      fieldValues,
      messages: [...state.messages, say(guidanceService.composePrompt(problem.field))],
    };
  }

  logger.info('Form completed', { sessionId: state.sessionId, fields: Object.keys(finalOutput).length });

  return {
    complete: true,
    finalOutput,
    summaryAnnounced: true,
    messages: [...state.messages, say(MESSAGES.COMPLETION(guidanceService.composeSummary(finalOutput)))],
  };
}
