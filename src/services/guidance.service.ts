import { FieldValue, FieldValues, ValidationOutcome } from '../types';
import { FIELD_GUIDANCE } from '../prompts/templates';
import { formSchema } from './schema.service';
import { config } from '../core/config';

export function formatValue(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return '(skipped)';
  if (Array.isArray(value)) return value.join(', ');
  return String(value);
}

const quote = (text: string) => `"${text}"`;

/**
 * Builds the assistant's field-specific wording: retry guidance after a
 * failed validation, help text, next-field prompts and the final summary.
 * Every method falls back to a generic template for names it does not know.
 */
export class GuidanceService {
  compose(fieldName: string, outcome: ValidationOutcome, attemptCount: number): string {
    if (!formSchema.isFieldName(fieldName)) {
      const detail = outcome.error ? ` ${outcome.error.message}` : '';
      return `The provided value for ${fieldName} is invalid.${detail} Please check the requirements and try again.`;
    }

    const { label } = formSchema.field(fieldName);
    const guide = FIELD_GUIDANCE[fieldName];
    const parts = [`I'm having trouble with your ${label}.`];

    if (outcome.error && outcome.error.code !== 'missing') {
      parts.push(outcome.error.message);
    }
    parts.push(guide.explanation);

    if (outcome.suggestedCorrection !== undefined) {
      parts.push(`Did you mean ${quote(formatValue(outcome.suggestedCorrection))}?`);
    }

    if (attemptCount >= config.execution.escalationThreshold) {
      parts.push(`Here are some examples of valid answers: ${guide.examples.map(quote).join(', ')}.`);
      if (outcome.validOptions) {
        parts.push(`Valid options are: ${outcome.validOptions.join(', ')}.`);
      }
      if (outcome.constraintHint) {
        parts.push(`${outcome.constraintHint}.`);
      }
    }

    parts.push('Could you please try again?');
    return parts.join(' ');
  }

  composeHelp(fieldName: string): string {
    if (!formSchema.isFieldName(fieldName)) {
      return "I need the information for the current question. Could you please provide that, or say 'skip' if it's optional?";
    }
    return FIELD_GUIDANCE[fieldName].help;
  }

  composePrompt(fieldName: string): string {
    if (!formSchema.isFieldName(fieldName)) {
      return `Now, please tell me your ${fieldName.replace(/_/g, ' ')}.`;
    }
    return FIELD_GUIDANCE[fieldName].prompt;
  }

  composeSummary(values: FieldValues): string {
    return formSchema
      .fields()
      .filter(field => values[field.name] !== undefined && values[field.name] !== null)
      .map(field => `- ${field.label}: ${formatValue(values[field.name])}`)
      .join('\n');
  }
}

export const guidanceService = new GuidanceService();
