import { ExtractedIntent, FieldValue, FormFieldSpec, INTENTS, IntentType } from '../types';
import { ConversationEntry } from '../types/graph';
import { llmService, LLMMessage } from './llm.service';
import { formSchema } from './schema.service';
import { formatValue } from './guidance.service';
import { SYSTEM_PROMPTS } from '../prompts/system-prompts';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { errorMessage } from '../core/errors';

export interface ExtractionContext {
  confirmationPending: boolean;
  pendingValue: FieldValue;
}

const AFFIRMATIVE = ['yes', 'correct', 'right', 'sure', 'yeah', 'yep', 'yup'];
const NEGATIVE = ['no', 'not', 'nope', 'nah', 'wrong', 'incorrect'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIntent(value: unknown): value is IntentType {
  return INTENTS.some(intent => intent === value);
}

export function fallbackIntent(reasoning: string): ExtractedIntent {
  return { intent: 'other', confidence: 0, reasoning };
}

/**
 * Deterministic yes/no reading of a reply to a confirmation prompt.
 * A negation anywhere wins over an affirmative word ("no, that's not right").
 */
export function classifyConfirmation(userText: string): ExtractedIntent {
  const words = userText.toLowerCase().split(/[^a-z]+/).filter(Boolean);

  if (words.some(w => NEGATIVE.includes(w))) {
    return { intent: 'deny', confidence: 1, reasoning: 'Negation detected in confirmation reply' };
  }
  if (words.some(w => AFFIRMATIVE.includes(w))) {
    return { intent: 'confirm', confidence: 1, reasoning: 'Direct confirmation detection' };
  }
  return { intent: 'deny', confidence: 1, reasoning: 'No affirmative word in confirmation reply' };
}

/**
 * Checks a backend answer against `{ intent, extracted_value, confidence, reasoning }`.
 * Returns null when the shape does not match.
 */
export function parseExtraction(raw: unknown): ExtractedIntent | null {
  if (!isRecord(raw)) return null;

  const { intent, confidence } = raw;
  if (!isIntent(intent)) return null;
  if (typeof confidence !== 'number' || Number.isNaN(confidence)) return null;

  const reasoning =
    typeof raw.reasoning === 'string' ? raw.reasoning : typeof raw.reason === 'string' ? raw.reason : '';
  const bounded = Math.min(1, Math.max(0, confidence));

  if (intent === 'provide_value') {
    return { intent, value: raw.extracted_value ?? null, confidence: bounded, reasoning };
  }
  return { intent, confidence: bounded, reasoning };
}

export class ExtractionService {
  /**
   * Turns one user utterance into an intent for `field`. Never throws:
   * backend errors, timeouts and malformed answers come back as `other`
   * with zero confidence.
   */
  async extract(
    userText: string,
    field: FormFieldSpec,
    history: ConversationEntry[],
    context: ExtractionContext
  ): Promise<ExtractedIntent> {
    if (context.confirmationPending && config.extraction.lexicalConfirmation) {
      return classifyConfirmation(userText);
    }

    try {
      const raw = await llmService.chatWithJSON(this.buildMessages(userText, field, history, context), {
        timeoutMs: config.extraction.timeout,
      });
      const parsed = parseExtraction(raw);

      if (!parsed) {
        logger.warn('Extraction response did not match the expected shape', { field: field.name });
        return fallbackIntent('Failed to parse LLM result');
      }

      logger.debug('Extraction result', {
        field: field.name,
        intent: parsed.intent,
        confidence: parsed.confidence,
      });
      return parsed;
    } catch (error) {
      logger.warn('Extraction failed', { field: field.name, error: errorMessage(error) });
      return fallbackIntent(`Error occurred during extraction: ${errorMessage(error)}`);
    }
  }

  private buildMessages(
    userText: string,
    field: FormFieldSpec,
    history: ConversationEntry[],
    context: ExtractionContext
  ): LLMMessage[] {
    const system = SYSTEM_PROMPTS.EXTRACTION({
      fieldName: field.name,
      fieldDescription: field.description,
      validationRules: formSchema.describeRules(field.name),
      pendingValue: context.confirmationPending ? formatValue(context.pendingValue) : undefined,
    });

    return [
      { role: 'system', content: system },
      ...history.slice(-config.extraction.historyWindow).map(
        (entry): LLMMessage => ({
          role: entry.speaker === 'user' ? 'user' : 'assistant',
          content: entry.text,
        })
      ),
      { role: 'user', content: userText },
    ];
  }
}

export const extractionService = new ExtractionService();
