import { Annotation } from '@langchain/langgraph';
import { Types } from 'mongoose';
import { ExtractedIntent, FieldName, FieldValue, FieldValues, ValidationOutcome } from '../types';
import { ConversationEntry, CurrentField, SessionState } from '../types/graph';
import { formSchema } from '../services/schema.service';
import { guidanceService } from '../services/guidance.service';
import { MESSAGES } from '../prompts/templates';

export const FormStateAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  currentField: Annotation<CurrentField>,
  completedFields: Annotation<FieldName[]>,
  fieldValues: Annotation<FieldValues>,
  pendingValue: Annotation<FieldValue>,
  confirmationPending: Annotation<boolean>,
  extractionAttempts: Annotation<number>,
  messages: Annotation<ConversationEntry[]>,
  complete: Annotation<boolean>,
  summaryAnnounced: Annotation<boolean>,
  finalOutput: Annotation<FieldValues | null>,
  createdAt: Annotation<string>,
  updatedAt: Annotation<string>,

  // Turn-scoped, dropped when the turn is folded back into a SessionState
  userText: Annotation<string>,
  extraction: Annotation<ExtractedIntent | null>,
  validation: Annotation<ValidationOutcome | null>,
});

export type FormGraphState = typeof FormStateAnnotation.State;

export function createSession(sessionId: string = new Types.ObjectId().toHexString()): SessionState {
  const first = formSchema.firstField();
  const now = new Date().toISOString();

  return {
    sessionId,
    currentField: first.name,
    completedFields: [],
    fieldValues: {},
    pendingValue: null,
    confirmationPending: false,
    extractionAttempts: 0,
    messages: [{ speaker: 'assistant', text: MESSAGES.GREETING(guidanceService.composePrompt(first.name)) }],
    complete: false,
    summaryAnnounced: false,
    finalOutput: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function toSessionState(state: FormGraphState): SessionState {
  return {
    sessionId: state.sessionId,
    currentField: state.currentField,
    completedFields: state.completedFields,
    fieldValues: state.fieldValues,
    pendingValue: state.pendingValue,
    confirmationPending: state.confirmationPending,
    extractionAttempts: state.extractionAttempts,
    messages: state.messages,
    complete: state.complete,
    summaryAnnounced: state.summaryAnnounced,
    finalOutput: state.finalOutput,
    createdAt: state.createdAt,
    updatedAt: new Date().toISOString(),
  };
}
