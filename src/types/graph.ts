import { FieldName, FieldValue, FieldValues } from '.';

export const FORM_COMPLETE = '__complete__';

export type CurrentField = FieldName | typeof FORM_COMPLETE;

export interface ConversationEntry {
  speaker: 'user' | 'assistant';
  text: string;
}

export interface SessionState {
  sessionId: string;
  currentField: CurrentField;
  completedFields: FieldName[];
  fieldValues: FieldValues;
  pendingValue: FieldValue;
  confirmationPending: boolean;
  extractionAttempts: number;
  messages: ConversationEntry[];
  complete: boolean;
  summaryAnnounced: boolean;
  finalOutput: FieldValues | null;
  createdAt: string;
  updatedAt: string;
}

export interface TurnResult {
  session: SessionState;
  /** false when the input was unusable and the session was left untouched */
  accepted: boolean;
  reply: string | null;
  error?: string;
}
