// src/models/FormSession.ts
import mongoose, { Schema, Document } from 'mongoose';
import { FIELD_NAMES } from '../types';
import { FORM_COMPLETE, SessionState } from '../types/graph';

export interface IFormSession extends Document, SessionState {}

const ConversationEntrySchema = new Schema(
  {
    speaker: { type: String, enum: ['user', 'assistant'], required: true },
    text: { type: String, required: true },
  },
  { _id: false }
);

const FormSessionSchema = new Schema<IFormSession>(
  {
    sessionId: { type: String, required: true, unique: true },
    currentField: { type: String, enum: [...FIELD_NAMES, FORM_COMPLETE], required: true },
    completedFields: { type: [String], default: [] },
    fieldValues: { type: Schema.Types.Mixed, default: () => ({}) },
    pendingValue: { type: Schema.Types.Mixed, default: null },
    confirmationPending: { type: Boolean, default: false },
    extractionAttempts: { type: Number, default: 0 },
    messages: { type: [ConversationEntrySchema], default: [] },
    complete: { type: Boolean, default: false, index: true },
    summaryAnnounced: { type: Boolean, default: false },
    finalOutput: { type: Schema.Types.Mixed, default: null },
    createdAt: { type: String, required: true },
    updatedAt: { type: String, required: true },
  },
  {
    collection: 'form_sessions',
    minimize: false,
  }
);

FormSessionSchema.index({ updatedAt: -1 });

export const FormSession = mongoose.model<IFormSession>('FormSession', FormSessionSchema);
