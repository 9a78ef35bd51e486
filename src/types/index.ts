export const FIELD_NAMES = [
  'full_name',
  'email',
  'age',
  'occupation',
  'experience_level',
  'preferred_language',
  'project_interests',
  'availability_per_week',
  'start_date',
  'additional_notes',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type FieldType = 'string' | 'int' | 'enum' | 'date' | 'string_list' | 'optional_string';

export interface FieldConstraints {
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  enumValues?: readonly string[];
  minItems?: number;
  maxItems?: number;
  itemMinLength?: number;
  itemMaxLength?: number;
  pattern?: RegExp;
}

export interface FormFieldSpec {
  name: FieldName;
  type: FieldType;
  label: string;
  description: string;
  order: number;
  required: boolean;
  constraints: FieldConstraints;
}

/** A value accepted into the form. `null` marks a skipped optional field. */
export type FieldValue = string | number | string[] | null;

export type FieldValues = Partial<Record<FieldName, FieldValue>>;

export const INTENTS = [
  'provide_value',
  'confirm',
  'deny',
  'request_help',
  'request_skip',
  'other',
] as const;

export type IntentType = (typeof INTENTS)[number];

interface IntentMeta {
  confidence: number;
  reasoning: string;
}

export type ExtractedIntent =
  | (IntentMeta & { intent: 'provide_value'; value: unknown })
  | (IntentMeta & { intent: Exclude<IntentType, 'provide_value'> });

export type ValidationErrorCode =
  | 'missing'
  | 'type'
  | 'min_length'
  | 'max_length'
  | 'min'
  | 'max'
  | 'not_integer'
  | 'pattern'
  | 'enum'
  | 'date_format'
  | 'min_items'
  | 'max_items'
  | 'item_length';

export interface ValidationIssue {
  code: ValidationErrorCode;
  message: string;
}

export interface ValidationOutcome {
  valid: boolean;
  value?: FieldValue;
  error?: ValidationIssue;
  suggestedCorrection?: FieldValue;
  validOptions?: readonly string[];
  constraintHint?: string;
}

/** Result handed over by an external speech-to-text layer. */
export interface CaptureResult {
  success: boolean;
  text?: string;
  error?: string;
}
