import nlp from 'compromise';
import { FieldName, FieldValues, FormFieldSpec, ValidationIssue, ValidationOutcome } from '../types';
import { formSchema, EMAIL_PATTERN } from './schema.service';
import { logger } from '../core/logger';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NUMERIC = /^[-+]?\d+(\.\d+)?$/;

function fail(issue: ValidationIssue, extra: Partial<ValidationOutcome> = {}): ValidationOutcome {
  return { valid: false, error: issue, ...extra };
}

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9+#]+/).filter(Boolean);
}

export class ValidationService {
  /**
   * Best-effort conversion of an extracted value to the field's type.
   * Anything that cannot be converted is returned untouched so the
   * constraint checks report it.
   */
  coerce(field: FormFieldSpec, raw: unknown): unknown {
    switch (field.type) {
      case 'int':
        return this.coerceInteger(raw);
      case 'enum':
        return this.coerceEnum(raw, field.constraints.enumValues ?? []);
      case 'string_list':
        return this.coerceList(raw);
      case 'optional_string':
        if (raw === undefined || raw === null) return null;
        if (typeof raw === 'string') return raw.trim() === '' ? null : raw.trim();
        return raw;
      case 'string':
      case 'date':
        return typeof raw === 'string' ? raw.trim() : raw;
    }
  }

  validate(field: FormFieldSpec, candidate: unknown): ValidationOutcome {
    const value = this.coerce(field, candidate);

    switch (field.type) {
      case 'string':
        return this.validateString(field, value);
      case 'optional_string':
        return this.validateOptionalString(field, value);
      case 'int':
        return this.validateInteger(field, value);
      case 'enum':
        return this.validateEnum(field, value);
      case 'date':
        return this.validateDate(value);
      case 'string_list':
        return this.validateList(field, value);
    }
  }

  /**
   * Validates a whole record field by field. Used as a final integrity check
   * before a completed form is handed out.
   */
  validateForm(values: FieldValues): Array<{ field: FieldName; error: ValidationIssue }> {
    const problems: Array<{ field: FieldName; error: ValidationIssue }> = [];

    for (const field of formSchema.fields()) {
      const present = field.name in values;
      if (!present && !field.required) continue;

      const outcome = this.validate(field, values[field.name]);
      if (!outcome.valid && outcome.error) {
        problems.push({ field: field.name, error: outcome.error });
      }
    }

    if (problems.length > 0) {
      logger.warn('Form record failed validation', { fields: problems.map(p => p.field) });
    }
    return problems;
  }

  private coerceInteger(raw: unknown): unknown {
    if (typeof raw !== 'string') return raw;

    const trimmed = raw.trim().replace(/,/g, '');
    if (NUMERIC.test(trimmed)) return Number(trimmed);

    // "thirty", "I'm 42", "about twenty hours"
    const numbers = nlp(trimmed).numbers();
    if (numbers.length !== 1) return raw;

    const digits = numbers.toNumber().text().replace(/[^\d.-]/g, '');
    const parsed = Number(digits);
    return digits === '' || Number.isNaN(parsed) ? raw : parsed;
  }

  private coerceEnum(raw: unknown, options: readonly string[]): unknown {
    if (typeof raw !== 'string') return raw;

    const trimmed = raw.trim();
    const exact = options.find(o => o.toLowerCase() === trimmed.toLowerCase());
    if (exact) return exact;

    const words = tokens(trimmed);
    const mentioned = options.filter(o => words.includes(o.toLowerCase()));
    return mentioned.length === 1 ? mentioned[0] : trimmed;
  }

  private coerceList(raw: unknown): unknown {
    if (typeof raw === 'string') {
      return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
    }
    if (Array.isArray(raw)) {
      return raw.map(item => (typeof item === 'string' ? item.trim() : item));
    }
    return raw;
  }

  private validateString(field: FormFieldSpec, value: unknown): ValidationOutcome {
    const { minLength, maxLength, pattern } = field.constraints;

    if (value === undefined || value === null || value === '') {
      return fail({ code: 'missing', message: 'No value was provided.' });
    }
    if (typeof value !== 'string') {
      return fail({ code: 'type', message: `It must be ${formSchema.describeRules(field.name)}.` });
    }
    if (minLength !== undefined && value.length < minLength) {
      return fail({ code: 'min_length', message: `It must be at least ${minLength} characters long.` });
    }
    if (maxLength !== undefined && value.length > maxLength) {
      return fail({ code: 'max_length', message: `It must be at most ${maxLength} characters long.` });
    }
    if (pattern && !pattern.test(value)) {
      const spoken = this.rewriteSpokenEmail(value);
      return fail(
        { code: 'pattern', message: 'It does not look like a valid email address.' },
        spoken ? { suggestedCorrection: spoken } : {}
      );
    }
    return { valid: true, value };
  }

  private validateOptionalString(field: FormFieldSpec, value: unknown): ValidationOutcome {
    const { maxLength } = field.constraints;

    if (value === null) return { valid: true, value: null };
    if (typeof value !== 'string') {
      return fail({ code: 'type', message: 'It must be free text.' });
    }
    if (maxLength !== undefined && value.length > maxLength) {
      return fail(
        { code: 'max_length', message: `It must be at most ${maxLength} characters long.` },
        { suggestedCorrection: value.slice(0, maxLength) }
      );
    }
    return { valid: true, value };
  }

  private validateInteger(field: FormFieldSpec, value: unknown): ValidationOutcome {
    const { min, max } = field.constraints;

    if (value === undefined || value === null || value === '') {
      return fail({ code: 'missing', message: 'No value was provided.' });
    }
    if (typeof value !== 'number' || Number.isNaN(value)) {
      return fail({ code: 'type', message: `It must be ${formSchema.describeRules(field.name)}.` });
    }
    if (!Number.isInteger(value)) {
      return fail({ code: 'not_integer', message: 'It must be a whole number.' }, { suggestedCorrection: Math.round(value) });
    }
    if (min !== undefined && value < min) {
      return fail({ code: 'min', message: `It must be at least ${min}.` });
    }
    if (max !== undefined && value > max) {
      return fail({ code: 'max', message: `It must be at most ${max}.` });
    }
    return { valid: true, value };
  }

  private validateEnum(field: FormFieldSpec, value: unknown): ValidationOutcome {
    const options = field.constraints.enumValues ?? [];

    if (typeof value === 'string' && options.includes(value)) {
      return { valid: true, value };
    }

    const outcome: Partial<ValidationOutcome> = { validOptions: [...options] };
    if (typeof value === 'string' && value.length >= 2) {
      const lower = value.toLowerCase();
      const close = options.find(o => o.toLowerCase().startsWith(lower) || lower.startsWith(o.toLowerCase()));
      if (close) outcome.suggestedCorrection = close;
    }

    return fail({ code: 'enum', message: `It must be one of: ${options.join(', ')}.` }, outcome);
  }

  private validateDate(value: unknown): ValidationOutcome {
    const issue: ValidationIssue = { code: 'date_format', message: 'It must be a real date in YYYY-MM-DD format.' };

    if (typeof value !== 'string') return fail(issue);

    const match = ISO_DATE.exec(value);
    if (!match) return fail(issue);

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    const exists =
      date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;

    return exists ? { valid: true, value } : fail(issue);
  }

  private validateList(field: FormFieldSpec, value: unknown): ValidationOutcome {
    const { minItems = 1, maxItems = 5, itemMinLength = 2, itemMaxLength = 100 } = field.constraints;
    const constraintHint = `A list of ${minItems}-${maxItems} project interests, each between ${itemMinLength}-${itemMaxLength} characters`;

    if (!Array.isArray(value)) {
      return fail({ code: 'type', message: `It must be ${formSchema.describeRules(field.name)}.` }, { constraintHint });
    }

    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string' || item.length < itemMinLength || item.length > itemMaxLength) {
        return fail(
          { code: 'item_length', message: `Each item must be between ${itemMinLength} and ${itemMaxLength} characters.` },
          { constraintHint }
        );
      }
      items.push(item);
    }

    if (items.length < minItems) {
      return fail(
        { code: 'min_items', message: `Provide at least ${minItems} item${minItems === 1 ? '' : 's'}.` },
        { constraintHint }
      );
    }
    if (items.length > maxItems) {
      return fail(
        { code: 'max_items', message: `Provide at most ${maxItems} items.` },
        { constraintHint, suggestedCorrection: items.slice(0, maxItems) }
      );
    }
    return { valid: true, value: items };
  }

  private rewriteSpokenEmail(value: string): string | null {
    const rewritten = value
      .toLowerCase()
      .replace(/\s+at\s+/g, '@')
      .replace(/\s+dot\s+/g, '.')
      .replace(/\s+/g, '');
    return rewritten !== value && EMAIL_PATTERN.test(rewritten) ? rewritten : null;
  }
}

export const validationService = new ValidationService();
