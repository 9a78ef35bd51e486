// src/services/schema.service.ts
import { FIELD_NAMES, FieldName, FormFieldSpec } from '../types';
import { ConfigurationError } from '../core/errors';
import { logger } from '../core/logger';

export const EMAIL_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

export const EXPERIENCE_LEVELS = ['Beginner', 'Intermediate', 'Advanced', 'Expert'] as const;

export const PROGRAMMING_LANGUAGES = ['Python', 'JavaScript', 'Java', 'C++', 'Go', 'Rust', 'Other'] as const;

const FORM_FIELDS: FormFieldSpec[] = [
  {
    name: 'full_name',
    type: 'string',
    label: 'full name',
    description: "User's full name",
    order: 0,
    required: true,
    constraints: { minLength: 2, maxLength: 100 },
  },
  {
    name: 'email',
    type: 'string',
    label: 'email address',
    description: "User's email address",
    order: 1,
    required: true,
    constraints: { pattern: EMAIL_PATTERN },
  },
  {
    name: 'age',
    type: 'int',
    label: 'age',
    description: "User's age in years",
    order: 2,
    required: true,
    constraints: { min: 18, max: 120 },
  },
  {
    name: 'occupation',
    type: 'string',
    label: 'occupation',
    description: "User's current job or profession",
    order: 3,
    required: true,
    constraints: { minLength: 2, maxLength: 100 },
  },
  {
    name: 'experience_level',
    type: 'enum',
    label: 'experience level',
    description: "User's experience level in their field",
    order: 4,
    required: true,
    constraints: { enumValues: EXPERIENCE_LEVELS },
  },
  {
    name: 'preferred_language',
    type: 'enum',
    label: 'preferred programming language',
    description: "User's preferred programming language",
    order: 5,
    required: true,
    constraints: { enumValues: PROGRAMMING_LANGUAGES },
  },
  {
    name: 'project_interests',
    type: 'string_list',
    label: 'project interests',
    description: 'List of project interests or goals',
    order: 6,
    required: true,
    constraints: { minItems: 1, maxItems: 5, itemMinLength: 2, itemMaxLength: 100 },
  },
  {
    name: 'availability_per_week',
    type: 'int',
    label: 'weekly availability',
    description: 'Hours available per week for the project',
    order: 7,
    required: true,
    constraints: { min: 1, max: 168 },
  },
  {
    name: 'start_date',
    type: 'date',
    label: 'start date',
    description: 'Preferred project start date',
    order: 8,
    required: true,
    constraints: {},
  },
  {
    name: 'additional_notes',
    type: 'optional_string',
    label: 'additional notes',
    description: 'Any additional information or special requirements',
    order: 9,
    required: false,
    constraints: { maxLength: 500 },
  },
];

export class FormSchema {
  private readonly ordered: readonly FormFieldSpec[];
  private readonly byName: Map<FieldName, FormFieldSpec> = new Map();

  constructor(fields: FormFieldSpec[]) {
    if (fields.length === 0) {
      throw new ConfigurationError('Form schema must declare at least one field');
    }

    fields.forEach((field, index) => {
      if (this.byName.has(field.name)) {
        throw new ConfigurationError(`Duplicate field name in form schema: ${field.name}`);
      }
      if (index > 0 && field.order <= fields[index - 1].order) {
        throw new ConfigurationError(`Field order must be strictly increasing at ${field.name}`, {
          previous: fields[index - 1].order,
          current: field.order,
        });
      }
      this.byName.set(field.name, field);
    });

    this.ordered = [...fields];
    logger.debug(`Form schema initialized with ${fields.length} fields`);
  }

  fields(): readonly FormFieldSpec[] {
    return this.ordered;
  }

  fieldAt(index: number): FormFieldSpec | null {
    return this.ordered[index] ?? null;
  }

  field(name: FieldName): FormFieldSpec {
    const spec = this.byName.get(name);
    if (!spec) {
      throw new ConfigurationError(`Unknown form field: ${name}`);
    }
    return spec;
  }

  firstField(): FormFieldSpec {
    return this.ordered[0];
  }

  nextField(name: FieldName): FieldName | null {
    const index = this.ordered.findIndex(f => f.name === name);
    if (index === -1 || index === this.ordered.length - 1) return null;
    return this.ordered[index + 1].name;
  }

  isRequired(name: FieldName): boolean {
    return this.byName.get(name)?.required ?? false;
  }

  requiredFields(): FieldName[] {
    return this.ordered.filter(f => f.required).map(f => f.name);
  }

  isFieldName(value: unknown): value is FieldName {
    return FIELD_NAMES.some(name => name === value && this.byName.has(name));
  }

  /**
   * Plain-language summary of a field's constraints, shared by the extraction
   * prompt and the guidance messages.
   */
  describeRules(name: FieldName): string {
    const { type, constraints: c } = this.field(name);

    switch (type) {
      case 'int':
        return `a whole number between ${c.min} and ${c.max}`;
      case 'enum':
        return `one of: ${(c.enumValues ?? []).join(', ')}`;
      case 'date':
        return 'a calendar date in YYYY-MM-DD format';
      case 'string_list':
        return `a list of ${c.minItems} to ${c.maxItems} items, each between ${c.itemMinLength} and ${c.itemMaxLength} characters`;
      case 'optional_string':
        return `optional free text of at most ${c.maxLength} characters`;
      case 'string':
        if (c.pattern) return 'a valid email address such as name@example.com';
        return `text between ${c.minLength} and ${c.maxLength} characters`;
    }
  }
}

export const formSchema = new FormSchema(FORM_FIELDS);

// Guard against the field list and FIELD_NAMES drifting apart.
if (formSchema.fields().length !== FIELD_NAMES.length) {
  throw new ConfigurationError('Form schema does not cover every declared field name');
}
