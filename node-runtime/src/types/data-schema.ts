export type PropertyType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface PropertySchema {
  type: PropertyType;
  description?: string;
  pattern?: string;
  enum?: Array<string | number | boolean>;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  examples?: unknown[];
  items?: PropertySchema;
  minItems?: number;
  maxItems?: number;
  properties?: Record<string, PropertySchema>;
  required?: string[];
}

export interface UserDataSchema {
  $schema?: string;
  title?: string;
  description?: string;
  type: 'object';
  properties: Record<string, PropertySchema>;
  required: string[];
  additionalProperties?: boolean;
}

export interface MissingField {
  fieldId: string;
  description: string;
  type?: PropertyType;
  pattern?: string;
  enum?: Array<string | number | boolean>;
  examples?: unknown[];
}

export interface ExpectedConstraint {
  type?: PropertyType;
  pattern?: string;
  enum?: Array<string | number | boolean>;
  minimum?: number;
  maximum?: number;
}

export interface InvalidField {
  fieldId: string;
  providedValue: unknown;
  expected: ExpectedConstraint;
  reason: string;
}

export interface ValidationResult {
  valid: boolean;
  missingFields: MissingField[];
  invalidFields: InvalidField[];
}
