/**
 * Shared request-body schema types used by the validate-body middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  enum?: readonly string[];
  min?: number;
  max?: number;
  integer?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;
