// Type Descriptor Validation
//
// Validates descriptors supplied by hand-written or generated bindings
// before they reach a registry. Structural checks use zod; the semantic
// checks (duplicates, reserved names, identity overlap) run afterwards.

import { z } from 'zod';
import type { FieldKind, TypeDescriptor } from '../types/descriptors.js';

/**
 * A validation error (the descriptor cannot be registered)
 */
export type DescriptorValidationError = {
  path: string;
  message: string;
  code: DescriptorValidationErrorCode;
};

export type DescriptorValidationErrorCode =
  | 'INVALID_SHAPE'
  | 'DUPLICATE_FIELD'
  | 'DUPLICATE_KEY'
  | 'IDENTITY_CONFLICT'
  | 'RESERVED_NAME';

export type DescriptorValidationResult = {
  valid: boolean;
  errors: DescriptorValidationError[];

  /**
   * The parsed descriptor, present only when valid
   */
  descriptor?: TypeDescriptor;
};

const RESERVED_NAMES = new Set(['__proto__', 'constructor', 'prototype']);

const scalarFieldTypeSchema = z.enum([
  'string',
  'number',
  'integer',
  'boolean',
  'bytes',
  'timestamp',
  'uuid',
]);

export const fieldKindSchema: z.ZodType<FieldKind> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('scalar'), scalar: scalarFieldTypeSchema }),
    z.object({ type: z.literal('entity'), entity: z.string().min(1) }),
    z.object({ type: z.literal('list'), items: fieldKindSchema }),
    z.object({ type: z.literal('record'), values: fieldKindSchema }),
  ])
);

export const fieldDescriptorSchema = z.object({
  name: z.string().min(1),
  key: z.string().min(1),
  kind: fieldKindSchema,
  optional: z.boolean(),
});

export const identityDescriptorSchema = z.object({
  field: z.string().min(1),
  codec: z.enum(['uuid', 'string', 'integer']),
});

export const typeDescriptorSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('entity'),
    typeId: z.string().min(1),
    collection: z.array(z.string().min(1)).min(1),
    identity: identityDescriptorSchema,
    fields: z.array(fieldDescriptorSchema),
  }),
  z.object({
    kind: z.literal('embeddable'),
    typeId: z.string().min(1),
    fields: z.array(fieldDescriptorSchema),
  }),
]);

/**
 * Validate a type descriptor.
 *
 * @param input - Descriptor candidate, typically from a binding or a JSON file
 * @returns The parsed descriptor when valid, otherwise every error found
 */
export function validateTypeDescriptor(input: unknown): DescriptorValidationResult {
  const parsed = typeDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => ({
        path: ['descriptor', ...issue.path].join('.'),
        message: issue.message,
        code: 'INVALID_SHAPE' as const,
      })),
    };
  }

  const descriptor = parsed.data;
  const errors: DescriptorValidationError[] = [];
  const names = new Set<string>();
  const keys = new Set<string>();

  if (descriptor.kind === 'entity') {
    for (const segment of descriptor.collection) {
      if (RESERVED_NAMES.has(segment)) {
        errors.push({
          path: 'descriptor.collection',
          message: `Collection segment "${segment}" is reserved`,
          code: 'RESERVED_NAME',
        });
      }
    }
  }

  descriptor.fields.forEach((field, i) => {
    const path = `descriptor.fields.${i}`;

    if (RESERVED_NAMES.has(field.name) || RESERVED_NAMES.has(field.key)) {
      errors.push({
        path,
        message: `Field "${field.name}" uses a reserved name or key`,
        code: 'RESERVED_NAME',
      });
    }

    if (names.has(field.name)) {
      errors.push({
        path: `${path}.name`,
        message: `Duplicate field name "${field.name}"`,
        code: 'DUPLICATE_FIELD',
      });
    }
    names.add(field.name);

    if (keys.has(field.key)) {
      errors.push({
        path: `${path}.key`,
        message: `Duplicate document key "${field.key}"`,
        code: 'DUPLICATE_KEY',
      });
    }
    keys.add(field.key);

    if (descriptor.kind === 'entity' && field.name === descriptor.identity.field) {
      errors.push({
        path: `${path}.name`,
        message: `Identity field "${field.name}" cannot also be a data field`,
        code: 'IDENTITY_CONFLICT',
      });
    }

    // Nested entities store their identity under the identity field's name
    if (descriptor.kind === 'entity' && field.key === descriptor.identity.field) {
      errors.push({
        path: `${path}.key`,
        message: `Document key "${field.key}" is taken by the identity`,
        code: 'IDENTITY_CONFLICT',
      });
    }
  });

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors: [], descriptor };
}
