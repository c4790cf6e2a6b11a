/**
 * Runtime validation for inputs crossing into the orchestration core.
 *
 * Schema checks use compiled TypeBox validators. Operator messages get the
 * content rules (null bytes, line limit) on top.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import {
  AgentNameSchema,
  AgentProfileSchema,
  MessageInputSchema,
  type AgentProfileType,
  type MessageInputType,
} from './schemas.js';
import { createValidationError } from './errors.js';

// ============================================================================
// Validation Error Types
// ============================================================================

export interface ValidationError {
  /** Field path that failed validation */
  path: string;
  /** Expected type or value */
  expected: string;
  /** Actual value received */
  received: unknown;
  /** Human-readable error message */
  message: string;
}

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * TypeBox compilers are expensive to create, so they are cached per schema
 */
const compilerCache = new Map<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  let compiler = compilerCache.get(schema);
  if (!compiler) {
    compiler = TypeCompiler.Compile(schema);
    compilerCache.set(schema, compiler);
  }
  return compiler as TypeCheck<T>;
}

function getSchemaTypeName(schema: Record<string, unknown>): string {
  if (schema.$id) return String(schema.$id);
  if (schema.type) return String(schema.type);
  if (schema.anyOf) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationError {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema as Record<string, unknown>),
    received: error.value,
    message: error.message,
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate data and throw a validation error if invalid
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  component = 'validation'
): Static<T> {
  const compiler = getCompiler(schema);
  if (compiler.Check(data)) {
    return data;
  }

  const errors = [...compiler.Errors(data)].map(convertError);
  const errorMessages = errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
  throw createValidationError(`Validation failed: ${errorMessages}`, {
    component,
    details: { errors },
  });
}

export function validateAgentProfile(data: unknown, component = 'config'): AgentProfileType {
  return validateOrThrow(AgentProfileSchema, data, component);
}

export function validateAgentName(name: string, component = 'input'): string {
  return validateOrThrow(AgentNameSchema, name, component);
}

// ============================================================================
// Operator Input
// ============================================================================

const MAX_MESSAGE_LINES = 1000;

/**
 * Validate and normalize a message typed by the operator.
 * Runs of four or more newlines collapse to three.
 */
export function validateMessageInput(content: string, agentTag?: string): MessageInputType {
  const input = validateOrThrow(MessageInputSchema, { content, agentTag }, 'input');

  if (input.content.includes('\0')) {
    throw createValidationError('Message cannot contain null bytes', { component: 'input' });
  }
  if (input.content.split('\n').length > MAX_MESSAGE_LINES) {
    throw createValidationError(`Message cannot exceed ${MAX_MESSAGE_LINES} lines`, {
      component: 'input',
    });
  }

  return {
    ...input,
    content: input.content.replace(/\n{4,}/g, '\n\n\n'),
  };
}
