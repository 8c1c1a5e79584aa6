/**
 * Schema validation utilities for @docket/core
 *
 * @example
 * ```typescript
 * import { compileSchema, applySchemaDefaults } from '@docket/core/validation';
 *
 * const check = compileSchema<MyArgs>(MY_SCHEMA);
 * const value = applySchemaDefaults(MY_SCHEMA, input);
 * if (!check(value)) {
 *   console.error(toIssues(check.errors, 'arguments'));
 * }
 * ```
 */

export {
  compileSchema,
  applySchemaDefaults,
  toIssues,
  fieldOf,
  issueCodeFor,
  describeError,
} from './internal/schema-validator.js';

export type {
  ObjectSchema,
  PropertySchema,
} from './internal/schema-validator.js';
