/**
 * Payload Validator
 *
 * Checks a raw payload against a transaction definition and produces a
 * {@link ValidationOutcome}. All problems are collected in one pass: every
 * missing required field and every malformed field is reported, not just the
 * first.
 *
 * Fields the schema does not know about are passed through unchanged as long as
 * they are JSON values and do not collide with the operation envelope.
 */

import type { ErrorObject } from 'ajv';
import type { FieldError } from '../types/common.types';
import type { NodeData } from '../types/node.types';
import type { NormalizedPayload, TransactionPayloads, TransactionType } from '../types/request.types';
import { getTransactionDefinition } from '../transaction_registry/transaction_registry';
import type { TransactionDefinition } from '../transaction_registry/transaction_registry.types';
import { deepFreeze } from '../utils/deep_freeze';
import { isJsonValue, isPlainObject } from '../utils/json_value';
import { VALID_OUTCOME } from './payload_validator.types';
import type { InvalidOutcome, ValidationOutcome } from './payload_validator.types';

/** Field name used when the payload as a whole is at fault */
export const PAYLOAD_FIELD = '(payload)';

/** Keys the canonical operation sets itself; a payload may not supply them */
export const RESERVED_OPERATION_FIELDS: readonly string[] = ['type', 'dest'];

const FORBIDDEN_FIELD_NAMES: readonly string[] = ['__proto__'];

// Array-index names; objects list them before every other key
const INTEGER_LIKE_NAME = /^(?:0|[1-9][0-9]*)$/;

export function validatePayload<K extends TransactionType>(
  definition: TransactionDefinition<K>,
  payload: unknown
): ValidationOutcome<K> {
  if (!isPlainObject(payload)) {
    return invalid(definition, [...definition.requiredFields], [
      { field: PAYLOAD_FIELD, message: 'must be an object', value: payload }
    ]);
  }

  const passThroughErrors = checkPassThroughFields(definition, payload);

  if (definition.validate(payload) && passThroughErrors.length === 0) {
    return {
      isValid: true,
      [VALID_OUTCOME]: true,
      transactionType: definition.type,
      payload: normalize<TransactionPayloads[K]>(definition.fieldOrder, payload)
    };
  }

  const schemaErrors = definition.validate.errors ?? [];
  const missing = new Set<string>();
  const malformed = new Map<string, FieldError>();

  for (const error of schemaErrors) {
    if (error.keyword === 'required') {
      const property: unknown = error.params['missingProperty'];
      if (typeof property === 'string') {
        missing.add(property);
      }
      continue;
    }

    const [field = PAYLOAD_FIELD, ...location] = parseInstancePath(error.instancePath);
    if (!malformed.has(field)) {
      malformed.set(field, {
        field,
        message: describeError(error, location),
        value: field === PAYLOAD_FIELD ? payload : payload[field]
      });
    }
  }

  const missingFields = [
    ...definition.requiredFields.filter(field => missing.has(field)),
    ...[...missing].filter(field => !definition.requiredFields.includes(field))
  ];
  const malformedFields = [...malformed.values()]
    .sort((a, b) => fieldRank(definition, a.field) - fieldRank(definition, b.field))
    .concat(passThroughErrors);

  return invalid(definition, missingFields, malformedFields);
}

/**
 * Checks that the actor and destination identifiers are usable. Format checks
 * belong to the identity subsystem; here they only need to be non-empty strings.
 */
export function validateIdentifiers(actor: unknown, destination: unknown): FieldError[] {
  const errors: FieldError[] = [];
  if (!isNonEmptyString(actor)) {
    errors.push({ field: 'identifier', message: 'must be a non-empty string', value: actor });
  }
  if (!isNonEmptyString(destination)) {
    errors.push({ field: 'dest', message: 'must be a non-empty string', value: destination });
  }
  return errors;
}

/**
 * Type guard backed by the compiled NODE schema.
 */
export function isNodeData(data: unknown): data is NodeData {
  return getTransactionDefinition('NODE').validate(data);
}

function invalid(
  definition: TransactionDefinition,
  missingFields: readonly string[],
  malformedFields: readonly FieldError[]
): InvalidOutcome {
  return {
    isValid: false,
    transactionType: definition.type,
    missingFields,
    malformedFields
  };
}

function checkPassThroughFields(
  definition: TransactionDefinition,
  payload: Record<string, unknown>
): FieldError[] {
  const errors: FieldError[] = [];
  const extraFields = Object.keys(payload)
    .filter(field => !definition.fieldOrder.includes(field))
    .sort();

  for (const field of extraFields) {
    const value = payload[field];
    if (FORBIDDEN_FIELD_NAMES.includes(field)) {
      errors.push({ field, message: 'is not an allowed field name', value });
    } else if (INTEGER_LIKE_NAME.test(field)) {
      errors.push({ field, message: 'must not be an integer-like name', value });
    } else if (RESERVED_OPERATION_FIELDS.includes(field)) {
      errors.push({ field, message: 'is reserved for the operation envelope', value });
    } else if (!isJsonValue(value)) {
      errors.push({ field, message: 'must be a JSON value', value });
    }
  }
  return errors;
}

/**
 * Copies the payload with a fixed key order: schema fields first, then
 * pass-through fields sorted by name. The copy is deep-frozen and shares
 * nothing with the caller's object.
 */
function normalize<T>(
  fieldOrder: readonly string[],
  payload: Record<string, unknown> & T
): NormalizedPayload<T> {
  const extraFields = Object.keys(payload)
    .filter(field => !fieldOrder.includes(field))
    .sort();

  // Object.assign keeps the key positions laid down here
  const ordered: Record<string, unknown> = {};
  for (const field of [...fieldOrder, ...extraFields]) {
    if (Object.prototype.hasOwnProperty.call(payload, field)) {
      ordered[field] = undefined;
    }
  }

  return deepFreeze(Object.assign(ordered, structuredClone(payload)));
}

function parseInstancePath(instancePath: string): string[] {
  if (!instancePath) {
    return [];
  }
  return instancePath
    .split('/')
    .slice(1)
    .map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

function describeError(error: ErrorObject, location: readonly string[]): string {
  let message = error.message ?? 'is invalid';

  if (error.keyword === 'enum') {
    const allowed: unknown = error.params['allowedValues'];
    if (Array.isArray(allowed)) {
      message += ` (${allowed.join(', ')})`;
    }
  }

  return location.length > 0 ? `[${location.join('][')}] ${message}` : message;
}

function fieldRank(definition: TransactionDefinition, field: string): number {
  if (field === PAYLOAD_FIELD) {
    return -1;
  }
  const index = definition.fieldOrder.indexOf(field);
  return index === -1 ? definition.fieldOrder.length : index;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
