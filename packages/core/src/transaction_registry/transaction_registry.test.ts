import {
  findTransactionTypeByCode,
  getTransactionDefinition,
  isTransactionType,
  listTransactionTypes,
  resolveTransactionType,
  schemaFor
} from './transaction_registry';
import { UnknownTransactionTypeError } from '../validation/errors';

const NODE_FIELDS = ['node_ip', 'node_port', 'client_ip', 'client_port', 'alias', 'services', 'blskey'];

describe('Transaction registry', () => {
  describe('getTransactionDefinition', () => {
    it('[EARS-1] should describe the NODE transaction', () => {
      const definition = getTransactionDefinition('NODE');

      expect(definition.type).toBe('NODE');
      expect(definition.code).toBe('0');
      expect(definition.requiredFields).toEqual(NODE_FIELDS);
      expect(definition.fieldOrder).toEqual(NODE_FIELDS);
      expect(typeof definition.validate).toBe('function');
    });

    it('[EARS-2] should return the same frozen definition on every lookup', () => {
      const definition = getTransactionDefinition('NODE');

      expect(getTransactionDefinition('NODE')).toBe(definition);
      expect(Object.isFrozen(definition)).toBe(true);
      expect(Object.isFrozen(definition.schema)).toBe(true);
      expect(Object.isFrozen(definition.schema.properties)).toBe(true);
      expect(Object.isFrozen(definition.requiredFields)).toBe(true);
    });
  });

  describe('schemaFor', () => {
    it('[EARS-3] should return the node schema with all seven fields required', () => {
      const schema = schemaFor('NODE');

      expect(schema).not.toBeNull();
      expect(schema?.title).toBe('NodeRequest');
      expect(schema?.required).toEqual(NODE_FIELDS);
    });

    it('[EARS-10] should bound both ports to 1..65535 and say so in the schema', () => {
      const properties = schemaFor('NODE')?.properties;

      for (const port of ['node_port', 'client_port']) {
        expect(properties?.[port]).toMatchObject({
          type: 'integer',
          minimum: 1,
          maximum: 65535,
          description: expect.stringContaining('Restricted to 1..65535 on purpose')
        });
      }
    });

    it('[EARS-4] should return null for an unregistered type', () => {
      expect(schemaFor('ATTRIB')).toBeNull();
      expect(schemaFor('')).toBeNull();
    });
  });

  describe('resolveTransactionType', () => {
    it('[EARS-5] should resolve a registered name', () => {
      expect(resolveTransactionType('NODE')).toBe('NODE');
    });

    it('[EARS-6] should throw UnknownTransactionTypeError for anything else', () => {
      let caught: unknown;
      try {
        resolveTransactionType('NYM');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnknownTransactionTypeError);
      expect(caught).toMatchObject({
        name: 'UnknownTransactionTypeError',
        code: 'UNKNOWN_TRANSACTION_TYPE',
        transactionType: 'NYM',
        message: 'Unknown transaction type: NYM'
      });
    });
  });

  describe('lookups', () => {
    it('[EARS-7] should only recognise own registry keys', () => {
      expect(isTransactionType('NODE')).toBe(true);
      expect(isTransactionType('toString')).toBe(false);
      expect(isTransactionType('hasOwnProperty')).toBe(false);
    });

    it('[EARS-8] should list every registered type', () => {
      expect(listTransactionTypes()).toEqual(['NODE']);
    });

    it('[EARS-9] should map wire codes back to transaction types', () => {
      expect(findTransactionTypeByCode('0')).toBe('NODE');
      expect(findTransactionTypeByCode('1')).toBeNull();
    });
  });
});
