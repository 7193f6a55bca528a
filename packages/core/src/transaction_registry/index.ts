export {
  isTransactionType,
  getTransactionDefinition,
  resolveTransactionType,
  schemaFor,
  listTransactionTypes,
  findTransactionTypeByCode
} from "./transaction_registry";
export type { TransactionDefinition, TransactionDefinitionTable } from "./transaction_registry.types";
