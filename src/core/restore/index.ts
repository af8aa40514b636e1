export {
  type RestoreOperatorOptions,
  type RestoreOptions,
  type RestoreResult,
  RestoreOperator,
  type SlotGate,
} from "./operator";
