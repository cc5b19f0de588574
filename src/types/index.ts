export type {
  Category,
  ClassificationCategory,
  ClassificationResult,
  RoutableClassification,
  TargetMap,
  RegistryRecord,
  EnrichmentRecord,
  ParameterSet,
  DispatchLabels,
  DispatchRequest,
  DispatchAck,
} from "./events.js";
export { isRoutable } from "./events.js";
