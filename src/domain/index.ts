export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  LogRecord,
  ProducerOutput,
  RecordProducer,
  CommonMetadata,
  StampedRecord,
} from './record.js';
export { toRecordList, isRecordList, createCommonMetadata } from './record.js';
export type {
  Category,
  CategoryKind,
  CategoryConfig,
  CategoryRates,
  HttpMethod,
  FlowAction,
} from './categories.js';
export {
  CATEGORIES,
  CATEGORY_KINDS,
  STOREDOG_SERVICE,
  VPC_FLOW_SERVICE,
  enabledCategories,
} from './categories.js';
