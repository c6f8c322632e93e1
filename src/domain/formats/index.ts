export { defaultRng, createSeededRng, randomInt, pick } from './random.js';
export type { Rng } from './random.js';
export {
  loadWordLists,
  ipv4Address,
  username,
  buzzword,
  creditCardNumber,
  luhnCheckDigit,
  isLuhnValid,
} from './fake-data.js';
export type { WordLists } from './fake-data.js';
export { formatApacheTimestamp, formatHttpAccessLine } from './http-access.js';
export type { HttpAccessFields } from './http-access.js';
export {
  formatVpcFlowLine,
  FLOW_LOG_VERSION,
  FLOW_ACCOUNT_ID,
  FLOW_INTERFACE_ID,
  PROTOCOL_TCP,
} from './vpc-flow.js';
export type { VpcFlowFields } from './vpc-flow.js';
