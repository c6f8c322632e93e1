import type { FlowAction } from '../categories.js';

/** Fields of a version-2 VPC flow log line, in wire order. */
export interface VpcFlowFields {
  version: number;
  accountId: string;
  interfaceId: string;
  srcAddr: string;
  dstAddr: string;
  srcPort: number;
  dstPort: number;
  protocol: number;
  packets: number;
  bytes: number;
  /** Epoch seconds. */
  start: number;
  /** Epoch seconds. */
  end: number;
  action: FlowAction;
  logStatus: string;
}

export const FLOW_LOG_VERSION = 2;
export const FLOW_ACCOUNT_ID = '1234567890';
export const FLOW_INTERFACE_ID = 'eni-sdvu4NphZxGvp1MDz';
export const PROTOCOL_TCP = 6;

export function formatVpcFlowLine(fields: VpcFlowFields): string {
  return [
    fields.version,
    fields.accountId,
    fields.interfaceId,
    fields.srcAddr,
    fields.dstAddr,
    fields.srcPort,
    fields.dstPort,
    fields.protocol,
    fields.packets,
    fields.bytes,
    fields.start,
    fields.end,
    fields.action,
    fields.logStatus,
  ].join(' ');
}
