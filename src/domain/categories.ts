/**
 * Traffic categories.
 *
 * Each kind carries the static fields its producer needs. Rates live in
 * configuration; a category configured at 0 records/second is never started.
 */

export type HttpMethod = 'GET' | 'POST';

export type FlowAction = 'ACCEPT' | 'REJECT';

export type Category =
  | { readonly kind: 'http_access'; readonly service: string; readonly method: HttpMethod; readonly status: number }
  | { readonly kind: 'http_error'; readonly service: string; readonly method: HttpMethod; readonly status: number }
  | { readonly kind: 'http_leak'; readonly service: string; readonly method: HttpMethod; readonly status: number }
  | { readonly kind: 'vpc_flow'; readonly service: string; readonly action: FlowAction; readonly logStatus: string; readonly port: number }
  | { readonly kind: 'vpc_flow_attack'; readonly service: string; readonly action: FlowAction; readonly logStatus: string; readonly port: number };

export type CategoryKind = Category['kind'];

export const STOREDOG_SERVICE = 'storedog';
export const VPC_FLOW_SERVICE = 'aws.vpc_flow_logs';

export const CATEGORIES = {
  http_access: { kind: 'http_access', service: STOREDOG_SERVICE, method: 'GET', status: 200 },
  http_error: { kind: 'http_error', service: STOREDOG_SERVICE, method: 'GET', status: 500 },
  http_leak: { kind: 'http_leak', service: STOREDOG_SERVICE, method: 'POST', status: 504 },
  vpc_flow: { kind: 'vpc_flow', service: VPC_FLOW_SERVICE, action: 'ACCEPT', logStatus: 'OK', port: 443 },
  vpc_flow_attack: { kind: 'vpc_flow_attack', service: VPC_FLOW_SERVICE, action: 'REJECT', logStatus: 'OK', port: 22 },
} as const satisfies { readonly [K in CategoryKind]: Extract<Category, { kind: K }> };

/** Startup order of the generator tasks. */
export const CATEGORY_KINDS: readonly CategoryKind[] = [
  'http_access',
  'http_error',
  'http_leak',
  'vpc_flow',
  'vpc_flow_attack',
];

/** One configured category. `ratePerSecond === 0` means disabled. */
export interface CategoryConfig {
  readonly kind: CategoryKind;
  readonly ratePerSecond: number;
}

export type CategoryRates = { readonly [K in CategoryKind]: number };

/** Expands per-kind rates into configs, keeping only enabled categories. */
export function enabledCategories(rates: CategoryRates): CategoryConfig[] {
  return CATEGORY_KINDS
    .filter((kind) => rates[kind] > 0)
    .map((kind) => ({ kind, ratePerSecond: rates[kind] }));
}
