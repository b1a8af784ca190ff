/**
 * Canonical Order Status Transitions
 *
 * Single source of truth for the delivery order lifecycle.
 *
 *   unassigned → assigned → accepted → enroute → servicing → complete
 *        └──────────┴──────────┴──────────┴──────────┴──→ cancelled
 *
 * Forward edges are strictly one-way. Cancellation is a wildcard edge from any
 * status in the cancellable set (all non-terminal statuses by default, callers
 * may override per request).
 */

// ============================================================================
// STATUS ENUM
// ============================================================================

export const ORDER_STATUSES = [
  'unassigned',
  'assigned',
  'accepted',
  'enroute',
  'servicing',
  'complete',
  'cancelled',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Terminal statuses: the order is immutable (audit fields aside) once here */
export const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
  'complete',
  'cancelled',
]);

// ============================================================================
// TRANSITION MAP
// ============================================================================

/**
 * FORWARD_TRANSITIONS[current] → the one status a courier moves the order to
 * next, or null when the order has no successor.
 */
export const FORWARD_TRANSITIONS: Readonly<Record<OrderStatus, OrderStatus | null>> = {
  unassigned: 'assigned',
  assigned: 'accepted',
  accepted: 'enroute',
  enroute: 'servicing',
  servicing: 'complete',
  complete: null,
  cancelled: null,
};

export const DEFAULT_CANCELLABLE_STATUSES: readonly OrderStatus[] = ORDER_STATUSES.filter(
  (status) => !TERMINAL_STATUSES.has(status)
);

// ============================================================================
// HELPERS
// ============================================================================

export function isValidStatus(status: string): status is OrderStatus {
  return ORDER_STATUSES.some((known) => known === status);
}

/**
 * Successor of `status` on the forward chain; null for complete and cancelled.
 */
export function nextStatus(status: OrderStatus): OrderStatus | null {
  return FORWARD_TRANSITIONS[status];
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Whether an order in `status` may still be cancelled. An explicit override
 * replaces the default set entirely, it is not merged with it.
 */
export function isCancellable(
  status: OrderStatus,
  override?: readonly OrderStatus[]
): boolean {
  return (override ?? DEFAULT_CANCELLABLE_STATUSES).includes(status);
}
