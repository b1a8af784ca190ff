/**
 * Orders Module Index
 *
 * Public surface of the order lifecycle engine.
 */

// Status Transition Authority
export {
  ORDER_STATUSES,
  DEFAULT_CANCELLABLE_STATUSES,
  isCancellable,
  isTerminalStatus,
  nextStatus,
} from '@/lib/config/status-transitions';
export { setOrderStatus } from './status-machine';

// Workflows
export { completeOrder, afterPayment, completionMessage } from './completion';
export type { CompletionResult } from './completion';
export {
  cancelOrder,
  ORDER_NOT_FOUND_MESSAGE,
  TOO_LATE_TO_CANCEL_MESSAGE,
} from './cancellation';
export type { CancelResult } from './cancellation';
export {
  assignOrder,
  acceptOrder,
  beginRoute,
  serviceOrder,
  advanceOrder,
} from './assignment';
export { newOrderText } from './courier-messages';

// Compensation
export {
  runCancellationCompensation,
  COMPENSATION_STEPS,
  RefundFailedError,
} from './compensation';
export type { CompensationReport, CompensationStep, StepRunner } from './compensation';

// Wiring
export { createOrderServices } from './services';
export type { OrderServices, CompensationDispatcher } from './services';
export { OrderStoreError } from './order-store';
export type { OrderStore } from './order-store';
