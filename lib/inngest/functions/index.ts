/**
 * All Inngest functions served by this package. Pass to the host's
 * `serve()` handler.
 */

import { cancelOrderCompensation } from './cancel-compensation';

export const orderLifecycleFunctions = [cancelOrderCompensation];

export { cancelOrderCompensation };
