/**
 * Delivery context: the one place completion and progress callbacks run.
 *
 * Whatever produced a result (a fetch continuation, a timer, the fail-safe),
 * the UI sees callbacks in FIFO order, one at a time, never synchronously
 * inside the call that started the request.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("delivery");

export interface DeliveryContext {
  dispatch(task: () => void): void;
}

export function createSerialDelivery(): DeliveryContext {
  const queue: Array<() => void> = [];
  let scheduled = false;

  const drain = () => {
    scheduled = false;
    while (queue.length > 0) {
      const task = queue.shift();
      if (!task) break;
      try {
        task();
      } catch (err) {
        log.error(`Delivery callback threw: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  };

  return {
    dispatch(task) {
      queue.push(task);
      if (!scheduled) {
        scheduled = true;
        void Promise.resolve().then(drain);
      }
    },
  };
}
