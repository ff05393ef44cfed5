import { assertNever } from "../types.js";
import type { MachineEvent } from "./events.js";

/**
 * One-line human-readable summary stored as a log entry's `detail`.
 */
export function describeEvent(event: MachineEvent): string {
  switch (event.eventType) {
    case "CoinInserted":
      return `inserted ${event.payload.amount}, balance ${event.payload.balance}`;
    case "ProductSelected": {
      const { productId, price, balance, previousSelection } = event.payload;
      const replaced =
        previousSelection !== null && previousSelection !== productId
          ? ` (replacing ${previousSelection})`
          : "";
      return `selected ${productId} at ${price}, balance ${balance}${replaced}`;
    }
    case "DispenseStarted":
      return `dispensing ${event.payload.productId}`;
    case "ProductDispensed":
      return `dispensed ${event.payload.productId} for ${event.payload.price}, change ${event.payload.changeReturned}`;
    case "DispenseAborted":
      return `dispense of ${event.payload.productId} aborted: ${event.payload.reason}; balance ${event.payload.balance} kept`;
    case "RefundIssued":
      return `refunded ${event.payload.amountReturned}`;
    case "RestockCompleted": {
      const entries = Object.entries(event.payload.restocked);
      const units = entries.reduce((sum, [, added]) => sum + added, 0);
      return `restocked ${units} units across ${entries.length} products (${event.payload.mode})`;
    }
    case "MachineShutDown":
      return `shut down from ${event.payload.previousState}`;
    case "MaintenanceStarted":
      return `maintenance started from ${event.payload.previousState}`;
    default:
      return assertNever(event);
  }
}
