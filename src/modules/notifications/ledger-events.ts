// src/modules/notifications/ledger-events.ts
import type Redis from 'ioredis';
import logger from '@/utils/logger';
import type { CashTransactionKind } from '@/db/ledger.store';
import type { ShiftReportResponse } from '@/modules/shifts/shift.presenter';

/**
 * Facts the ledger announces to the reporting destination after a commit.
 * Amounts use the wire form (`"150.00"`).
 */
export type LedgerEvent =
    | { type: 'shift.opened'; shiftId: number; employeeId: number; startCash: string; occurredAt: string }
    | {
          type: 'shift.closed';
          shiftId: number;
          employeeId: number;
          endCashActual: string;
          difference: string;
          report: ShiftReportResponse;
          occurredAt: string;
      }
    | {
          type: 'cash.transaction.recorded';
          shiftId: number;
          transactionId: number;
          kind: CashTransactionKind;
          amount: string;
          occurredAt: string;
      }
    | {
          type: 'cash.handover.processed';
          shiftId: number;
          employeeId: number;
          orderIds: number[];
          amount: string;
          occurredAt: string;
      }
    | { type: 'order.unlinked'; orderId: number; occurredAt: string };

export type LedgerEventType = LedgerEvent['type'];

export interface LedgerEventPublisher {
    publish(event: LedgerEvent): Promise<void>;
}

/**
 * Publishes to `cash-ledger:<destination>`. The destination (e.g. the admin chat
 * a bot relays to) is fixed when the publisher is built, not looked up per call.
 */
export class RedisLedgerEventPublisher implements LedgerEventPublisher {
    readonly channel: string;

    constructor(
        private readonly redis: Redis,
        destination: string
    ) {
        this.channel = `cash-ledger:${destination}`;
    }

    async publish(event: LedgerEvent): Promise<void> {
        const receivers = await this.redis.publish(this.channel, JSON.stringify(event));
        logger.debug(`Ledger event ${event.type} published`, { channel: this.channel, receivers });
    }
}

/**
 * Events are sent after the unit of work committed; a failed publish is logged
 * and must not turn a committed operation into an error response.
 */
export const publishAfterCommit = async (publisher: LedgerEventPublisher, event: LedgerEvent): Promise<void> => {
    try {
        await publisher.publish(event);
    } catch (error) {
        logger.error(`Failed to publish ledger event ${event.type}`, { function: 'publishAfterCommit', error });
    }
};
