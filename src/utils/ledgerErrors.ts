// src/utils/ledgerErrors.ts
import httpStatus from 'http-status';
import ApiError from './ApiError';
import logger, { type LogContext } from './logger';

export class InvalidAmountError extends ApiError {
    constructor(message = 'Amount must be greater than zero.') {
        super(httpStatus.BAD_REQUEST, message, true, undefined, '', 'INVALID_AMOUNT');
    }
}

export class AlreadyOpenError extends ApiError {
    constructor(employeeId: number, openShiftId?: number) {
        super(
            httpStatus.CONFLICT,
            `Employee ${employeeId} already has an open shift.`,
            true,
            openShiftId === undefined ? { employeeId } : { employeeId, shiftId: openShiftId },
            '',
            'SHIFT_ALREADY_OPEN'
        );
    }
}

export class ShiftNotFoundError extends ApiError {
    constructor(shiftId: number) {
        super(httpStatus.NOT_FOUND, `Shift ${shiftId} not found.`, true, { shiftId }, '', 'SHIFT_NOT_FOUND');
    }
}

/** The shift exists but no longer accepts cash movements. */
export class ShiftClosedError extends ApiError {
    constructor(shiftId: number) {
        super(httpStatus.CONFLICT, `Shift ${shiftId} is closed.`, true, { shiftId }, '', 'SHIFT_CLOSED');
    }
}

export class ShiftAlreadyClosedError extends ApiError {
    constructor(shiftId: number) {
        super(httpStatus.CONFLICT, `Shift ${shiftId} is already closed.`, true, { shiftId }, '', 'SHIFT_ALREADY_CLOSED');
    }
}

export class EmployeeNotFoundError extends ApiError {
    constructor(employeeId: number) {
        super(httpStatus.NOT_FOUND, `Employee ${employeeId} not found.`, true, { employeeId }, '', 'EMPLOYEE_NOT_FOUND');
    }
}

export class OrderNotFoundError extends ApiError {
    constructor(orderId: number) {
        super(httpStatus.NOT_FOUND, `Order ${orderId} not found.`, true, { orderId }, '', 'ORDER_NOT_FOUND');
    }
}

export class OrderAlreadyCompletedError extends ApiError {
    constructor(orderId: number) {
        super(httpStatus.CONFLICT, `Order ${orderId} is already completed.`, true, { orderId }, '', 'ORDER_ALREADY_COMPLETED');
    }
}

export class NoEligibleOrdersError extends ApiError {
    constructor(orderIds: readonly number[]) {
        super(
            httpStatus.CONFLICT,
            'None of the selected orders has cash awaiting handover.',
            true,
            { orderIds: [...orderIds] },
            '',
            'NO_ELIGIBLE_ORDERS'
        );
    }
}

/**
 * Catch-block tail shared by the ledger services: domain errors pass through,
 * anything else is logged with the call context and surfaced as a 500.
 */
export const rethrowAsServiceError = (error: unknown, logContext: LogContext, message: string): never => {
    if (error instanceof ApiError) {
        throw error;
    }
    logger.error(message, { ...logContext, error });
    throw ApiError.internal(`${message}.`, undefined, error instanceof Error ? error : undefined);
};
