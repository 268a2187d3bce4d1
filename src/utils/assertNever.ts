// src/utils/assertNever.ts

/** Exhaustiveness guard for switches over closed unions. */
export const assertNever = (value: never): never => {
    throw new Error(`Unhandled ledger value: ${String(value)}`);
};
