import { ErrorCode, KernelError } from '../Errors.js';
import type { Quantity } from './Ontology.js';

export const PERCENT_BASE = 100n;

export interface Split {
    /** floor(quantity * percentage / 100) */
    share: Quantity;
    /** quantity - share; never rounded on its own */
    remainder: Quantity;
}

/**
 * Floor-rounded percentage split. share + remainder === quantity for every input.
 */
export function splitByPercentage(quantity: Quantity, percentage: number): Split {
    if (!Number.isInteger(percentage) || percentage < 0 || percentage > 100) {
        throw new KernelError(ErrorCode.INVALID_QUANTITY, `Percentage out of range: ${percentage}`);
    }
    if (quantity < 0n) {
        throw new KernelError(ErrorCode.INVALID_QUANTITY, `Negative quantity: ${quantity}`);
    }
    const share = (quantity * BigInt(percentage)) / PERCENT_BASE;
    return { share, remainder: quantity - share };
}

export function sumQuantities(values: Iterable<Quantity>): Quantity {
    let total = 0n;
    for (const v of values) total += v;
    return total;
}
