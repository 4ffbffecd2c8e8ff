/**
 * MODULE: InvoiceCalculator
 * RESPONSIBILITY: Derives the payable amount from raw invoice data.
 * Pure and deterministic. The input record is never mutated.
 */
import { InvoiceData } from './models';
import { ILogger } from './logger';

export const SURCHARGE_RATE = 0.1;

export interface IInvoiceCalculator {
    calculate(raw: Readonly<InvoiceData>): InvoiceData;
}

export class InvoiceCalculator implements IInvoiceCalculator {
    constructor(private readonly logger: ILogger) { }

    calculate(raw: Readonly<InvoiceData>): InvoiceData {
        this.logger.info('Calculating final amount including taxes and discounts.');

        const calculated: InvoiceData = {
            ...raw,
            amount: raw.amount + raw.amount * SURCHARGE_RATE,
        };

        this.logger.info(`Calculated amount is ${calculated.amount}`);
        return calculated;
    }
}
