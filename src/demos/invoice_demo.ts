import { InvoiceManager } from '../application/invoice_manager';
import { InvoiceCalculator } from '../domain/invoice_calculator';
import { InvoiceData, InvoiceFormat } from '../domain/models';
import { ConsoleInvoiceSender } from '../infrastructure/console_invoice_sender';
import { createLogger } from '../infrastructure/logger';
import { InvoiceRenderer } from '../presentation/invoice_renderer';

export function createInvoiceManager(trace: boolean): InvoiceManager {
    return new InvoiceManager(
        new InvoiceCalculator(createLogger('InvoiceCalculator', trace)),
        new InvoiceRenderer(createLogger('InvoiceRenderer', trace)),
        new ConsoleInvoiceSender(),
        createLogger('InvoiceManager', trace)
    );
}

export function runInvoiceExample(trace: boolean): void {
    console.log('\n--- Invoice Manager Example ---');
    const manager = createInvoiceManager(trace);
    const rawOrder: InvoiceData = { amount: 900 };

    manager.processInvoice(rawOrder, 'customer@example.com', InvoiceFormat.HTML);
    manager.processInvoice(rawOrder, 'another.customer@example.com', InvoiceFormat.PDF);
}
