import { InvoiceData, InvoiceFormat } from '../domain/models';
import { IInvoiceCalculator } from '../domain/invoice_calculator';
import { parseInvoiceFormat } from '../domain/formats';
import { IInvoiceRenderer } from '../presentation/invoice_renderer';
import { IInvoiceSender } from '../infrastructure/console_invoice_sender';
import { ILogger } from '../domain/logger';

export class InvoiceManager {
    constructor(
        private readonly calculator: IInvoiceCalculator,
        private readonly renderer: IInvoiceRenderer,
        private readonly sender: IInvoiceSender,
        private readonly logger: ILogger
    ) { }

    /**
     * Calculate -> render -> send. A format given as a tag is parsed first,
     * so an unsupported tag fails before any collaborator runs.
     */
    processInvoice(raw: InvoiceData, destination: string, format: InvoiceFormat | string): void {
        const invoiceFormat = parseInvoiceFormat(format);

        this.logger.info(`Starting invoice processing for email: ${destination}`);

        const calculated = this.calculator.calculate(raw);
        const rendered = this.renderer.render(calculated, invoiceFormat);
        this.sender.send(rendered, destination);

        this.logger.info('Invoice processing finished.');
    }
}
