import { InvoiceData, InvoiceFormat, RenderedInvoice } from '../domain/models';
import { ILogger } from '../domain/logger';

export interface IInvoiceRenderer {
    render(data: InvoiceData, format: InvoiceFormat): RenderedInvoice;
}

export class InvoiceRenderer implements IInvoiceRenderer {
    constructor(private readonly logger: ILogger) { }

    render(data: InvoiceData, format: InvoiceFormat): RenderedInvoice {
        this.logger.info(`Rendering invoice data to ${format} format.`);
        const content = `Rendered content for amount: ${data.amount} in ${format}`;
        this.logger.info(`Content: "${content}"`);
        return { content, format };
    }
}
