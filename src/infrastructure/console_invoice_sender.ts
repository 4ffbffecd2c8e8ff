import { RenderedInvoice } from '../domain/models';

export interface IInvoiceSender {
    send(rendered: RenderedInvoice, destination: string): void;
}

/**
 * Stand-in transport: the notification itself is the console line.
 */
export class ConsoleInvoiceSender implements IInvoiceSender {
    send(rendered: RenderedInvoice, destination: string): void {
        console.log(`[InvoiceSender] Sending ${rendered.format} invoice to ${destination}.`);
        console.log(`[InvoiceSender] Content sent: "${rendered.content}"`);
    }
}
