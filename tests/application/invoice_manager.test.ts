import { InvoiceManager } from '../../src/application/invoice_manager';
import { IInvoiceCalculator, InvoiceCalculator } from '../../src/domain/invoice_calculator';
import { UnsupportedFormatError } from '../../src/domain/errors';
import { InvoiceData, InvoiceFormat, RenderedInvoice } from '../../src/domain/models';
import { IInvoiceSender } from '../../src/infrastructure/console_invoice_sender';
import { SilentLogger } from '../../src/infrastructure/logger';
import { IInvoiceRenderer, InvoiceRenderer } from '../../src/presentation/invoice_renderer';

class RecordingSender implements IInvoiceSender {
    readonly sent: Array<{ rendered: RenderedInvoice; destination: string }> = [];

    send(rendered: RenderedInvoice, destination: string): void {
        this.sent.push({ rendered, destination });
    }
}

describe('InvoiceManager', () => {
    const logger = new SilentLogger();
    let sender: RecordingSender;
    let manager: InvoiceManager;

    beforeEach(() => {
        sender = new RecordingSender();
        manager = new InvoiceManager(new InvoiceCalculator(logger), new InvoiceRenderer(logger), sender, logger);
    });

    test('calculates, renders and sends', () => {
        manager.processInvoice({ amount: 100 }, 'customer@example.com', InvoiceFormat.HTML);

        expect(sender.sent).toEqual([{
            rendered: { content: 'Rendered content for amount: 110 in HTML', format: InvoiceFormat.HTML },
            destination: 'customer@example.com',
        }]);
    });

    test('accepts a format tag', () => {
        manager.processInvoice({ amount: 900 }, 'b@example.com', 'pdf');
        expect(sender.sent[0].rendered).toEqual({ content: 'Rendered content for amount: 990 in PDF', format: InvoiceFormat.PDF });
    });

    test('leaves the raw invoice untouched across runs', () => {
        const raw: InvoiceData = { amount: 900 };
        manager.processInvoice(raw, 'a@example.com', InvoiceFormat.HTML);
        manager.processInvoice(raw, 'b@example.com', InvoiceFormat.PDF);

        expect(raw.amount).toBe(900);
        expect(sender.sent.map(s => s.rendered.content)).toEqual([
            'Rendered content for amount: 990 in HTML',
            'Rendered content for amount: 990 in PDF',
        ]);
    });

    test('an unsupported tag fails before any collaborator runs', () => {
        const calculate = jest.fn();
        const calculator: IInvoiceCalculator = { calculate };
        const guarded = new InvoiceManager(calculator, new InvoiceRenderer(logger), sender, logger);

        expect(() => guarded.processInvoice({ amount: 1 }, 'a@example.com', 'DOCX')).toThrow(UnsupportedFormatError);
        expect(calculate).not.toHaveBeenCalled();
        expect(sender.sent).toHaveLength(0);
    });

    test('a failing step aborts the rest of the workflow', () => {
        const renderer: IInvoiceRenderer = {
            render: () => { throw new Error('renderer down'); },
        };
        const failing = new InvoiceManager(new InvoiceCalculator(logger), renderer, sender, logger);

        expect(() => failing.processInvoice({ amount: 1 }, 'a@example.com', InvoiceFormat.CSV)).toThrow('renderer down');
        expect(sender.sent).toHaveLength(0);
    });

    test('collaborators run in order with the derived values', () => {
        const order: string[] = [];
        const calculator: IInvoiceCalculator = {
            calculate: (raw) => { order.push(`calculate:${raw.amount}`); return { amount: 42 }; },
        };
        const renderer: IInvoiceRenderer = {
            render: (data, format) => { order.push(`render:${data.amount}:${format}`); return { content: 'c', format }; },
        };
        const orderedSender: IInvoiceSender = {
            send: (rendered, destination) => { order.push(`send:${rendered.content}:${destination}`); },
        };

        new InvoiceManager(calculator, renderer, orderedSender, logger)
            .processInvoice({ amount: 7 }, 'dest', InvoiceFormat.CSV);

        expect(order).toEqual(['calculate:7', 'render:42:CSV', 'send:c:dest']);
    });
});
