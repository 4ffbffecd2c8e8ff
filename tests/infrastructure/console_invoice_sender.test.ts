import { ConsoleInvoiceSender } from '../../src/infrastructure/console_invoice_sender';
import { InvoiceFormat } from '../../src/domain/models';

describe('ConsoleInvoiceSender', () => {
    test('emits a sent notification for the destination', () => {
        const spy = jest.spyOn(console, 'log').mockImplementation();

        new ConsoleInvoiceSender().send(
            { content: 'Rendered content for amount: 110 in CSV', format: InvoiceFormat.CSV },
            'billing@example.com'
        );

        expect(spy.mock.calls).toEqual([
            ['[InvoiceSender] Sending CSV invoice to billing@example.com.'],
            ['[InvoiceSender] Content sent: "Rendered content for amount: 110 in CSV"'],
        ]);
        spy.mockRestore();
    });
});
