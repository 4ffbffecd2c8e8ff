import { InvoiceFormat, UserFormat } from './models';
import { UnsupportedFormatError } from './errors';

const USER_FORMATS: readonly UserFormat[] = Object.values(UserFormat);
const INVOICE_FORMATS: readonly InvoiceFormat[] = Object.values(InvoiceFormat);

/**
 * Maps a caller-supplied tag onto a user format. Matching ignores case.
 * @throws UnsupportedFormatError for any other tag.
 */
export function parseUserFormat(tag: string): UserFormat {
    const normalized = tag.trim().toLowerCase();
    const match = USER_FORMATS.find(f => f === normalized);
    if (!match) {
        throw new UnsupportedFormatError(tag);
    }
    return match;
}

/**
 * Same as {@link parseUserFormat}, for invoice output kinds.
 */
export function parseInvoiceFormat(tag: string): InvoiceFormat {
    const normalized = tag.trim().toUpperCase();
    const match = INVOICE_FORMATS.find(f => f === normalized);
    if (!match) {
        throw new UnsupportedFormatError(tag);
    }
    return match;
}

export function assertNever(value: never): never {
    throw new UnsupportedFormatError(String(value));
}
