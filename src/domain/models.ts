/**
 * A user record. Pure data: validation, storage and formatting live in
 * their own collaborators.
 */
export interface User {
    readonly id: string;
    name: string;
    email: string;
    isActive: boolean;
}

/**
 * Output kinds a user can be presented in.
 */
export enum UserFormat {
    CONSOLE = 'console',
    JSON = 'json',
}

/**
 * Raw or calculated invoice figures.
 */
export interface InvoiceData {
    amount: number;
}

export enum InvoiceFormat {
    HTML = 'HTML',
    PDF = 'PDF',
    CSV = 'CSV',
}

/**
 * An invoice after rendering. Consumed once by a sender.
 */
export interface RenderedInvoice {
    content: string;
    format: InvoiceFormat;
}
