import { ILogger } from './logger';

export interface IChef {
    prepareFood(): void;
}

export interface IWaiter {
    serveCustomers(): void;
}

export interface IDishwasher {
    washDishes(): void;
}

export class Chef implements IChef {
    constructor(private readonly logger: ILogger) { }

    prepareFood(): void {
        this.logger.info('Preparing food.');
    }
}

export class Waiter implements IWaiter {
    constructor(private readonly logger: ILogger) { }

    serveCustomers(): void {
        this.logger.info('Serving customers.');
    }
}

export class Dishwasher implements IDishwasher {
    constructor(private readonly logger: ILogger) { }

    washDishes(): void {
        this.logger.info('Washing dishes.');
    }
}
