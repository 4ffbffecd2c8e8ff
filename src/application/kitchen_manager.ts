import { IChef, IDishwasher, IWaiter } from '../domain/kitchen_staff';

/**
 * Runs one service: cook, serve, clean up.
 */
export class KitchenManager {
    constructor(
        private readonly chef: IChef,
        private readonly waiter: IWaiter,
        private readonly dishwasher: IDishwasher
    ) { }

    run(): void {
        this.chef.prepareFood();
        this.waiter.serveCustomers();
        this.dishwasher.washDishes();
    }
}
