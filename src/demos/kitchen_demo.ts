import { KitchenManager } from '../application/kitchen_manager';
import { Chef, Dishwasher, Waiter } from '../domain/kitchen_staff';
import { createLogger } from '../infrastructure/logger';

export function runKitchenExample(trace: boolean): void {
    console.log('\n--- Kitchen Manager Example ---');
    const manager = new KitchenManager(
        new Chef(createLogger('Chef', trace)),
        new Waiter(createLogger('Waiter', trace)),
        new Dishwasher(createLogger('Dishwasher', trace))
    );
    manager.run();
}
