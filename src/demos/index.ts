import { AppConfig, DemoName } from '../config';
import { runInvoiceExample } from './invoice_demo';
import { runKitchenExample } from './kitchen_demo';
import { runBadUserExample, runGoodUserExample } from './user_demo';

function runDemo(name: DemoName, trace: boolean): void {
    switch (name) {
        case 'user':
            runBadUserExample();
            runGoodUserExample(trace);
            return;
        case 'invoice':
            runInvoiceExample(trace);
            return;
        case 'kitchen':
            runKitchenExample(trace);
            return;
    }
}

export function runDemos(config: AppConfig): void {
    for (const name of config.demos) {
        runDemo(name, config.trace);
    }
}
