import { ConfigError } from './domain/errors';

export type DemoName = 'user' | 'invoice' | 'kitchen';

export const ALL_DEMOS: readonly DemoName[] = ['user', 'invoice', 'kitchen'];

export interface AppConfig {
    demos: DemoName[];
    trace: boolean;
}

function isDemoName(value: string): value is DemoName {
    return ALL_DEMOS.some(d => d === value);
}

function parseDemos(raw: string | undefined): DemoName[] {
    if (raw === undefined || raw.trim() === '') {
        return [...ALL_DEMOS];
    }

    const demos: DemoName[] = [];
    for (const part of raw.split(',')) {
        const name = part.trim().toLowerCase();
        if (!name) continue;
        if (!isDemoName(name)) {
            throw new ConfigError(
                `SRP_DEMOS contains unknown demo '${part.trim()}'. Expected any of: ${ALL_DEMOS.join(', ')}`,
                'SRP_DEMOS'
            );
        }
        demos.push(name);
    }
    return demos;
}

function parseTrace(raw: string | undefined): boolean {
    if (raw === undefined || raw.trim() === '') {
        return true;
    }
    switch (raw.trim().toLowerCase()) {
        case 'true': return true;
        case 'false': return false;
        default:
            throw new ConfigError(`SRP_TRACE must be 'true' or 'false'. Found: '${raw}'`, 'SRP_TRACE');
    }
}

/**
 * Builds the runtime config from an environment map (normally `process.env`
 * after `dotenv.config()`).
 * @throws ConfigError on any value it cannot interpret.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    return {
        demos: parseDemos(env.SRP_DEMOS),
        trace: parseTrace(env.SRP_TRACE),
    };
}
